/**
 * Headless tape verifier.
 *
 * Usage: tsx scripts/verify-tape.ts <tape-file> [--max-frames <n>]
 *
 * Reads a .tape file, replays it in headless mode, and compares
 * the final score + RNG state against the tape footer.
 * Replays under the ROCKFIELD_* environment config; a tape recorded under
 * another config fails with a config mismatch.
 * Exit 0 = PASSED, Exit 1 = FAILED.
 */

import { readFileSync } from "node:fs";
import { configTag, roundConfigFromEnv } from "../src/game/config";
import { DEFAULT_MAX_TAPE_FRAMES } from "../src/game/constants";
import { verifyTape } from "../src/game/replay";
import { deserializeTape, type Tape } from "../src/game/tape";
import { formatHex32, parseInteger, readFlag, safeErrorMessage } from "../src/utils";

const tapePath = process.argv[2];
const maxFrames = parseInteger(
  readFlag(process.argv.slice(3), "--max-frames"),
  DEFAULT_MAX_TAPE_FRAMES,
);

if (!tapePath || tapePath.startsWith("--")) {
  console.error("Usage: tsx scripts/verify-tape.ts <tape-file> [--max-frames <n>]");
  process.exit(1);
}

let tape: Tape;
try {
  tape = deserializeTape(new Uint8Array(readFileSync(tapePath)), maxFrames);
} catch (error) {
  console.error(`[tape] ${tapePath}: ${safeErrorMessage(error)}`);
  process.exit(1);
}

console.log(`Tape: ${tapePath}`);
console.log(`  Seed:       ${formatHex32(tape.header.seed)}`);
console.log(`  Frames:     ${tape.header.frameCount}`);
console.log(`  Exp. Score: ${tape.footer.finalScore}`);
console.log(`  Exp. RNG:   ${formatHex32(tape.footer.finalRngState)}`);
console.log();

const config = roundConfigFromEnv(process.env);
const start = performance.now();
const verdict = verifyTape(tape, config);
const elapsed = performance.now() - start;

console.log(`Replay complete in ${elapsed.toFixed(1)}ms`);
console.log(`  Score:  ${verdict.score} (expected ${tape.footer.finalScore})`);
console.log(
  `  RNG:    ${formatHex32(verdict.rngState)} (expected ${formatHex32(tape.footer.finalRngState)})`,
);

if (verdict.passed) {
  console.log("\nVERIFICATION PASSED");
  process.exit(0);
} else {
  if (!verdict.scoreOk) {
    console.error(`  Score mismatch: got ${verdict.score}, expected ${tape.footer.finalScore}`);
  }
  if (!verdict.rngOk) {
    console.error(`  RNG mismatch: got ${formatHex32(verdict.rngState)}`);
  }
  if (!verdict.configOk) {
    console.error(
      `  Config mismatch: tape was recorded under config tag ${tape.header.configTag}, ` +
        `the current ROCKFIELD_* configuration has tag ${configTag(config)}`,
    );
  }
  console.error("\nVERIFICATION FAILED");
  process.exit(1);
}
