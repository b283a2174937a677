/**
 * Headless tape generator using the autopilot.
 *
 * Usage: tsx scripts/generate-tape.ts [--seed <hex>] [--max-frames <n>] [--output <path>] [--high-score <path>]
 *
 * Plays one autopilot round in headless mode, records its intents to a tape,
 * writes the tape to a file, then verifies it inline.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { Autopilot } from "../src/game/Autopilot";
import { configTag, roundConfigFromEnv } from "../src/game/config";
import { DEFAULT_MAX_TAPE_FRAMES } from "../src/game/constants";
import { AutopilotInputSource } from "../src/game/input-source";
import { verifyTape } from "../src/game/replay";
import { RoundController } from "../src/game/RoundController";
import { deserializeTape } from "../src/game/tape";
import { FileHighScoreStore, recordFinalScore } from "../src/storage/high-score";
import { formatHex32, parseInteger, readFlag, safeErrorMessage } from "../src/utils";

const args = process.argv.slice(2);
const seedFlag = readFlag(args, "--seed");
const seed = seedFlag === undefined ? Date.now() >>> 0 : Number.parseInt(seedFlag, 16) >>> 0;
const maxFrames = parseInteger(readFlag(args, "--max-frames"), DEFAULT_MAX_TAPE_FRAMES);
const highScorePath = readFlag(args, "--high-score");
let outputPath = readFlag(args, "--output") ?? "";

if (!outputPath) {
  outputPath = `rockfield-${formatHex32(seed).slice(2)}.tape`;
}

const config = roundConfigFromEnv(process.env);

console.log(`Generating tape:`);
console.log(`  Seed:       ${formatHex32(seed)}`);
console.log(`  Max frames: ${maxFrames}`);
console.log(`  Output:     ${outputPath}`);
console.log(`  Config tag: ${configTag(config)}${configTag(config) === 0 ? " (defaults)" : ""}`);
console.log();

const round = new RoundController({ seed, config, record: true });
const source = new AutopilotInputSource(round, new Autopilot());

const start = performance.now();

while (round.getFrame() < maxFrames && !round.isRoundOver()) {
  round.step(source);

  const frame = round.getFrame();
  if (frame % 2000 === 0) {
    const elapsed = performance.now() - start;
    console.log(
      `  Frame ${frame}/${maxFrames} (score: ${round.getScore()}, obstacles: ${round.getObstacleCount()}, ${(frame / (elapsed / 1000)).toFixed(0)} fps)`,
    );
  }
}

const elapsed = performance.now() - start;
const frames = round.getFrame();

console.log();
console.log(`Generation complete:`);
console.log(`  Frames: ${frames}`);
console.log(`  Score:  ${round.getScore()}`);
console.log(`  Mode:   ${round.getMode()}`);
console.log(`  Time:   ${elapsed.toFixed(1)}ms`);

const tapeData = round.getTape();
if (!tapeData) {
  console.error("[tape] nothing recorded");
  process.exit(1);
}

try {
  writeFileSync(outputPath, tapeData);
} catch (error) {
  console.error(`[tape] failed writing ${outputPath}: ${safeErrorMessage(error)}`);
  process.exit(1);
}
console.log(`  Written: ${outputPath} (${tapeData.length} bytes)`);

if (highScorePath) {
  const { highScore, isNewHighScore } = recordFinalScore(
    new FileHighScoreStore(highScorePath),
    round.getScore(),
  );
  console.log(`  High score: ${highScore}${isNewHighScore ? " (new)" : ""}`);
}

// Inline verification
console.log();
console.log("Verifying tape...");

const tape = deserializeTape(new Uint8Array(readFileSync(outputPath)), maxFrames);
const verdict = verifyTape(tape, config);

if (verdict.passed) {
  console.log("VERIFICATION PASSED");
} else {
  if (!verdict.scoreOk) {
    console.error(`  Score mismatch: got ${verdict.score}, expected ${tape.footer.finalScore}`);
  }
  if (!verdict.rngOk) {
    console.error(
      `  RNG mismatch: got ${formatHex32(verdict.rngState)}, expected ${formatHex32(tape.footer.finalRngState)}`,
    );
  }
  if (!verdict.configOk) {
    console.error(
      `  Config mismatch: tape tag ${tape.header.configTag}, current ${configTag(config)}`,
    );
  }
  console.error("VERIFICATION FAILED");
  process.exit(1);
}
