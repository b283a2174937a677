/**
 * Dumps intermediate round state during tape replay.
 *
 * Usage: tsx scripts/dump-tape-state.ts <tape-file> [--every <N>]
 *
 * Outputs JSON lines: one per sampled frame with RNG state, score, mode and entity counts.
 */

import { readFileSync } from "node:fs";
import { configTag, roundConfigFromEnv } from "../src/game/config";
import { createReplay } from "../src/game/replay";
import type { RoundController } from "../src/game/RoundController";
import { deserializeTape } from "../src/game/tape";
import { formatHex32, parseInteger, readFlag } from "../src/utils";

const tapePath = process.argv[2];
const everyN = parseInteger(readFlag(process.argv.slice(3), "--every"), 1);

if (!tapePath) {
  console.error("Usage: tsx scripts/dump-tape-state.ts <tape-file> [--every <N>]");
  process.exit(1);
}

const tape = deserializeTape(new Uint8Array(readFileSync(tapePath)));

console.error(`Tape: ${tapePath}`);
console.error(`  Seed: ${formatHex32(tape.header.seed)}`);
console.error(`  Frames: ${tape.header.frameCount}`);

const config = roundConfigFromEnv(process.env);
if (configTag(config) !== tape.header.configTag) {
  console.error(
    `  Warning: tape config tag ${tape.header.configTag} differs from the current ` +
      `ROCKFIELD_* configuration (${configTag(config)}); states will diverge`,
  );
}

const { round, source } = createReplay(tape, config);

function dump(frame: number, state: RoundController): void {
  console.log(
    JSON.stringify({
      frame,
      rng: (state.getRngState() ?? 0) >>> 0,
      score: state.getScore(),
      mode: state.getMode(),
      obstacles: state.getObstacleCount(),
      projectiles: state.getProjectileCount(),
    }),
  );
}

// Initial state (frame 0, before any simulation)
dump(0, round);

for (let i = 1; i <= tape.header.frameCount; i++) {
  round.step(source);

  if (i % everyN === 0 || i === tape.header.frameCount) {
    dump(i, round);
  }
}
