import { configTag, resolveRoundConfig, type RoundConfig } from "./config";
import { TapeInputSource } from "./input-source";
import { RoundController } from "./RoundController";
import type { Tape } from "./tape";

export interface ReplayVerdict {
  score: number;
  rngState: number;
  scoreOk: boolean;
  rngOk: boolean;
  /** False when the tape was recorded under a different round config. */
  configOk: boolean;
  passed: boolean;
}

/** Fresh round seeded from the tape header and fed by the tape's inputs. */
export function createReplay(
  tape: Tape,
  config?: Partial<RoundConfig>,
): { round: RoundController; source: TapeInputSource } {
  const round = new RoundController({ seed: tape.header.seed, config });
  const source = new TapeInputSource(tape.inputs);
  return { round, source };
}

/**
 * Replay every recorded frame and compare against the footer. Frames after
 * the round ended replay as no-ops, so a tape never needs trimming.
 */
export function verifyTape(tape: Tape, config?: Partial<RoundConfig>): ReplayVerdict {
  const { round, source } = createReplay(tape, config);

  for (let i = 0; i < tape.header.frameCount; i++) {
    round.step(source);
  }

  const score = round.getScore();
  const rngState = round.getRngState() ?? 0;
  const scoreOk = score === tape.footer.finalScore;
  const rngOk = rngState >>> 0 === tape.footer.finalRngState >>> 0;
  const configOk = configTag(resolveRoundConfig(config)) === tape.header.configTag;

  return { score, rngState, scoreOk, rngOk, configOk, passed: scoreOk && rngOk && configOk };
}
