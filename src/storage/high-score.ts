import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { safeErrorMessage } from "../utils";

export interface HighScoreStore {
  load(): number;
  save(score: number): void;
}

export interface HighScoreUpdate {
  highScore: number;
  isNewHighScore: boolean;
}

function parseStoredScore(raw: string): number | null {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || !("highScore" in parsed)) {
    return null;
  }
  const value = parsed.highScore;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    return null;
  }
  return value;
}

/**
 * High score kept as `{ "highScore": n }` in a JSON file.
 * Storage problems never reach the caller: reads fall back to 0 and failed
 * writes are logged and dropped.
 */
export class FileHighScoreStore implements HighScoreStore {
  constructor(private readonly path: string) {}

  load(): number {
    let raw: string;
    try {
      raw = readFileSync(this.path, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return 0;
      }
      console.warn(`[high-score] failed reading ${this.path}: ${safeErrorMessage(error)}`);
      return 0;
    }

    try {
      const score = parseStoredScore(raw);
      if (score === null) {
        console.warn(`[high-score] ignoring malformed ${this.path}`);
        return 0;
      }
      return score;
    } catch (error) {
      console.warn(`[high-score] ignoring corrupt ${this.path}: ${safeErrorMessage(error)}`);
      return 0;
    }
  }

  save(score: number): void {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(this.path, `${JSON.stringify({ highScore: score })}\n`, "utf8");
    } catch (error) {
      console.warn(`[high-score] failed writing ${this.path}: ${safeErrorMessage(error)}`);
    }
  }
}

/** Compare a finished round against the stored best and persist only an improvement. */
export function recordFinalScore(store: HighScoreStore, score: number): HighScoreUpdate {
  const previous = store.load();
  if (score > previous) {
    store.save(score);
    return { highScore: score, isNewHighScore: true };
  }
  return { highScore: previous, isNewHighScore: false };
}
