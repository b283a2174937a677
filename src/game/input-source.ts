import type { Autopilot } from "./Autopilot";
import { InvalidInputError } from "./errors";
import { decodeInputByte } from "./tape";
import { IDLE_INTENTS, type FrameIntents } from "./types";
import type { RoundController } from "./RoundController";

/**
 * Where a round gets each frame's intents: a tape, a fixed script or the
 * autopilot. `getFrameInput` may be called before every `advance`.
 */
export interface InputSource {
  getFrameInput(): FrameIntents;
  advance(): void;
}

const INTENT_KEYS = ["left", "right", "thrust", "fire"] as const;

/** Validate intents that arrive from outside the type system (JSON, host callbacks). */
export function assertFrameIntents(value: unknown): asserts value is FrameIntents {
  if (typeof value !== "object" || value === null) {
    throw new InvalidInputError("intents", "expected an object");
  }
  for (const key of INTENT_KEYS) {
    if (typeof Reflect.get(value, key) !== "boolean") {
      throw new InvalidInputError(`intents.${key}`, "expected a boolean");
    }
  }
}

/** Feeds a tape's intent bytes back one frame at a time, then idles. */
export class TapeInputSource implements InputSource {
  private frame = 0;

  constructor(private readonly bytes: Uint8Array) {}

  getFrameInput(): FrameIntents {
    const byte = this.bytes[this.frame];
    return byte === undefined ? { ...IDLE_INTENTS } : decodeInputByte(byte);
  }

  advance(): void {
    if (!this.isComplete()) {
      this.frame += 1;
    }
  }

  isComplete(): boolean {
    return this.frame >= this.bytes.length;
  }

  getCurrentFrame(): number {
    return this.frame;
  }

  getTotalFrames(): number {
    return this.bytes.length;
  }
}

/** Plays back a fixed list of intents, then idles. */
export class ScriptedInputSource implements InputSource {
  private cursor = 0;

  constructor(private readonly frames: readonly FrameIntents[]) {}

  getFrameInput(): FrameIntents {
    const frame = this.frames[this.cursor];
    return frame ? { ...frame } : { ...IDLE_INTENTS };
  }

  advance(): void {
    if (this.cursor < this.frames.length) {
      this.cursor++;
    }
  }
}

/**
 * Asks the autopilot for intents against the controller's current state.
 */
export class AutopilotInputSource implements InputSource {
  constructor(
    private readonly controller: RoundController,
    private readonly autopilot: Autopilot,
  ) {}

  getFrameInput(): FrameIntents {
    return this.autopilot.decide(this.controller.getSnapshot());
  }

  advance(): void {
    // Nothing to advance; each frame reads live state
  }
}
