/**
 * Randomness the simulation draws from. Injected so tests and replays can
 * substitute a deterministic sequence.
 */
export interface RandomSource {
  /** Integer in [min, maxExclusive) */
  nextRange(min: number, maxExclusive: number): number;
  /** Float in [min, max) */
  nextFloatRange(min: number, max: number): number;
}

// xorshift32 is stuck at zero forever.
const ZERO_SEED_REPLACEMENT = 0xdeadbeef;

function toState(value: number): number {
  return value >>> 0 || ZERO_SEED_REPLACEMENT;
}

/**
 * xorshift32 (13, 17, 5). Pure 32-bit integer arithmetic, so a seed yields
 * the same sequence on every platform and the state fits a tape footer.
 */
export class SeededRng implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = toState(seed);
  }

  getState(): number {
    return this.state;
  }

  setState(state: number): void {
    this.state = toState(state);
  }

  /** Advance and return the new unsigned 32-bit state. */
  next(): number {
    let s = this.state;
    s ^= s << 13;
    s ^= s >>> 17;
    s ^= s << 5;
    this.state = s >>> 0;
    return this.state;
  }

  /** Integer in [0, bound); modulo bias is accepted. */
  nextInt(bound: number): number {
    return this.next() % bound;
  }

  nextRange(min: number, maxExclusive: number): number {
    return min + this.nextInt(maxExclusive - min);
  }

  /** Float in [0, 1) with 32 bits of resolution. */
  nextFloat(): number {
    return this.next() / 2 ** 32;
  }

  nextFloatRange(min: number, max: number): number {
    return min + (max - min) * this.nextFloat();
  }
}
