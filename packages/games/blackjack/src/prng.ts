import type { RandomSource } from "@hitstand/engine";

const UINT32_RANGE = 0x100000000;

/**
 * Deterministic seeded PRNG (xorshift32) for dealing hands. The string seed
 * is folded into the 32-bit state with FNV-1a, so a hand replays exactly from
 * its seed.
 */
export class SeededRng implements RandomSource {
  private state: number;

  constructor(seed: string) {
    let hash = 0x811c9dc5;
    for (let i = 0; i < seed.length; i++) {
      hash ^= seed.charCodeAt(i);
      hash = Math.imul(hash, 0x01000193) >>> 0;
    }
    // xorshift is stuck at 0
    this.state = hash === 0 ? 1 : hash;
  }

  /** Next 32-bit unsigned integer */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  /**
   * Uniform integer in [0, max). Draws from the biased tail of the 32-bit
   * range are rejected, so every rank keeps exactly its weight.
   */
  nextInt(max: number): number {
    if (!Number.isInteger(max) || max <= 0 || max > UINT32_RANGE) {
      throw new RangeError(`max must be an integer in [1, 2^32], got ${max}`);
    }
    const limit = UINT32_RANGE - (UINT32_RANGE % max);
    let value = this.next();
    while (value >= limit) {
      value = this.next();
    }
    return value % max;
  }
}
