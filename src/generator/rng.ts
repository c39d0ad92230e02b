// =============================================================================
// Seeded RNG: deterministic pseudo-random number generator (xorshift128+)
// =============================================================================

/**
 * Source of uniform randomness used by the dataset generator.
 */
export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform integer in [min, max) */
  nextInt(min: number, max: number): number;
}

export class Xorshift128Plus implements RandomSource {
  private s0: number;
  private s1: number;

  constructor(seed: number) {
    // Initialize state from seed using splitmix32
    this.s0 = this.splitmix32(seed);
    this.s1 = this.splitmix32(this.s0);
    if (this.s0 === 0 && this.s1 === 0) {
      this.s0 = 1;
    }
  }

  private splitmix32(state: number): number {
    state |= 0;
    state = (state + 0x9e3779b9) | 0;
    let t = state ^ (state >>> 16);
    t = Math.imul(t, 0x21f0aaad);
    t = t ^ (t >>> 15);
    t = Math.imul(t, 0x735a2d97);
    t = t ^ (t >>> 15);
    return t >>> 0;
  }

  next(): number {
    let s1 = this.s0;
    const s0 = this.s1;
    this.s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this.s1 = s1;
    return ((this.s0 + this.s1) >>> 0) / 0x100000000;
  }

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min)) + min;
  }
}

/**
 * Pick an index with probability proportional to its weight.
 */
export function weightedIndex(weights: readonly number[], total: number, rng: RandomSource): number {
  let r = rng.next() * total;
  for (let i = 0; i < weights.length; i++) {
    r -= weights[i];
    if (r < 0) {
      return i;
    }
  }
  // Rounding can leave r marginally positive after the last weight
  return weights.length - 1;
}

/**
 * Draw `k` distinct elements uniformly (partial Fisher-Yates on a copy).
 */
export function sampleWithoutReplacement<T>(pool: readonly T[], k: number, rng: RandomSource): T[] {
  const copy = [...pool];
  const n = Math.min(k, copy.length);
  for (let i = 0; i < n; i++) {
    const j = rng.nextInt(i, copy.length);
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy.slice(0, n);
}
