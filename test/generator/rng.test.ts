import { describe, it, expect } from 'vitest';
import {
  Xorshift128Plus,
  weightedIndex,
  sampleWithoutReplacement,
  type RandomSource,
} from '../../src/generator/rng.js';

/**
 * Replays a fixed sequence of floats.
 */
function scripted(values: number[]): RandomSource {
  let i = 0;
  return {
    next: () => values[i++ % values.length],
    nextInt: (min, max) => Math.floor(values[i++ % values.length] * (max - min)) + min,
  };
}

describe('generator/rng', () => {
  describe('Xorshift128Plus', () => {
    it('is deterministic for a seed', () => {
      const a = new Xorshift128Plus(7);
      const b = new Xorshift128Plus(7);
      const first = Array.from({ length: 20 }, () => a.next());
      const second = Array.from({ length: 20 }, () => b.next());
      expect(first).toEqual(second);
    });

    it('differs between seeds', () => {
      const rngA = new Xorshift128Plus(1);
      const rngB = new Xorshift128Plus(2);
      const a = Array.from({ length: 5 }, () => rngA.next());
      const b = Array.from({ length: 5 }, () => rngB.next());
      expect(a).not.toEqual(b);
    });

    it('stays in [0, 1) and nextInt stays in range', () => {
      const rng = new Xorshift128Plus(99);
      for (let i = 0; i < 1000; i++) {
        const value = rng.next();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
        const n = rng.nextInt(3, 8);
        expect(n).toBeGreaterThanOrEqual(3);
        expect(n).toBeLessThan(8);
        expect(Number.isInteger(n)).toBe(true);
      }
    });
  });

  describe('weightedIndex', () => {
    it('walks the cumulative weights', () => {
      const weights = [1, 2, 1];
      expect(weightedIndex(weights, 4, scripted([0]))).toBe(0);
      expect(weightedIndex(weights, 4, scripted([0.3]))).toBe(1);
      expect(weightedIndex(weights, 4, scripted([0.8]))).toBe(2);
    });

    it('falls back to the last index when the total exceeds the weights', () => {
      expect(weightedIndex([0.5, 0.5], 1.5, scripted([0.9]))).toBe(1);
    });
  });

  describe('sampleWithoutReplacement', () => {
    it('returns k distinct elements from the pool', () => {
      const rng = new Xorshift128Plus(3);
      const sample = sampleWithoutReplacement([1, 2, 3, 4, 5, 6], 4, rng);
      expect(sample).toHaveLength(4);
      expect(new Set(sample).size).toBe(4);
      sample.forEach((value) => expect([1, 2, 3, 4, 5, 6]).toContain(value));
    });

    it('caps k at the pool size and leaves the pool untouched', () => {
      const pool = ['a', 'b'];
      const sample = sampleWithoutReplacement(pool, 5, new Xorshift128Plus(1));
      expect(sample.sort()).toEqual(['a', 'b']);
      expect(pool).toEqual(['a', 'b']);
    });
  });
});
