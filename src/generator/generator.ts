/**
 * Unique-transaction dataset generator.
 *
 * Transactions are sampled at random and accepted only when their item set is
 * new. Once sampling keeps hitting duplicates the generator falls back to
 * enumerating subsets in size-then-lexicographic order, which always finishes
 * because capacity is checked before any work starts.
 *
 * Transaction size distribution, with cap = min(|U|, 20):
 *   10% uniform in [1, ceil(cap/4)]            (small)
 *   60% uniform in [ceil(cap/4), ceil(3cap/5)] (moderate)
 *   30% uniform in [ceil(3cap/5), cap]         (large)
 * Items are then picked without replacement: first 2+ items from one of a few
 * co-occurrence clusters, the rest by Zipf-like weights over universe order.
 */

import { InsufficientUniverseError, InvalidCountError } from '../errors/types.js';
import { GENERATOR } from '../constants.js';
import { getLogger, startTiming } from '../logging/logger.js';
import { subsetCapacity, type ItemUniverse } from '../universe/universe.js';
import {
  Xorshift128Plus,
  sampleWithoutReplacement,
  weightedIndex,
  type RandomSource,
} from './rng.js';

/**
 * Items of one transaction, in universe order.
 */
export type Transaction = readonly string[];

export type Dataset = readonly Transaction[];

export interface GenerateOptions {
  /** PRNG seed (default 42) */
  seed?: number;
  /** Randomness source; overrides seed */
  rng?: RandomSource;
  /** Duplicate samples in a row before switching to enumeration */
  maxConsecutiveRejections?: number;
}

export interface GenerationStats {
  /** Random samples drawn */
  sampled: number;
  /** Samples rejected as duplicates */
  rejected: number;
  /** Transactions produced by the enumeration fallback */
  enumerated: number;
}

export interface GenerationResult {
  dataset: Dataset;
  stats: GenerationStats;
}

/**
 * Item-choice model built once per dataset.
 */
interface SamplingModel {
  universeSize: number;
  itemWeights: number[];
  clusters: number[][];
  clusterWeights: number[];
  clusterWeightTotal: number;
}

/**
 * Reject counts that are not non-negative safe integers, and counts the
 * universe cannot satisfy without repeating an item set.
 */
export function assertCapacity(universe: ItemUniverse, count: number): void {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new InvalidCountError(String(count), 'transaction count must be a non-negative integer');
  }
  const capacity = subsetCapacity(universe.items.length);
  if (count > capacity) {
    throw new InsufficientUniverseError(universe.items.length, count, capacity, {
      component: 'generator',
      operation: 'generate',
    });
  }
}

/**
 * Draw a transaction size.
 */
export function chooseSize(universeSize: number, rng: RandomSource): number {
  const cap = Math.min(universeSize, GENERATOR.MAX_TRANSACTION_SIZE);
  const bands = GENERATOR.SIZE_BANDS;
  const r = rng.next();

  let cumulative = 0;
  for (let i = 0; i < bands.length; i++) {
    const band = bands[i];
    cumulative += band.probability;
    if (r < cumulative || i === bands.length - 1) {
      const lo = Math.max(1, Math.ceil(cap * band.from));
      const hi = Math.max(lo, Math.ceil(cap * band.to));
      return rng.nextInt(lo, hi + 1);
    }
  }
  return 1;
}

function buildSamplingModel(universeSize: number, rng: RandomSource): SamplingModel {
  const itemWeights = Array.from(
    { length: universeSize },
    (_, i) => 1 / (i + 1) ** GENERATOR.ZIPF_ALPHA
  );

  const clusters: number[][] = [];
  if (universeSize >= GENERATOR.MIN_UNIVERSE_FOR_CLUSTERS) {
    const indices = Array.from({ length: universeSize }, (_, i) => i);
    const clusterCount = Math.max(
      GENERATOR.MIN_CLUSTERS,
      Math.min(GENERATOR.MAX_CLUSTERS, Math.floor(universeSize / 5))
    );
    const maxSize = Math.min(GENERATOR.MAX_CLUSTER_SIZE, universeSize);
    for (let c = 0; c < clusterCount; c++) {
      const size = rng.nextInt(GENERATOR.MIN_CLUSTER_SIZE, maxSize + 1);
      clusters.push(sampleWithoutReplacement(indices, size, rng));
    }
  }

  const clusterWeights = clusters.map((_, i) => 1 / (i + 1));
  return {
    universeSize,
    itemWeights,
    clusters,
    clusterWeights,
    clusterWeightTotal: clusterWeights.reduce((sum, w) => sum + w, 0),
  };
}

/**
 * Sample one transaction as sorted universe indices.
 */
function sampleTransaction(model: SamplingModel, rng: RandomSource): number[] {
  const length = chooseSize(model.universeSize, rng);
  const chosen = new Set<number>();

  if (model.clusters.length > 0) {
    const cluster = model.clusters[weightedIndex(model.clusterWeights, model.clusterWeightTotal, rng)];
    const minPick = Math.min(2, cluster.length, length);
    const maxPick = Math.max(
      minPick,
      Math.min(cluster.length, Math.max(2, Math.floor(length / 2)), length)
    );
    const pick = rng.nextInt(minPick, maxPick + 1);
    for (const index of sampleWithoutReplacement(cluster, pick, rng)) {
      chosen.add(index);
    }
  }

  // Zipf-weighted picks without replacement over the items not yet chosen
  const candidates: number[] = [];
  const weights: number[] = [];
  let total = 0;
  for (let i = 0; i < model.universeSize; i++) {
    if (!chosen.has(i)) {
      candidates.push(i);
      weights.push(model.itemWeights[i]);
      total += model.itemWeights[i];
    }
  }
  while (chosen.size < length && candidates.length > 0) {
    const at = weightedIndex(weights, total, rng);
    chosen.add(candidates[at]);
    total -= weights[at];
    candidates[at] = candidates[candidates.length - 1];
    weights[at] = weights[weights.length - 1];
    candidates.pop();
    weights.pop();
  }

  return [...chosen].sort((a, b) => a - b);
}

/**
 * All non-empty subsets of {0..n-1}, smallest first, each size in
 * lexicographic order of sorted indices.
 */
export function* enumerateSubsets(n: number): Generator<number[]> {
  for (let k = 1; k <= n; k++) {
    const combo = Array.from({ length: k }, (_, i) => i);
    while (true) {
      yield [...combo];
      // Advance the rightmost index that still has room
      let i = k - 1;
      while (i >= 0 && combo[i] === n - k + i) {
        i--;
      }
      if (i < 0) {
        break;
      }
      combo[i]++;
      for (let j = i + 1; j < k; j++) {
        combo[j] = combo[j - 1] + 1;
      }
    }
  }
}

/**
 * Generate `count` distinct non-empty transactions, with sampling statistics.
 */
export function generateDataset(
  universe: ItemUniverse,
  count: number,
  options: GenerateOptions = {}
): GenerationResult {
  assertCapacity(universe, count);

  const logger = getLogger('generator');
  const stopTiming = startTiming(logger, 'generate');
  const rng = options.rng ?? new Xorshift128Plus(options.seed ?? GENERATOR.DEFAULT_SEED);
  const maxRejections = options.maxConsecutiveRejections ?? GENERATOR.MAX_CONSECUTIVE_REJECTIONS;
  const stats: GenerationStats = { sampled: 0, rejected: 0, enumerated: 0 };

  const accepted = new Set<string>();
  const rows: number[][] = [];

  if (count > 0) {
    const model = buildSamplingModel(universe.items.length, rng);
    let consecutive = 0;
    while (rows.length < count && consecutive < maxRejections) {
      const tx = sampleTransaction(model, rng);
      stats.sampled++;
      const key = tx.join(',');
      if (accepted.has(key)) {
        stats.rejected++;
        consecutive++;
        continue;
      }
      accepted.add(key);
      rows.push(tx);
      consecutive = 0;
    }

    if (rows.length < count) {
      logger.info(
        { accepted: rows.length, requested: count, rejected: stats.rejected },
        'Duplicate rate too high, enumerating remaining subsets'
      );
      for (const subset of enumerateSubsets(universe.items.length)) {
        if (rows.length >= count) {
          break;
        }
        const key = subset.join(',');
        if (!accepted.has(key)) {
          accepted.add(key);
          rows.push(subset);
          stats.enumerated++;
        }
      }
    }
  }

  const dataset = rows.map((tx) => tx.map((index) => universe.items[index]));
  stopTiming().log();
  logger.info({ count, ...stats }, 'Dataset generated');
  return { dataset, stats };
}

/**
 * Generate `count` distinct non-empty transactions drawn from the universe.
 */
export function generate(universe: ItemUniverse, count: number, options: GenerateOptions = {}): Dataset {
  return generateDataset(universe, count, options).dataset;
}
