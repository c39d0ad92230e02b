/**
 * Dataset file format: UTF-8, one transaction per line, items separated by
 * single spaces, no header.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { getLogger } from '../logging/logger.js';
import type { ItemUniverse } from '../universe/universe.js';
import { assertCapacity, generateDataset, type Dataset, type GenerateOptions, type GenerationStats } from './generator.js';

export interface DatasetSummary {
  transactions: number;
  distinctItems: number;
  minLength: number;
  maxLength: number;
  meanLength: number;
}

/**
 * Render a dataset in the line format.
 */
export function formatDataset(dataset: Dataset): string {
  return dataset.map((tx) => `${tx.join(' ')}\n`).join('');
}

/**
 * Write a dataset, replacing whatever was at `path`.
 */
export function writeDataset(path: string, dataset: Dataset): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, formatDataset(dataset), 'utf-8');
  getLogger('dataset').debug({ path, transactions: dataset.length }, 'Dataset written');
}

/**
 * Parse the line format. Blank lines are skipped.
 */
export function parseDataset(text: string): Dataset {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => line.split(/\s+/));
}

export function readDataset(path: string): Dataset {
  return parseDataset(readFileSync(path, 'utf-8'));
}

export function summarizeDataset(dataset: Dataset): DatasetSummary {
  if (dataset.length === 0) {
    return { transactions: 0, distinctItems: 0, minLength: 0, maxLength: 0, meanLength: 0 };
  }
  const items = new Set<string>();
  let min = Infinity;
  let max = 0;
  let total = 0;
  for (const tx of dataset) {
    for (const item of tx) {
      items.add(item);
    }
    min = Math.min(min, tx.length);
    max = Math.max(max, tx.length);
    total += tx.length;
  }
  return {
    transactions: dataset.length,
    distinctItems: items.size,
    minLength: min,
    maxLength: max,
    meanLength: total / dataset.length,
  };
}

export interface GenerateToFileResult {
  path: string;
  dataset: Dataset;
  stats: GenerationStats;
}

/**
 * Generate a dataset and write it to `path`. Nothing is written when the
 * request cannot be satisfied.
 */
export function generateToFile(
  universe: ItemUniverse,
  count: number,
  path: string,
  options: GenerateOptions = {}
): GenerateToFileResult {
  assertCapacity(universe, count);
  const { dataset, stats } = generateDataset(universe, count, options);
  writeDataset(path, dataset);
  return { path, dataset, stats };
}
