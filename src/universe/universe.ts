/**
 * Item universe parsing.
 *
 * A universe source is one of:
 * - `AUTO` or `AUTO:<n>`: synthesized identifiers I1..In
 * - a path to an existing file with newline-, whitespace- or comma-separated items
 * - inline text with whitespace- or comma-separated items
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { resolve } from 'path';
import { EmptyUniverseError, GeneratorError, InvalidCountError } from '../errors/types.js';
import { GENERATOR } from '../constants.js';
import { getLogger } from '../logging/logger.js';

/**
 * A finite, ordered set of distinct item identifiers.
 */
export interface ItemUniverse {
  readonly items: readonly string[];
  /** Where the items came from, for messages */
  readonly source: string;
}

export interface ParseUniverseOptions {
  /** Directory relative file paths are resolved against (default: process.cwd()) */
  cwd?: string;
}

const AUTO_PATTERN = /^AUTO(?::(.*))?$/;
const SEPARATOR_PATTERN = /[\s,]+/;

/**
 * Split text into item identifiers, dropping repeats (first occurrence wins).
 */
export function tokenizeItems(text: string): string[] {
  const seen = new Set<string>();
  const items: string[] = [];
  for (const token of text.split(SEPARATOR_PATTERN)) {
    if (token && !seen.has(token)) {
      seen.add(token);
      items.push(token);
    }
  }
  return items;
}

/**
 * Build a universe from explicit identifiers.
 * Duplicates are collapsed; identifiers may not be empty or contain whitespace,
 * since a transaction line separates items with single spaces.
 */
export function createUniverse(items: readonly string[], source = 'inline'): ItemUniverse {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const item of items) {
    if (item === '' || /\s/.test(item)) {
      throw new GeneratorError(`Invalid item identifier ${JSON.stringify(item)} in ${source}`, {
        code: 'GENERATOR_INVALID_ITEM',
        severity: 'medium',
        context: { metadata: { source, item } },
      });
    }
    if (!seen.has(item)) {
      seen.add(item);
      unique.push(item);
    }
  }

  if (unique.length === 0) {
    throw new EmptyUniverseError(source);
  }

  return { items: unique, source };
}

/**
 * Synthesize the universe I1..In.
 */
export function autoUniverse(size: number = GENERATOR.AUTO_DEFAULT_SIZE): ItemUniverse {
  if (!Number.isSafeInteger(size) || size < 1) {
    throw new InvalidCountError(String(size), 'universe size must be a positive integer');
  }
  const items = Array.from({ length: size }, (_, i) => `${GENERATOR.AUTO_ITEM_PREFIX}${i + 1}`);
  return { items, source: size === GENERATOR.AUTO_DEFAULT_SIZE ? 'AUTO' : `AUTO:${size}` };
}

/**
 * Resolve a universe source string (AUTO directive, file path or inline list).
 */
export function parseUniverseSource(source: string, options: ParseUniverseOptions = {}): ItemUniverse {
  const logger = getLogger('universe');
  const trimmed = source.trim();

  const auto = AUTO_PATTERN.exec(trimmed);
  if (auto) {
    const sizeText = auto[1];
    if (sizeText === undefined) {
      return autoUniverse();
    }
    if (!/^\d+$/.test(sizeText)) {
      throw new InvalidCountError(sizeText, 'AUTO size must be a positive integer');
    }
    return autoUniverse(Number(sizeText));
  }

  const path = resolve(options.cwd ?? process.cwd(), trimmed);
  if (trimmed !== '' && existsSync(path) && statSync(path).isFile()) {
    logger.debug({ path }, 'Loading item universe from file');
    const items = tokenizeItems(readFileSync(path, 'utf-8'));
    if (items.length === 0) {
      throw new EmptyUniverseError(path);
    }
    return createUniverse(items, path);
  }

  const items = tokenizeItems(trimmed);
  if (items.length === 0) {
    throw new EmptyUniverseError('inline universe');
  }
  return createUniverse(items, 'inline');
}

/**
 * Number of distinct non-empty subsets of a universe of the given size
 * (2^size - 1), saturating at Number.MAX_SAFE_INTEGER.
 */
export function subsetCapacity(size: number): number {
  if (size >= 53) {
    return Number.MAX_SAFE_INTEGER;
  }
  return 2 ** size - 1;
}
