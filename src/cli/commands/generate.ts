/**
 * Generate command - writes a synthetic transaction dataset.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'path';
import { parseUniverseSource } from '../../universe/universe.js';
import { generateToFile, summarizeDataset } from '../../generator/index.js';
import { loadConfig } from '../../config/loader.js';
import { InvalidCountError } from '../../errors/types.js';
import { EXIT_CODES } from '../../constants.js';
import * as output from '../output.js';
import { reportError } from '../utils/error-hints.js';

export interface GenerateCommandOptions {
  config?: string;
  output?: string;
  seed?: string;
  json?: boolean;
}

/**
 * Parse a non-negative integer argument.
 */
export function parseIntegerArg(text: string, what: string): number {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidCountError(text, `${what} must be a non-negative integer`);
  }
  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidCountError(text, `${what} is too large`);
  }
  return value;
}

/**
 * Create a new generate command instance.
 * Useful for testing where fresh command instances are needed.
 */
export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Generate a dataset of unique random transactions')
    .argument('<universe>', 'Item universe: "A B C", a file of items, AUTO or AUTO:<n>')
    .argument('<count>', 'Number of transactions')
    .option('-o, --output <path>', 'Output file (default: generated_transactions.dat)')
    .option('--seed <n>', 'Random seed (default: 42)')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Print the dataset summary as JSON')
    .action((universe: string, count: string, options: GenerateCommandOptions) => {
      process.exitCode = handleGenerate(universe, count, options);
    });
}

export const generateCommand = createGenerateCommand();

export function handleGenerate(
  universeArg: string,
  countArg: string,
  options: GenerateCommandOptions
): number {
  try {
    const { config } = loadConfig(options.config);
    const count = parseIntegerArg(countArg, 'count');
    const seed = options.seed !== undefined ? parseIntegerArg(options.seed, 'seed') : config.generator.seed;
    const outputPath = resolve(options.output ?? config.generator.output);

    const universe = parseUniverseSource(universeArg);
    const result = generateToFile(universe, count, outputPath, { seed });
    const summary = summarizeDataset(result.dataset);

    if (options.json) {
      output.json({
        path: result.path,
        universe: { source: universe.source, size: universe.items.length },
        seed,
        ...summary,
        stats: result.stats,
      });
      return EXIT_CODES.SUCCESS;
    }

    output.success(chalk.green(`✓ Wrote ${summary.transactions} transactions to ${result.path}`));
    output.keyValue('  Universe', `${universe.source} (${universe.items.length} items)`);
    output.keyValue('  Seed', seed);
    output.keyValue('  Distinct items used', summary.distinctItems);
    output.keyValue('  Transaction length', `${summary.minLength}-${summary.maxLength} (mean ${summary.meanLength.toFixed(2)})`);
    if (result.stats.enumerated > 0) {
      output.info(chalk.gray(`  ${result.stats.enumerated} transactions filled by enumeration (universe nearly exhausted)`));
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportError(error);
  }
}
