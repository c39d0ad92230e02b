/**
 * Init command - creates a minebench.yaml configuration file.
 *
 * The generated config lists every option with comments.
 */

import { Command } from 'commander';
import { writeFileSync, existsSync } from 'fs';
import { join } from 'path';
import { generateDefaultConfig } from '../../config/loader.js';
import { EXIT_CODES, PATHS } from '../../constants.js';
import * as output from '../output.js';

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create a minebench.yaml configuration file')
    .option('-f, --force', 'Overwrite existing config file')
    .action((options: { force?: boolean }) => {
      process.exitCode = handleInit(process.cwd(), options);
    });
}

export const initCommand = createInitCommand();

export function handleInit(cwd: string, options: { force?: boolean } = {}): number {
  const configPath = join(cwd, PATHS.DEFAULT_CONFIG_FILENAME);

  if (existsSync(configPath) && !options.force) {
    output.error(`Config file already exists: ${configPath}`);
    output.error('Use --force to overwrite.');
    return EXIT_CODES.ERROR;
  }

  writeFileSync(configPath, generateDefaultConfig());

  output.success(`Created: ${configPath}`);
  output.newline();
  output.info('Next steps:');
  output.info('  1. Generate a dataset:');
  output.info('     minebench generate AUTO:50 1000');
  output.info('  2. List your mining executables under sweep.algorithms, or pass them directly:');
  output.info('     minebench sweep ./bin/apriori ./bin/fpgrowth generated_transactions.dat results/');
  return EXIT_CODES.SUCCESS;
}
