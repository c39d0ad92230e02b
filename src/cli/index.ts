#!/usr/bin/env node

import { config } from 'dotenv';

// Project .env (MINEBENCH_THRESHOLDS and friends)
config({ quiet: true });

import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { sweepCommand } from './commands/sweep.js';
import { convertCommand } from './commands/convert.js';
import { initCommand } from './commands/init.js';
import { configureLogger, isLogLevel, type LoggerConfig } from '../logging/logger.js';
import { loadConfig } from '../config/loader.js';
import * as output from './output.js';
import { getErrorMessage } from '../errors/types.js';
import { VERSION } from '../version.js';
import { EXIT_CODES } from '../constants.js';

const program = new Command();

const examples = `
Examples:

  Generate 1000 unique transactions over items I1..I50:
    $ minebench generate AUTO:50 1000 -o data.dat

  Sweep two miners over the default thresholds (5 10 25 50 90):
    $ minebench sweep ./bin/apriori ./bin/fpgrowth data.dat results/

  Custom thresholds and a per-run timeout:
    $ minebench sweep ./bin/eclat data.dat results/ --thresholds "10 25" --timeout 60000

  Convert a labeled graph dataset for gSpan, Gaston and FSG:
    $ minebench convert graphs.txt converted/
`;

/**
 * Logging settings: --log-level/--log-file override the config file's logging section.
 */
function resolveLoggerConfig(opts: { logLevel?: string; logFile?: string; config?: string }): LoggerConfig | null {
  let fromFile: LoggerConfig = {};
  try {
    const { config: loaded, path } = loadConfig(opts.config);
    if (path) {
      fromFile = loaded.logging;
    }
  } catch (error) {
    // The command reports config errors itself
    output.warn(`Ignoring logging config: ${getErrorMessage(error)}`);
  }

  if (opts.logLevel !== undefined && !isLogLevel(opts.logLevel)) {
    output.error(`Invalid log level: ${opts.logLevel} (expected debug, info, warn, error or silent)`);
    process.exit(EXIT_CODES.ERROR);
  }

  if (!opts.logLevel && !opts.logFile && Object.keys(fromFile).length === 0) {
    return null;
  }
  return {
    ...fromFile,
    ...(opts.logLevel && isLogLevel(opts.logLevel) ? { level: opts.logLevel } : {}),
    ...(opts.logFile ? { file: opts.logFile } : {}),
  };
}

program
  .name('minebench')
  .description(`Benchmark frequent-pattern mining executables.

Commands:
  generate - Synthetic dataset of unique random transactions
  sweep    - Run miners across support thresholds, record runtimes, plot them
  convert  - Labeled graph dataset to gSpan/Gaston/FSG inputs
  init     - Create minebench.yaml

For more information on a specific command, use:
  minebench <command> --help`)
  .version(VERSION)
  .option('--log-level <level>', 'Log level: debug, info, warn, error, silent')
  .option('--log-file <path>', 'Write logs to file instead of stdout')
  .option('-q, --quiet', 'Only print warnings, errors and requested data')
  .hook('preAction', (thisCommand, actionCommand) => {
    const globalOpts = thisCommand.opts<{ logLevel?: string; logFile?: string; quiet?: boolean }>();
    const commandOpts = actionCommand.opts<{ config?: string }>();

    if (globalOpts.quiet) {
      output.configureOutput({ quiet: true });
    }

    const loggerConfig = resolveLoggerConfig({ ...globalOpts, config: commandOpts.config });
    if (loggerConfig) {
      configureLogger(loggerConfig);
    }
  })
  .addHelpText('after', examples);

program.addCommand(generateCommand);
program.addCommand(sweepCommand);
program.addCommand(convertCommand);
program.addCommand(initCommand);

program.configureHelp({
  sortSubcommands: false,
  subcommandTerm: (cmd) => cmd.name() + ' ' + cmd.usage(),
});

program.parseAsync().catch((error: unknown) => {
  output.error(getErrorMessage(error));
  process.exit(EXIT_CODES.ERROR);
});
