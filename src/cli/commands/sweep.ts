/**
 * Sweep command - runs every algorithm at every support threshold and
 * writes the results table, a runtime plot and per-run outputs and logs.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { loadConfig, resolveThresholds } from '../../config/loader.js';
import { runSweep, algorithmsFromExecutables, type AlgoSpec, type SweepProgress } from '../../sweep/index.js';
import { pivotRuntimes, writeResults, type ResultsTable, type RuntimePivot } from '../../results/index.js';
import { formatSummaryTable, renderRuntimePlot } from '../../report/index.js';
import { RunFailureError, SweepAbortedError, type PartialRunRecord } from '../../errors/types.js';
import { getLogger } from '../../logging/logger.js';
import { EXIT_CODES, SWEEP } from '../../constants.js';
import * as output from '../output.js';
import { SweepProgressBar } from '../utils/progress.js';
import { reportError } from '../utils/error-hints.js';
import { parseIntegerArg } from './generate.js';

export interface SweepCommandOptions {
  config?: string;
  thresholds?: string;
  timeout?: string;
  plot?: boolean;
  json?: boolean;
}

/**
 * Split positional arguments into executables, dataset and output directory.
 * The last two are always the dataset and the output directory.
 */
export function splitSweepArgs(args: readonly string[]): {
  executables: string[];
  dataset: string;
  outputDir: string;
} | null {
  if (args.length < 2) {
    return null;
  }
  return {
    executables: args.slice(0, -2),
    dataset: args[args.length - 2],
    outputDir: args[args.length - 1],
  };
}

/**
 * Create a new sweep command instance.
 * Useful for testing where fresh command instances are needed.
 */
export function createSweepCommand(): Command {
  return new Command('sweep')
    .description('Run each mining executable across support thresholds and record runtimes')
    .argument('<paths...>', 'Executables (optional when configured), then <dataset> <output-dir>')
    .option('-c, --config <path>', 'Path to config file')
    .option('-t, --thresholds <list>', `Support thresholds in percent, e.g. "5 10 25" (overrides ${SWEEP.THRESHOLDS_ENV_VAR})`)
    .option('--timeout <ms>', 'Per-run timeout in milliseconds (0 = none)')
    .option('--no-plot', 'Skip rendering plot.svg')
    .option('--json', 'Print the results table as JSON')
    .action(async (paths: string[], options: SweepCommandOptions) => {
      process.exitCode = await handleSweep(paths, options);
    });
}

export const sweepCommand = createSweepCommand();

function writePartialResults(outputDir: string, records: readonly PartialRunRecord[]): string | null {
  if (records.length === 0) {
    return null;
  }
  const path = join(outputDir, SWEEP.PARTIAL_RESULTS_FILENAME);
  writeResults(path, records);
  return path;
}

export async function handleSweep(paths: readonly string[], options: SweepCommandOptions): Promise<number> {
  const logger = getLogger('cli');
  const split = splitSweepArgs(paths);
  if (!split) {
    output.error('Usage: minebench sweep [executables...] <dataset> <output-dir>');
    return EXIT_CODES.ERROR;
  }

  const controller = new AbortController();
  const interrupt: { signal: NodeJS.Signals | null } = { signal: null };
  const onSignal = (signal: NodeJS.Signals): void => {
    interrupt.signal = signal;
    logger.warn({ signal }, 'Interrupt received, stopping sweep');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const progressBar = new SweepProgressBar({ enabled: !options.json && !output.isQuiet() });

  try {
    const { config } = loadConfig(options.config);
    const thresholds = resolveThresholds(config, { cli: options.thresholds });
    const timeoutMs = options.timeout !== undefined ? parseIntegerArg(options.timeout, 'timeout') : config.sweep.timeout;
    const algorithms: AlgoSpec[] =
      split.executables.length > 0 ? algorithmsFromExecutables(split.executables) : config.sweep.algorithms;

    if (!options.json) {
      output.info(chalk.bold(`Sweeping ${algorithms.length} algorithm(s) over ${thresholds.join(', ')}% support`));
      output.info(chalk.gray(`Dataset: ${split.dataset}`));
    }

    const onProgress = (progress: SweepProgress): void => {
      if (progress.phase === 'starting') {
        progressBar.start(progress.total);
        return;
      }
      progressBar.update(progress);
      if (progress.record && !options.json) {
        const { algorithm, threshold, status, runtimeSeconds } = progress.record;
        const line = output.formatRunLine(algorithm, threshold, status, runtimeSeconds);
        if (progressBar.isEnabled()) {
          progressBar.log(line);
        } else {
          output.info(line);
        }
      }
    };

    const result = await runSweep({
      datasetPath: split.dataset,
      thresholds,
      algorithms,
      outputDir: split.outputDir,
      timeoutMs,
      signal: controller.signal,
      onProgress,
    });
    progressBar.stop();

    const resultsPath = join(result.outputDir, SWEEP.RESULTS_FILENAME);
    writeResults(resultsPath, result.table);

    const pivot = pivotRuntimes(result.table);
    const plot = options.plot !== false && config.sweep.plot;
    const plotPath = plot ? join(result.outputDir, SWEEP.PLOT_FILENAME) : null;
    if (plotPath) {
      writeFileSync(plotPath, renderRuntimePlot(pivot), 'utf-8');
    }

    if (options.json) {
      output.json({ outputDir: result.outputDir, thresholds: result.thresholds, results: result.table, plot: plotPath });
      return EXIT_CODES.SUCCESS;
    }

    printSummary(result.table, pivot, resultsPath, plotPath);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    progressBar.stop();
    if (error instanceof RunFailureError || error instanceof SweepAbortedError) {
      const partialPath = writePartialResults(split.outputDir, error.partialRecords);
      if (partialPath) {
        output.warn(chalk.yellow(`Partial results written to ${partialPath}`));
      }
    }
    const code = reportError(error);
    if (error instanceof SweepAbortedError && interrupt.signal === 'SIGTERM') {
      return EXIT_CODES.TERMINATED;
    }
    return code;
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}

function printSummary(table: ResultsTable, pivot: RuntimePivot, resultsPath: string, plotPath: string | null): void {
  const empty = table.filter((record) => record.status === 'empty').length;

  output.newline();
  output.data(formatSummaryTable(pivot));
  output.newline();
  output.success(chalk.green(`✓ ${table.length} runs complete`) + (empty > 0 ? chalk.gray(` (${empty} without frequent patterns)`) : ''));
  output.info(chalk.gray(`Results: ${resultsPath}`));
  if (plotPath) {
    output.info(chalk.gray(`Plot: ${plotPath}`));
  }
}
