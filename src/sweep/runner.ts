/**
 * Sweep runner: every algorithm at every threshold, one run at a time.
 *
 * Algorithms run in declared order, thresholds ascending within each
 * algorithm. A benign-empty run becomes a record; any other failure aborts
 * the sweep with RunFailureError carrying the records gathered so far.
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { RunFailureError, SweepAbortedError } from '../errors/types.js';
import { SWEEP, TIMEOUTS } from '../constants.js';
import { getLogger } from '../logging/logger.js';
import { createRunRecord, type ResultsTable, type RunRecord } from '../results/table.js';
import {
  countDatasetRecords,
  expandArgs,
  expandTemplate,
  normalizeThresholds,
  usesRecordCount,
  validateAlgorithms,
  type AlgoSpec,
} from './algorithm.js';
import { SpawnChildRunner, type ChildRunner } from './child-runner.js';
import { classifyRun, logHasNoPatternSignature } from './classify.js';
import { checkDataset, checkExecutable } from './preflight.js';

export interface SweepProgress {
  phase: 'starting' | 'running' | 'completed';
  /** Runs finished so far */
  completed: number;
  /** algorithms x thresholds */
  total: number;
  algorithm?: string;
  threshold?: number;
  /** Present once a run has been classified */
  record?: RunRecord;
}

export interface SweepOptions {
  datasetPath: string;
  /** Support thresholds in percent; sorted ascending before running */
  thresholds: readonly number[];
  algorithms: readonly AlgoSpec[];
  /** Receives <name>_s<threshold> outputs and <name>_s<threshold>.log logs */
  outputDir: string;
  /** Per-invocation timeout in ms; 0 or undefined disables it */
  timeoutMs?: number;
  childRunner?: ChildRunner;
  /** Aborting terminates the in-flight run and rejects with SweepAbortedError */
  signal?: AbortSignal;
  onProgress?: (progress: SweepProgress) => void;
}

export interface SweepResult {
  table: ResultsTable;
  outputDir: string;
  thresholds: number[];
}

/**
 * Output and log paths of one run. The threshold never contains the
 * separator, so no two (algorithm, threshold) pairs share a path.
 */
export function runPaths(outputDir: string, algorithm: string, threshold: number): { output: string; log: string } {
  const output = join(outputDir, `${algorithm}${SWEEP.RUN_SEPARATOR}${threshold}`);
  return { output, log: `${output}${SWEEP.LOG_SUFFIX}` };
}

export async function runSweep(options: SweepOptions): Promise<SweepResult> {
  const logger = getLogger('sweep');
  const thresholds = normalizeThresholds(options.thresholds);
  const datasetPath = resolve(options.datasetPath);
  validateAlgorithms(options.algorithms, datasetPath);
  // Spawn by path, never by PATH lookup
  const algorithms = options.algorithms.map((algo) => ({ ...algo, executable: resolve(algo.executable) }));

  checkDataset(datasetPath);
  for (const algo of algorithms) {
    checkExecutable(algo);
  }

  const outputDir = resolve(options.outputDir);
  mkdirSync(outputDir, { recursive: true });

  const records = algorithms.some(usesRecordCount)
    ? countDatasetRecords(readFileSync(datasetPath, 'utf-8'))
    : undefined;

  const runner = options.childRunner ?? new SpawnChildRunner();
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.RUN_DEFAULT;
  const total = thresholds.length * algorithms.length;
  const table: RunRecord[] = [];

  logger.info({ datasetPath, thresholds, algorithms: algorithms.map((a) => a.name) }, 'Starting sweep');
  options.onProgress?.({ phase: 'starting', completed: 0, total });

  for (const algo of algorithms) {
    for (const threshold of thresholds) {
      if (options.signal?.aborted) {
        throw new SweepAbortedError([...table], { algorithm: algo.name, threshold });
      }

      const paths = runPaths(outputDir, algo.name, threshold);
      const values = { threshold, dataset: datasetPath, output: paths.output, records };
      const args = expandArgs(algo, values);
      const artifact = algo.artifact ? expandTemplate(algo.artifact, values) : undefined;

      // A stale artifact from an earlier sweep must not pass for this run's output
      rmSync(paths.output, { force: true });
      if (artifact) {
        rmSync(artifact, { force: true });
      }

      options.onProgress?.({ phase: 'running', completed: table.length, total, algorithm: algo.name, threshold });
      logger.debug({ algorithm: algo.name, threshold, args }, 'Invoking');

      const started = performance.now();
      const result = await runner.run(algo.executable, args, {
        logPath: paths.log,
        timeoutMs,
        signal: options.signal,
      });
      const runtimeSeconds = (performance.now() - started) / 1000;

      if (result.aborted) {
        throw new SweepAbortedError([...table], { algorithm: algo.name, threshold });
      }

      if (artifact && existsSync(artifact)) {
        copyFileSync(artifact, paths.output);
        rmSync(artifact, { force: true });
      }

      const outputSize = existsSync(paths.output) ? statSync(paths.output).size : null;
      let classification = classifyRun({ ...result, outputSize, timeoutMs });
      // The phrase may sit in the part of the log that fell out of the tail
      if (classification.status === 'failed' && result.outputTruncated && existsSync(paths.log)) {
        classification = classifyRun({
          ...result,
          outputSize,
          timeoutMs,
          logHasNoPatternSignature: await logHasNoPatternSignature(paths.log),
        });
      }

      if (classification.status === 'empty') {
        writeFileSync(paths.output, '');
        logger.warn({ algorithm: algo.name, threshold }, 'No frequent patterns, continuing');
      }

      const record = createRunRecord({
        algorithm: algo.name,
        threshold,
        status: classification.status,
        runtimeSeconds,
        outputRef: paths.output,
      });
      table.push(record);
      options.onProgress?.({
        phase: 'running',
        completed: table.length,
        total,
        algorithm: algo.name,
        threshold,
        record,
      });

      if (classification.status === 'failed') {
        logger.error(
          { algorithm: algo.name, threshold, reason: classification.reason, log: paths.log },
          'Run failed, aborting sweep'
        );
        throw new RunFailureError({
          algorithm: algo.name,
          executable: algo.executable,
          threshold,
          logPath: paths.log,
          reason: classification.reason ?? 'failed',
          partialRecords: [...table],
          cause: result.spawnError,
        });
      }

      logger.info({ algorithm: algo.name, threshold, status: record.status, runtimeSeconds }, 'Run complete');
    }
  }

  options.onProgress?.({ phase: 'completed', completed: table.length, total });
  return { table, outputDir, thresholds };
}
