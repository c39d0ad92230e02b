/**
 * Run outcome classification.
 *
 * All decisions about ok / empty / failed live here so the taxonomy can be
 * read and tested in one place.
 */

import { createReadStream } from 'fs';
import { createInterface } from 'readline';
import { NO_PATTERN_SIGNATURES } from '../constants.js';
import type { RunStatus } from '../results/table.js';

export interface RunOutcome {
  exitCode: number | null;
  signal?: NodeJS.Signals | null;
  timedOut: boolean;
  spawnError?: Error;
  /** Combined stdout/stderr */
  output: string;
  /** Result of scanning the full log when `output` holds only its tail */
  logHasNoPatternSignature?: boolean;
  /** Size of the output artifact in bytes, or null when it does not exist */
  outputSize: number | null;
  timeoutMs?: number;
}

export interface RunClassification {
  status: RunStatus;
  /** Why the run failed or was treated as empty */
  reason?: string;
}

/**
 * True when the log says no pattern met the threshold.
 */
export function matchesNoPatternSignature(log: string): boolean {
  const lower = log.toLowerCase();
  return NO_PATTERN_SIGNATURES.some((phrase) => lower.includes(phrase));
}

/**
 * Scan a whole run log line by line for a no-pattern phrase.
 */
export async function logHasNoPatternSignature(logPath: string): Promise<boolean> {
  const input = createReadStream(logPath);
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      if (matchesNoPatternSignature(line)) {
        return true;
      }
    }
    return false;
  } finally {
    lines.close();
    input.destroy();
  }
}

export function classifyRun(outcome: RunOutcome): RunClassification {
  if (outcome.spawnError) {
    return { status: 'failed', reason: `could not start: ${outcome.spawnError.message}` };
  }
  if (outcome.timedOut) {
    const limit = outcome.timeoutMs !== undefined ? ` after ${outcome.timeoutMs}ms` : '';
    return { status: 'failed', reason: `timed out${limit}` };
  }

  const benign = matchesNoPatternSignature(outcome.output) || outcome.logHasNoPatternSignature === true;

  if (outcome.exitCode !== 0) {
    if (benign) {
      return { status: 'empty', reason: 'no frequent patterns at this threshold' };
    }
    const how =
      outcome.exitCode === null
        ? `killed by signal ${outcome.signal ?? 'unknown'}`
        : `exited with code ${outcome.exitCode}`;
    return { status: 'failed', reason: how };
  }

  if (outcome.outputSize === null || outcome.outputSize === 0) {
    if (benign) {
      return { status: 'empty', reason: 'no frequent patterns at this threshold' };
    }
    return {
      status: 'failed',
      reason: outcome.outputSize === null ? 'output missing' : 'output empty',
    };
  }

  return { status: 'ok' };
}
