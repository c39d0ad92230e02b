/**
 * Results table: the ordered run records of one sweep, and its CSV form.
 *
 * The CSV form is the only interface to the rendering step:
 *
 *   algorithm,threshold,status,runtime_seconds,output_ref
 *   apriori,10,ok,0.0123,out/apriori10
 *
 * Numbers are written with String(n), which Number() reads back exactly.
 * Fields are quoted only when they contain a comma, a quote or a line break.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { ResultsFormatError } from '../errors/types.js';

export const RUN_STATUSES = ['ok', 'empty', 'failed'] as const;

/**
 * ok: patterns found; empty: no pattern meets the threshold (not an error);
 * failed: anything else.
 */
export type RunStatus = (typeof RUN_STATUSES)[number];

export interface RunRecord {
  readonly algorithm: string;
  /** Support threshold in percent */
  readonly threshold: number;
  readonly status: RunStatus;
  /** Monotonic wall-clock duration of the invocation */
  readonly runtimeSeconds: number;
  /** Path of the run's output artifact */
  readonly outputRef: string;
}

export type ResultsTable = readonly RunRecord[];

export const RESULTS_COLUMNS = [
  'algorithm',
  'threshold',
  'status',
  'runtime_seconds',
  'output_ref',
] as const;

export const runRecordSchema = z.object({
  algorithm: z.string().min(1),
  threshold: z.number().finite().positive(),
  status: z.enum(RUN_STATUSES),
  runtimeSeconds: z.number().finite().nonnegative(),
  outputRef: z.string(),
});

/**
 * Validate and freeze a run record.
 */
export function createRunRecord(fields: RunRecord): RunRecord {
  return Object.freeze(runRecordSchema.parse(fields));
}

// ==================== Serialization ====================

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function serialize(table: ResultsTable): string {
  const rows = [RESULTS_COLUMNS.join(',')];
  for (const record of table) {
    rows.push(
      [
        escapeField(record.algorithm),
        String(record.threshold),
        record.status,
        String(record.runtimeSeconds),
        escapeField(record.outputRef),
      ].join(',')
    );
  }
  return `${rows.join('\n')}\n`;
}

interface CsvRow {
  fields: string[];
  /** 1-based line the row starts on */
  line: number;
}

function parseCsv(text: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let afterQuote = false;
  let line = 1;
  let rowLine = 1;

  const endRow = (): void => {
    fields.push(field);
    rows.push({ fields, line: rowLine });
    fields = [];
    field = '';
    afterQuote = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
          afterQuote = true;
        }
      } else {
        if (ch === '\n') {
          line++;
        }
        field += ch;
      }
      continue;
    }

    if (ch === ',') {
      fields.push(field);
      field = '';
      afterQuote = false;
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') {
        i++;
      }
      endRow();
      line++;
      rowLine = line;
    } else if (afterQuote) {
      throw new ResultsFormatError(`Unexpected character ${JSON.stringify(ch)} after closing quote`, line);
    } else if (ch === '"' && field === '') {
      inQuotes = true;
    } else {
      field += ch;
    }
  }

  if (inQuotes) {
    throw new ResultsFormatError('Unterminated quoted field', rowLine);
  }
  if (field !== '' || fields.length > 0 || afterQuote) {
    endRow();
  }
  return rows;
}

function parseNumber(text: string, column: string, line: number): number {
  const value = Number(text);
  if (text.trim() === '' || !Number.isFinite(value)) {
    throw new ResultsFormatError(`Column ${column} is not a number: ${JSON.stringify(text)}`, line);
  }
  return value;
}

export function deserialize(text: string): ResultsTable {
  const rows = parseCsv(text).filter((row) => !(row.fields.length === 1 && row.fields[0] === ''));
  const header = rows.shift();
  if (!header || header.fields.join(',') !== RESULTS_COLUMNS.join(',')) {
    throw new ResultsFormatError(`Expected header "${RESULTS_COLUMNS.join(',')}"`, header?.line ?? 1);
  }

  return rows.map(({ fields, line }) => {
    if (fields.length !== RESULTS_COLUMNS.length) {
      throw new ResultsFormatError(
        `Expected ${RESULTS_COLUMNS.length} fields, found ${fields.length}`,
        line
      );
    }
    const [algorithm, threshold, status, runtime, outputRef] = fields;
    const result = runRecordSchema.safeParse({
      algorithm,
      threshold: parseNumber(threshold, 'threshold', line),
      status,
      runtimeSeconds: parseNumber(runtime, 'runtime_seconds', line),
      outputRef,
    });
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ResultsFormatError(`Invalid record: ${issues.join('; ')}`, line);
    }
    return Object.freeze(result.data);
  });
}

export function writeResults(path: string, table: ResultsTable): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, serialize(table), 'utf-8');
}

export function readResults(path: string): ResultsTable {
  return deserialize(readFileSync(path, 'utf-8'));
}

// ==================== Pivot ====================

export interface RuntimeSeries {
  algorithm: string;
  /** Runtime per threshold, aligned with RuntimePivot.thresholds; null when not run */
  runtimes: (number | null)[];
  statuses: (RunStatus | null)[];
}

export interface RuntimePivot {
  /** Distinct thresholds, ascending */
  thresholds: number[];
  /** One series per algorithm, in first-appearance order */
  series: RuntimeSeries[];
}

/**
 * Wide form of a results table: one runtime series per algorithm.
 */
export function pivotRuntimes(table: ResultsTable): RuntimePivot {
  const thresholds = [...new Set(table.map((r) => r.threshold))].sort((a, b) => a - b);
  const byAlgorithm = new Map<string, RuntimeSeries>();

  for (const record of table) {
    let series = byAlgorithm.get(record.algorithm);
    if (!series) {
      series = {
        algorithm: record.algorithm,
        runtimes: thresholds.map(() => null),
        statuses: thresholds.map(() => null),
      };
      byAlgorithm.set(record.algorithm, series);
    }
    const at = thresholds.indexOf(record.threshold);
    series.runtimes[at] = record.runtimeSeconds;
    series.statuses[at] = record.status;
  }

  return { thresholds, series: [...byAlgorithm.values()] };
}
