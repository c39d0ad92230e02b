/**
 * Algorithm specs, argument templates and threshold lists.
 */

import { basename, extname, resolve } from 'path';
import { ConfigValidationError } from '../errors/types.js';
import { SWEEP } from '../constants.js';

/**
 * One algorithm under test.
 *
 * `args` placeholders:
 * - {threshold}: support percentage as written (10, 2.5)
 * - {fraction}: threshold / 100
 * - {count}: absolute support, max(1, floor(records * threshold / 100))
 * - {dataset}, {output}: paths
 */
export interface AlgoSpec {
  /** Logical name, also the prefix of output and log files */
  name: string;
  executable: string;
  /** Argument template (default: -s{threshold} {dataset} {output}) */
  args?: readonly string[];
  /**
   * File the executable writes instead of {output} (e.g. "{dataset}.fp");
   * moved to the output path after each run.
   */
  artifact?: string;
}

export interface TemplateValues {
  threshold: number;
  dataset: string;
  output: string;
  /** Transactions or graphs in the dataset; required by {count} */
  records?: number;
}

const NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;
const PLACEHOLDER_PATTERN = /\{(threshold|fraction|count|dataset|output)\}/g;

export function absoluteSupport(records: number, threshold: number): number {
  return Math.max(1, Math.floor((records * threshold) / 100));
}

export function expandTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER_PATTERN, (_, key: string) => {
    switch (key) {
      case 'threshold':
        return String(values.threshold);
      case 'fraction':
        return String(values.threshold / 100);
      case 'count':
        if (values.records === undefined) {
          throw new ConfigValidationError([`{count} in "${template}" needs the dataset record count`]);
        }
        return String(absoluteSupport(values.records, values.threshold));
      case 'dataset':
        return values.dataset;
      default:
        return values.output;
    }
  });
}

export function expandArgs(spec: AlgoSpec, values: TemplateValues): string[] {
  return (spec.args ?? SWEEP.DEFAULT_ARGS).map((arg) => expandTemplate(arg, values));
}

export function usesRecordCount(spec: AlgoSpec): boolean {
  return [...(spec.args ?? []), spec.artifact ?? ''].some((t) => t.includes('{count}'));
}

/**
 * Records in a dataset file: graph headers ("t # ...") when present,
 * otherwise non-empty lines (transactions).
 */
export function countDatasetRecords(text: string): number {
  let lines = 0;
  let graphs = 0;
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === '') continue;
    lines++;
    if (/^t\s+#/.test(trimmed)) {
      graphs++;
    }
  }
  return graphs > 0 ? graphs : lines;
}

/**
 * Name an algorithm after its executable file ("./bin/fpgrowth" -> "fpgrowth").
 */
export function deriveAlgorithmName(executable: string): string {
  const base = basename(executable, extname(executable)) || basename(executable);
  const safe = base.replace(/[^A-Za-z0-9_.-]/g, '_');
  return safe || 'algorithm';
}

/**
 * One algorithm per executable path, with repeated names suffixed (-2, -3, ...).
 */
export function algorithmsFromExecutables(executables: readonly string[]): AlgoSpec[] {
  const used = new Map<string, number>();
  return executables.map((executable) => {
    const base = deriveAlgorithmName(executable);
    const seen = (used.get(base) ?? 0) + 1;
    used.set(base, seen);
    return { name: seen === 1 ? base : `${base}-${seen}`, executable };
  });
}

/**
 * True when an artifact template names the dataset itself. The runner deletes
 * the artifact path before each run.
 */
function artifactIsDataset(artifact: string, datasetPath: string): boolean {
  const expanded = expandTemplate(artifact, { threshold: 1, dataset: datasetPath, output: '', records: 1 });
  return expanded.trim() !== '' && resolve(expanded) === resolve(datasetPath);
}

export function validateAlgorithms(algorithms: readonly AlgoSpec[], datasetPath?: string): void {
  const errors: string[] = [];
  if (algorithms.length === 0) {
    errors.push('algorithms: at least one algorithm is required');
  }
  const names = new Set<string>();
  for (const [i, algo] of algorithms.entries()) {
    if (!NAME_PATTERN.test(algo.name)) {
      errors.push(`algorithms.${i}.name: "${algo.name}" may only contain letters, digits, "_", "." and "-"`);
    }
    if (names.has(algo.name)) {
      errors.push(`algorithms.${i}.name: duplicate name "${algo.name}"`);
    }
    names.add(algo.name);
    if (algo.executable.trim() === '') {
      errors.push(`algorithms.${i}.executable: must not be empty`);
    }
    if (algo.artifact !== undefined && datasetPath !== undefined && artifactIsDataset(algo.artifact, datasetPath)) {
      errors.push(`algorithms.${i}.artifact: "${algo.artifact}" is the dataset itself`);
    }
  }
  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
}

/**
 * Validate thresholds (0 < t <= 100, distinct) and sort them ascending.
 */
export function normalizeThresholds(thresholds: readonly number[]): number[] {
  const errors: string[] = [];
  if (thresholds.length === 0) {
    errors.push('thresholds: at least one threshold is required');
  }
  const seen = new Set<number>();
  for (const [i, t] of thresholds.entries()) {
    if (!Number.isFinite(t) || t <= 0 || t > 100) {
      errors.push(`thresholds.${i}: ${t} is not a percentage in (0, 100]`);
    } else if (seen.has(t)) {
      errors.push(`thresholds.${i}: duplicate threshold ${t}`);
    }
    seen.add(t);
  }
  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
  return [...thresholds].sort((a, b) => a - b);
}

/**
 * Parse a threshold list such as "5 10 25" (commas also accepted).
 */
export function parseThresholdList(text: string): number[] {
  const tokens = text.split(/[\s,]+/).filter((t) => t !== '');
  const errors: string[] = [];
  const values = tokens.map((token, i) => {
    const value = Number(token);
    if (!Number.isFinite(value)) {
      errors.push(`thresholds.${i}: "${token}" is not a number`);
    }
    return value;
  });
  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
  return values;
}
