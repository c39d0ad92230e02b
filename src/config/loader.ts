import { readFileSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigNotFoundError, ConfigValidationError } from '../errors/types.js';
import { SWEEP } from '../constants.js';
import { normalizeThresholds, parseThresholdList } from '../sweep/algorithm.js';
import { findConfigFile, validateConfig, type MinebenchConfig } from './validator.js';

export interface LoadedConfig {
  config: MinebenchConfig;
  /** File the config came from, or null when defaults were used */
  path: string | null;
}

/**
 * Load configuration from an explicit path, or the first config file in the
 * working directory, or defaults when there is none.
 */
export function loadConfig(explicitPath?: string, cwd: string = process.cwd()): LoadedConfig {
  const path = findConfigFile(explicitPath ? resolve(cwd, explicitPath) : undefined, cwd);
  if (explicitPath && !path) {
    throw new ConfigNotFoundError(resolve(cwd, explicitPath));
  }
  if (!path) {
    return { config: validateConfig({}), path: null };
  }
  return { config: loadConfigFile(path), path };
}

/**
 * Load and parse a specific config file.
 * Relative algorithm executables are resolved against the file's directory.
 */
export function loadConfigFile(path: string): MinebenchConfig {
  const content = readFileSync(path, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigValidationError(
      [`Invalid YAML in ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`],
      { component: 'config', metadata: { filePath: path } }
    );
  }

  const config = validateConfig(parsed ?? {}, path);
  const baseDir = dirname(path);
  return {
    ...config,
    sweep: {
      ...config.sweep,
      algorithms: config.sweep.algorithms.map((algo) => ({
        ...algo,
        executable: isAbsolute(algo.executable) ? algo.executable : resolve(baseDir, algo.executable),
      })),
    },
  };
}

export interface ThresholdSources {
  /** --thresholds flag value */
  cli?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Effective sweep thresholds: CLI flag, then MINEBENCH_THRESHOLDS, then config.
 * Returned sorted ascending.
 */
export function resolveThresholds(config: MinebenchConfig, sources: ThresholdSources = {}): number[] {
  if (sources.cli !== undefined && sources.cli.trim() !== '') {
    return normalizeThresholds(parseThresholdList(sources.cli));
  }
  const fromEnv = (sources.env ?? process.env)[SWEEP.THRESHOLDS_ENV_VAR];
  if (fromEnv !== undefined && fromEnv.trim() !== '') {
    return normalizeThresholds(parseThresholdList(fromEnv));
  }
  return normalizeThresholds(config.sweep.thresholds);
}

/**
 * Generate default config file content.
 */
export function generateDefaultConfig(): string {
  return `# minebench configuration

# Dataset generation (minebench generate)
generator:
  # Universe: inline items ("A B C"), a file of items, AUTO (I1..I100) or AUTO:<n>
  universe: AUTO
  # count: 1000
  seed: 42
  output: generated_transactions.dat

# Threshold sweep (minebench sweep)
sweep:
  # Support thresholds in percent; ${SWEEP.THRESHOLDS_ENV_VAR}="10 25" overrides
  thresholds: [${SWEEP.DEFAULT_THRESHOLDS.join(', ')}]
  # Per-run timeout in milliseconds (0 = none)
  timeout: 0
  plot: true

  # Algorithms may also be passed on the command line as executable paths.
  # algorithms:
  #   - name: apriori
  #     executable: ./bin/apriori
  #   - name: gspan
  #     executable: ./bin/gSpan
  #     args: ["-f", "{dataset}", "-s", "{fraction}", "-o"]
  #     artifact: "{dataset}.fp"
  #   - name: gaston
  #     executable: ./bin/gaston
  #     args: ["{count}", "{dataset}", "{output}"]

logging:
  level: warn
`;
}
