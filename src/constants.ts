/**
 * Centralized constants for the minebench CLI.
 */

// ==================== Timeouts ====================

export const TIMEOUTS = {
  /** Grace period between SIGTERM and SIGKILL when stopping a child (5 seconds) */
  SHUTDOWN_KILL: 5000,
  /** Default per-invocation timeout; 0 disables it */
  RUN_DEFAULT: 0,
} as const;

// ==================== Sweep ====================

export const SWEEP = {
  /** Support thresholds (percent) used when nothing overrides them */
  DEFAULT_THRESHOLDS: [5, 10, 25, 50, 90] as readonly number[],
  /** Environment variable holding a whitespace-separated threshold list */
  THRESHOLDS_ENV_VAR: 'MINEBENCH_THRESHOLDS',
  /** Mining executable contract: <executable> -s<threshold> <dataset> <output> */
  DEFAULT_ARGS: ['-s{threshold}', '{dataset}', '{output}'] as readonly string[],
  /** Bytes of combined child output kept in memory for classification */
  MAX_CAPTURED_OUTPUT: 1024 * 1024,
  /** Results table file name inside the output directory */
  RESULTS_FILENAME: 'results.csv',
  /** Written when a sweep stops early */
  PARTIAL_RESULTS_FILENAME: 'results.partial.csv',
  /** Rendered plot file name inside the output directory */
  PLOT_FILENAME: 'plot.svg',
  /** Joins algorithm name and threshold in run file names (apriori_s25) */
  RUN_SEPARATOR: '_s',
  /** Log file suffix appended to each run's output path */
  LOG_SUFFIX: '.log',
} as const;

/**
 * Phrases that mining executables print when no pattern meets the threshold.
 * Matched case-insensitively as substrings of the run log.
 */
export const NO_PATTERN_SIGNATURES: readonly string[] = [
  'no (frequent) items found',
  'no frequent items found',
  'no frequent patterns found',
];

// ==================== Generator ====================

export const GENERATOR = {
  /** Default PRNG seed, so repeated runs produce the same dataset */
  DEFAULT_SEED: 42,
  /** Universe size for a bare AUTO directive */
  AUTO_DEFAULT_SIZE: 100,
  /** Prefix of synthesized item identifiers (I1..In) */
  AUTO_ITEM_PREFIX: 'I',
  /** Default dataset file name */
  DEFAULT_OUTPUT: 'generated_transactions.dat',
  /** Transaction sizes are drawn from [1, min(|U|, MAX_TRANSACTION_SIZE)] */
  MAX_TRANSACTION_SIZE: 20,
  /** Consecutive duplicate samples tolerated before switching to enumeration */
  MAX_CONSECUTIVE_REJECTIONS: 64,
  /** Exponent of the Zipf-like item weights */
  ZIPF_ALPHA: 1.1,
  /** Size bands: [probability, lower fraction of cap, upper fraction of cap] */
  SIZE_BANDS: [
    { probability: 0.1, from: 0, to: 0.25 },
    { probability: 0.6, from: 0.25, to: 0.6 },
    { probability: 0.3, from: 0.6, to: 1 },
  ] as readonly { probability: number; from: number; to: number }[],
  /** Co-occurrence clusters: count is clamp(|U| / 5, MIN, MAX) */
  MIN_CLUSTERS: 3,
  MAX_CLUSTERS: 10,
  MIN_CLUSTER_SIZE: 3,
  MAX_CLUSTER_SIZE: 12,
  /** Universes smaller than this get no clusters */
  MIN_UNIVERSE_FOR_CLUSTERS: 4,
} as const;

// ==================== Paths ====================

export const PATHS = {
  /** Config file names searched in the working directory, in order */
  CONFIG_FILENAMES: ['minebench.yaml', 'minebench.yml', '.minebench.yaml', '.minebench.yml'] as readonly string[],
  DEFAULT_CONFIG_FILENAME: 'minebench.yaml',
} as const;

// ==================== Converter ====================

export const CONVERTER = {
  GSPAN_FILENAME: 'gspan.txt',
  GASTON_FILENAME: 'gaston.txt',
  FSG_FILENAME: 'fsg.txt',
  NODE_LABELS_FILENAME: 'node_labels.txt',
} as const;

// ==================== Exit Codes ====================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  /** 128 + SIGINT */
  INTERRUPTED: 130,
  /** 128 + SIGTERM */
  TERMINATED: 143,
} as const;
