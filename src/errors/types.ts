/**
 * Error types for minebench.
 *
 * Error hierarchy:
 * - MinebenchError (base)
 *   - GeneratorError (dataset generation)
 *   - SweepError (sweep preconditions and run failures)
 *   - ConfigError (configuration issues)
 *   - FormatError (malformed results tables and datasets)
 */

/**
 * Error severity levels.
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Error context for debugging.
 */
export interface ErrorContext {
  /** Operation that failed */
  operation?: string;
  /** Component where error occurred */
  component?: string;
  /** Algorithm name if applicable */
  algorithm?: string;
  /** Support threshold if applicable */
  threshold?: number;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

interface MinebenchErrorOptions {
  code: string;
  severity?: ErrorSeverity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all minebench errors.
 */
export class MinebenchError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Error severity */
  readonly severity: ErrorSeverity;
  /** Error context for debugging */
  readonly context: ErrorContext;
  /** Original error if this wraps another */
  readonly cause?: Error;

  constructor(message: string, options: MinebenchErrorOptions) {
    super(message);
    this.name = 'MinebenchError';
    this.code = options.code;
    this.severity = options.severity ?? 'medium';
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// =============================================================================
// Generator Errors
// =============================================================================

/**
 * Base class for dataset generation errors.
 */
export class GeneratorError extends MinebenchError {
  constructor(message: string, options: MinebenchErrorOptions) {
    super(message, options);
    this.name = 'GeneratorError';
  }
}

/**
 * The universe cannot supply the requested number of distinct transactions.
 */
export class InsufficientUniverseError extends GeneratorError {
  readonly universeSize: number;
  readonly requested: number;
  /** Number of distinct non-empty subsets (saturated at MAX_SAFE_INTEGER) */
  readonly capacity: number;

  constructor(universeSize: number, requested: number, capacity: number, context?: ErrorContext) {
    super(
      `Cannot generate ${requested} unique transactions from a universe of ${universeSize} items ` +
        `(at most ${capacity} distinct non-empty subsets)`,
      {
        code: 'GENERATOR_INSUFFICIENT_UNIVERSE',
        severity: 'high',
        context: {
          ...context,
          metadata: { ...context?.metadata, universeSize, requested, capacity },
        },
      }
    );
    this.name = 'InsufficientUniverseError';
    this.universeSize = universeSize;
    this.requested = requested;
    this.capacity = capacity;
  }
}

/**
 * The universe source yielded no items.
 */
export class EmptyUniverseError extends GeneratorError {
  readonly source: string;

  constructor(source: string, context?: ErrorContext) {
    super(`Item universe is empty: ${source}`, {
      code: 'GENERATOR_EMPTY_UNIVERSE',
      severity: 'high',
      context: { ...context, metadata: { ...context?.metadata, source } },
    });
    this.name = 'EmptyUniverseError';
    this.source = source;
  }
}

/**
 * Transaction count (or AUTO size) is not a usable integer.
 */
export class InvalidCountError extends GeneratorError {
  readonly value: string;

  constructor(value: string, reason: string, context?: ErrorContext) {
    super(`Invalid count "${value}": ${reason}`, {
      code: 'GENERATOR_INVALID_COUNT',
      severity: 'medium',
      context: { ...context, metadata: { ...context?.metadata, value } },
    });
    this.name = 'InvalidCountError';
    this.value = value;
  }
}

// =============================================================================
// Sweep Errors
// =============================================================================

/**
 * Base class for sweep errors.
 */
export class SweepError extends MinebenchError {
  constructor(message: string, options: MinebenchErrorOptions) {
    super(message, options);
    this.name = 'SweepError';
  }
}

/**
 * A mining executable is missing or not executable.
 */
export class MissingExecutableError extends SweepError {
  readonly path: string;
  readonly algorithm: string;
  /** 'not found', 'not a regular file' or 'permission denied' */
  readonly reason: string;

  constructor(algorithm: string, path: string, reason: string, context?: ErrorContext) {
    super(`Executable for ${algorithm} not found or not executable: ${path} (${reason})`, {
      code: 'SWEEP_MISSING_EXECUTABLE',
      severity: 'high',
      context: { ...context, algorithm, metadata: { ...context?.metadata, path, reason } },
    });
    this.name = 'MissingExecutableError';
    this.path = path;
    this.algorithm = algorithm;
    this.reason = reason;
  }
}

/**
 * The dataset file is missing.
 */
export class MissingDatasetError extends SweepError {
  readonly path: string;

  constructor(path: string, context?: ErrorContext) {
    super(`Dataset not found: ${path}`, {
      code: 'SWEEP_MISSING_DATASET',
      severity: 'high',
      context: { ...context, metadata: { ...context?.metadata, path } },
    });
    this.name = 'MissingDatasetError';
    this.path = path;
  }
}

/**
 * Minimal record shape carried by RunFailureError.
 * Kept structural to avoid a dependency cycle with the results module.
 */
export interface PartialRunRecord {
  readonly algorithm: string;
  readonly threshold: number;
  readonly status: 'ok' | 'empty' | 'failed';
  readonly runtimeSeconds: number;
  readonly outputRef: string;
}

/**
 * An invocation failed for a reason other than benign emptiness.
 * Fatal to the sweep.
 */
export class RunFailureError extends SweepError {
  readonly algorithm: string;
  readonly executable: string;
  readonly threshold: number;
  readonly logPath: string;
  readonly reason: string;
  /** Records gathered before the failure, including the failed one */
  readonly partialRecords: readonly PartialRunRecord[];

  constructor(options: {
    algorithm: string;
    executable: string;
    threshold: number;
    logPath: string;
    reason: string;
    partialRecords: readonly PartialRunRecord[];
    cause?: Error;
  }) {
    super(
      `${options.algorithm} (${options.executable}) failed at ${options.threshold}% support: ` +
        `${options.reason} (see ${options.logPath})`,
      {
        code: 'SWEEP_RUN_FAILED',
        severity: 'high',
        context: {
          algorithm: options.algorithm,
          threshold: options.threshold,
          metadata: { logPath: options.logPath, executable: options.executable },
        },
        cause: options.cause,
      }
    );
    this.name = 'RunFailureError';
    this.algorithm = options.algorithm;
    this.executable = options.executable;
    this.threshold = options.threshold;
    this.logPath = options.logPath;
    this.reason = options.reason;
    this.partialRecords = options.partialRecords;
  }
}

/**
 * The sweep was interrupted (e.g. SIGINT) while a run was in flight.
 */
export class SweepAbortedError extends SweepError {
  readonly partialRecords: readonly PartialRunRecord[];

  constructor(partialRecords: readonly PartialRunRecord[], context?: ErrorContext) {
    super('Sweep aborted', {
      code: 'SWEEP_ABORTED',
      severity: 'medium',
      context,
    });
    this.name = 'SweepAbortedError';
    this.partialRecords = partialRecords;
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Configuration-related error.
 */
export class ConfigError extends MinebenchError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, {
      code: 'CONFIG_ERROR',
      severity: 'high',
      context,
      cause,
    });
    this.name = 'ConfigError';
  }
}

/**
 * Configuration file not found.
 */
export class ConfigNotFoundError extends ConfigError {
  /** Path that was searched */
  readonly path: string;

  constructor(path: string, context?: ErrorContext) {
    super(`Configuration file not found: ${path}`, {
      ...context,
      metadata: { ...context?.metadata, path },
    });
    this.name = 'ConfigNotFoundError';
    this.path = path;
  }
}

/**
 * Configuration validation failed.
 */
export class ConfigValidationError extends ConfigError {
  /** Validation errors */
  readonly validationErrors: string[];

  constructor(errors: string[], context?: ErrorContext) {
    super(`Configuration validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`, {
      ...context,
      metadata: { ...context?.metadata, validationErrors: errors },
    });
    this.name = 'ConfigValidationError';
    this.validationErrors = errors;
  }
}

// =============================================================================
// Format Errors
// =============================================================================

/**
 * Base class for malformed file content.
 */
export class FormatError extends MinebenchError {
  /** 1-based line number where the problem was found */
  readonly line?: number;

  constructor(message: string, code: string, line?: number, context?: ErrorContext) {
    super(line !== undefined ? `${message} (line ${line})` : message, {
      code,
      severity: 'medium',
      context: { ...context, metadata: { ...context?.metadata, line } },
    });
    this.name = 'FormatError';
    this.line = line;
  }
}

/**
 * A results table could not be parsed.
 */
export class ResultsFormatError extends FormatError {
  constructor(message: string, line?: number) {
    super(message, 'RESULTS_FORMAT_INVALID', line);
    this.name = 'ResultsFormatError';
  }
}

/**
 * A dataset file could not be parsed.
 */
export class DatasetFormatError extends FormatError {
  constructor(message: string, line?: number) {
    super(message, 'DATASET_FORMAT_INVALID', line);
    this.name = 'DatasetFormatError';
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Extract error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

