import pino, { Logger as PinoLogger, LoggerOptions } from 'pino';

const IS_TEST_ENV =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

/**
 * Log levels supported by minebench.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Log level (default: 'warn') */
  level?: LogLevel;
  /** Output file path (default: stdout) */
  file?: string;
  /** Enable pretty printing for development */
  pretty?: boolean;
  /** Include timestamps in output */
  timestamp?: boolean;
  /** Component name for context */
  name?: string;
}

/**
 * Default level is 'warn' so sweep progress stays readable;
 * --log-level info shows one line per run.
 */
const DEFAULT_CONFIG: Required<Omit<LoggerConfig, 'file' | 'name'>> = {
  level: IS_TEST_ENV ? 'silent' : 'warn',
  pretty: false,
  timestamp: true,
};

let globalLogger: PinoLogger | null = null;

/**
 * Create a new logger instance.
 */
export function createLogger(config: LoggerConfig = {}): PinoLogger {
  const level = config.level ?? DEFAULT_CONFIG.level;
  const pretty = config.pretty ?? DEFAULT_CONFIG.pretty;
  const timestamp = config.timestamp ?? DEFAULT_CONFIG.timestamp;

  const options: LoggerOptions = {
    level,
    name: config.name,
    timestamp: timestamp ? pino.stdTimeFunctions.isoTime : false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  if (config.file) {
    return pino(options, pino.destination({ dest: config.file, sync: true }));
  }

  return pino(options);
}

/**
 * Get or create the global logger, optionally scoped to a component.
 *
 * Child loggers are created per call, so modules should call this lazily
 * (inside functions) to pick up a logger configured after import.
 */
export function getLogger(name?: string): PinoLogger {
  if (!globalLogger) {
    globalLogger = createLogger({ level: DEFAULT_CONFIG.level });
  }

  if (name) {
    return globalLogger.child({ component: name });
  }

  return globalLogger;
}

/**
 * Configure the global logger.
 */
export function configureLogger(config: LoggerConfig): void {
  globalLogger = createLogger(config);
}

/**
 * Reset the global logger (for testing).
 */
export function resetLogger(): void {
  globalLogger = null;
  savedLogLevel = null;
}

let savedLogLevel: string | null = null;

/**
 * Temporarily silence the global logger while a progress bar owns the terminal.
 */
export function suppressLogs(): void {
  if (globalLogger && savedLogLevel === null) {
    savedLogLevel = globalLogger.level;
    globalLogger.level = 'silent';
  }
}

/**
 * Restore the log level after suppression.
 */
export function restoreLogLevel(): void {
  if (globalLogger && savedLogLevel !== null) {
    globalLogger.level = savedLogLevel;
    savedLogLevel = null;
  }
}

export interface TimingResult {
  durationMs: number;
  log: () => void;
}

/**
 * Start a timing measurement on the monotonic clock.
 */
export function startTiming(logger: PinoLogger, operation: string): () => TimingResult {
  const startTime = performance.now();

  return () => {
    const durationMs = performance.now() - startTime;
    return {
      durationMs,
      log: () => {
        logger.debug({ operation, durationMs }, `${operation} completed`);
      },
    };
  };
}

/**
 * Narrow an arbitrary string (CLI flag, env var) to a LogLevel.
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export type { PinoLogger as Logger };
