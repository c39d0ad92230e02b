/**
 * minebench - benchmark harness for frequent-pattern mining executables
 *
 * @packageDocumentation
 */

// Item universe
export {
  tokenizeItems,
  createUniverse,
  autoUniverse,
  parseUniverseSource,
  subsetCapacity,
  type ItemUniverse,
  type ParseUniverseOptions,
} from './universe/universe.js';

// Dataset generation
export * from './generator/index.js';

// Sweep
export * from './sweep/index.js';

// Results table
export * from './results/index.js';

// Reports
export * from './report/index.js';

// Graph conversion
export * from './convert/index.js';

// Configuration
export { loadConfig, loadConfigFile, resolveThresholds, generateDefaultConfig, type LoadedConfig, type ThresholdSources } from './config/loader.js';
export { validateConfig, findConfigFile, minebenchConfigSchema, type MinebenchConfig, type AlgorithmConfig } from './config/validator.js';

// Errors
export * from './errors/types.js';

// Logging
export {
  createLogger,
  getLogger,
  configureLogger,
  resetLogger,
  type LogLevel,
  type LoggerConfig,
  type Logger,
} from './logging/logger.js';

export { VERSION, PACKAGE_NAME } from './version.js';
