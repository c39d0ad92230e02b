/**
 * Configuration validation using Zod schemas.
 */

import { z } from 'zod';
import { existsSync } from 'fs';
import { join } from 'path';
import { ConfigValidationError } from '../errors/types.js';
import { GENERATOR, PATHS, SWEEP, TIMEOUTS } from '../constants.js';

/**
 * One algorithm under test.
 */
export const algorithmConfigSchema = z.object({
  /** Logical name; prefix of output and log files */
  name: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'may only contain letters, digits, "_", "." and "-"'),
  /** Path to the executable (relative paths resolve against the config file) */
  executable: z.string().min(1),
  /** Argument template with {threshold}, {fraction}, {count}, {dataset}, {output} */
  args: z.array(z.string()).optional(),
  /** File the executable writes instead of {output} */
  artifact: z.string().optional(),
});

/**
 * Dataset generation defaults.
 */
export const generatorConfigSchema = z.object({
  seed: z.number().int().default(GENERATOR.DEFAULT_SEED),
  universe: z.string().min(1).default('AUTO'),
  count: z.number().int().min(0).optional(),
  output: z.string().min(1).default(GENERATOR.DEFAULT_OUTPUT),
}).default({});

/**
 * Sweep settings.
 */
export const sweepConfigSchema = z.object({
  /** Support thresholds in percent */
  thresholds: z.array(z.number().positive().max(100)).min(1).default([...SWEEP.DEFAULT_THRESHOLDS]),
  /** Per-invocation timeout in ms (0 disables it) */
  timeout: z.number().int().min(0).default(TIMEOUTS.RUN_DEFAULT),
  /** Render plot.svg after the sweep */
  plot: z.boolean().default(true),
  algorithms: z.array(algorithmConfigSchema).default([]),
}).default({});

/**
 * Logging configuration schema.
 */
export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  file: z.string().optional(),
  pretty: z.boolean().default(false),
}).default({});

export const minebenchConfigSchema = z.object({
  generator: generatorConfigSchema,
  sweep: sweepConfigSchema,
  logging: loggingConfigSchema,
});

export type MinebenchConfig = z.infer<typeof minebenchConfigSchema>;
export type AlgorithmConfig = z.infer<typeof algorithmConfigSchema>;

/**
 * Validate a configuration object, applying defaults.
 */
export function validateConfig(config: unknown, filePath?: string): MinebenchConfig {
  const result = minebenchConfigSchema.safeParse(config ?? {});

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `${path || 'root'}: ${issue.message}`;
    });
    throw new ConfigValidationError(issues, {
      component: 'config',
      metadata: filePath ? { filePath } : undefined,
    });
  }

  return result.data;
}

/**
 * Check if a config file exists at the given path or in the working directory.
 */
export function findConfigFile(explicitPath?: string, cwd: string = process.cwd()): string | null {
  if (explicitPath) {
    return existsSync(explicitPath) ? explicitPath : null;
  }

  for (const name of PATHS.CONFIG_FILENAMES) {
    const path = join(cwd, name);
    if (existsSync(path)) {
      return path;
    }
  }

  return null;
}
