/**
 * CLI Output Module
 *
 * User-facing output for CLI commands. Quiet mode suppresses everything
 * except warnings, errors and requested data (JSON, tables).
 *
 * For diagnostic/debug logging, use the logging module (src/logging/logger.ts).
 */

import chalk from 'chalk';
import type { RunStatus } from '../results/table.js';

/**
 * Output configuration options.
 */
export interface OutputConfig {
  /** Suppress non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}

/**
 * Respects NO_COLOR (https://no-color.org/) and FORCE_COLOR=0.
 */
function shouldDisableColor(): boolean {
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') {
    return true;
  }
  return process.env.FORCE_COLOR === '0';
}

let globalConfig: OutputConfig = {
  quiet: false,
  noColor: shouldDisableColor(),
};

/**
 * Configure global output settings.
 */
export function configureOutput(config: OutputConfig): void {
  globalConfig = { ...globalConfig, ...config };
  if (globalConfig.noColor) {
    chalk.level = 0;
  }
}

/**
 * Reset output configuration to defaults.
 */
export function resetOutput(): void {
  globalConfig = { quiet: false, noColor: false };
}

export function isQuiet(): boolean {
  return globalConfig.quiet ?? false;
}

/**
 * Progress messages, status updates and general information.
 */
export function info(message: string): void {
  if (!globalConfig.quiet) {
    console.log(message);
  }
}

export function success(message: string): void {
  if (!globalConfig.quiet) {
    console.log(message);
  }
}

/**
 * Always shown, even in quiet mode.
 */
export function warn(message: string): void {
  console.warn(message);
}

/**
 * Always shown, even in quiet mode.
 */
export function error(message: string): void {
  console.error(message);
}

export function newline(): void {
  if (!globalConfig.quiet) {
    console.log('');
  }
}

/**
 * Print formatted JSON output.
 * Always shown as this is requested data output.
 */
export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print a block of data (tables, listings). Always shown.
 */
export function data(text: string): void {
  console.log(text);
}

export function keyValue(key: string, value: string | number | boolean | undefined): void {
  if (!globalConfig.quiet && value !== undefined) {
    console.log(`${key}: ${value}`);
  }
}

export function listItem(item: string, indent: number = 0): void {
  if (!globalConfig.quiet) {
    console.log(`${'  '.repeat(indent)}- ${item}`);
  }
}

const STATUS_ICONS: Record<RunStatus, string> = {
  ok: '✓',
  empty: '○',
  failed: '✗',
};

/**
 * Icon for a run status.
 */
export function getStatusIcon(status: RunStatus): string {
  return STATUS_ICONS[status];
}

/**
 * Colored one-line description of a finished run.
 */
export function formatRunLine(algorithm: string, threshold: number, status: RunStatus, runtimeSeconds: number): string {
  const label = `${getStatusIcon(status)} ${algorithm} @ ${threshold}%`;
  const time = `${runtimeSeconds.toFixed(2)}s`;
  switch (status) {
    case 'ok':
      return `${chalk.green(label)} ${chalk.gray(time)}`;
    case 'empty':
      return `${chalk.yellow(label)} ${chalk.gray(`${time} (no frequent patterns)`)}`;
    case 'failed':
      return `${chalk.red(label)} ${chalk.gray(time)}`;
  }
}
