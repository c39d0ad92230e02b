import chalk from 'chalk';
import {
  ConfigValidationError,
  InsufficientUniverseError,
  MissingExecutableError,
  RunFailureError,
  SweepAbortedError,
  getErrorMessage,
} from '../../errors/types.js';
import { EXIT_CODES, SWEEP } from '../../constants.js';
import * as output from '../output.js';

/**
 * Remediation hints for errors a user can act on.
 */
export function printErrorHints(error: unknown): void {
  if (error instanceof MissingExecutableError) {
    output.error('\nPossible causes:');
    if (error.reason === 'permission denied') {
      output.error(`  - The file is not executable; try: chmod +x ${error.path}`);
    } else {
      output.error('  - The path is wrong or relative to a different directory');
      output.error('  - Executables listed in minebench.yaml resolve against the config file');
    }
    return;
  }

  if (error instanceof InsufficientUniverseError) {
    output.error('\nPossible causes:');
    output.error('  - The universe has too few items for that many distinct transactions');
    output.error('  - Use a larger universe (e.g. AUTO:<n>) or a smaller count');
    return;
  }

  if (error instanceof RunFailureError) {
    output.error(`\nInspect the run log: ${error.logPath}`);
    if (error.reason.startsWith('timed out')) {
      output.error('  - Raise --timeout or sweep.timeout in minebench.yaml');
    }
    return;
  }

  if (error instanceof ConfigValidationError) {
    output.error(`\nThresholds are percentages in (0, 100]; ${SWEEP.THRESHOLDS_ENV_VAR} overrides the config file.`);
  }
}

/**
 * Print an error with hints and map it to a process exit code.
 */
export function reportError(error: unknown): number {
  if (error instanceof SweepAbortedError) {
    output.warn(chalk.yellow('\nSweep interrupted'));
    return EXIT_CODES.INTERRUPTED;
  }

  output.error(chalk.red(`\nError: ${getErrorMessage(error)}`));
  printErrorHints(error);
  return EXIT_CODES.ERROR;
}
