/**
 * Checks run before any invocation, so a bad path fails the sweep up front.
 */

import { accessSync, constants, statSync } from 'fs';
import { MissingDatasetError, MissingExecutableError } from '../errors/types.js';
import type { AlgoSpec } from './algorithm.js';

export function checkDataset(path: string): void {
  let isFile = false;
  try {
    isFile = statSync(path).isFile();
  } catch {
    throw new MissingDatasetError(path);
  }
  if (!isFile) {
    throw new MissingDatasetError(path);
  }
}

export function checkExecutable(algo: AlgoSpec): void {
  let isFile = false;
  try {
    isFile = statSync(algo.executable).isFile();
  } catch {
    throw new MissingExecutableError(algo.name, algo.executable, 'not found');
  }
  if (!isFile) {
    throw new MissingExecutableError(algo.name, algo.executable, 'not a regular file');
  }
  try {
    accessSync(algo.executable, constants.X_OK);
  } catch {
    throw new MissingExecutableError(algo.name, algo.executable, 'permission denied');
  }
}
