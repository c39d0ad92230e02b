import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync } from 'fs';
import { join } from 'path';
import { checkDataset, checkExecutable } from '../../src/sweep/preflight.js';
import { MissingDatasetError, MissingExecutableError } from '../../src/errors/types.js';
import { MINER_SCRIPTS, createTempDir, removeTempDir, writeDatasetFile, writeFakeMiner } from '../helpers/fake-miner.js';

describe('sweep/preflight', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTempDir('preflight');
  });

  afterEach(() => {
    removeTempDir(testDir);
  });

  it('accepts an existing dataset file', () => {
    expect(() => checkDataset(writeDatasetFile(testDir))).not.toThrow();
  });

  it('rejects a missing dataset or a directory', () => {
    expect(() => checkDataset(join(testDir, 'nope.dat'))).toThrow(MissingDatasetError);
    expect(() => checkDataset(testDir)).toThrow(MissingDatasetError);
  });

  it('accepts an executable file', () => {
    const path = writeFakeMiner(testDir, 'apriori', MINER_SCRIPTS.ok);
    expect(() => checkExecutable({ name: 'apriori', executable: path })).not.toThrow();
  });

  it.each([
    ['not found', (dir: string) => join(dir, 'missing')],
    ['not a regular file', (dir: string) => {
      mkdirSync(join(dir, 'folder'));
      return join(dir, 'folder');
    }],
    ['permission denied', (dir: string) => writeFakeMiner(dir, 'plain', MINER_SCRIPTS.ok, 0o644)],
  ])('names the problem: %s', (reason, makePath) => {
    const path = makePath(testDir);
    try {
      checkExecutable({ name: 'x', executable: path });
      expect.unreachable('checkExecutable should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(MissingExecutableError);
      if (error instanceof MissingExecutableError) {
        expect(error.reason).toBe(reason);
        expect(error.message).toBe(`Executable for x not found or not executable: ${path} (${reason})`);
      }
    }
  });
});
