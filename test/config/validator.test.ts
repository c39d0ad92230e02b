import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { validateConfig, findConfigFile } from '../../src/config/validator.js';
import { ConfigValidationError } from '../../src/errors/types.js';
import { createTempDir, removeTempDir } from '../helpers/fake-miner.js';

describe('config/validator', () => {
  describe('validateConfig', () => {
    it('fills in every default', () => {
      expect(validateConfig({})).toEqual({
        generator: { seed: 42, universe: 'AUTO', output: 'generated_transactions.dat' },
        sweep: { thresholds: [5, 10, 25, 50, 90], timeout: 0, plot: true, algorithms: [] },
        logging: { level: 'warn', pretty: false },
      });
    });

    it('accepts algorithm templates', () => {
      const config = validateConfig({
        sweep: {
          algorithms: [{ name: 'gspan', executable: '/bin/gSpan', args: ['-s', '{fraction}'], artifact: '{dataset}.fp' }],
        },
      });
      expect(config.sweep.algorithms[0]).toEqual({
        name: 'gspan',
        executable: '/bin/gSpan',
        args: ['-s', '{fraction}'],
        artifact: '{dataset}.fp',
      });
    });

    it('lists every issue', () => {
      try {
        validateConfig({ sweep: { timeout: -1, algorithms: [{ name: 'a/b', executable: '' }] } });
        expect.unreachable('validateConfig should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.validationErrors).toHaveLength(3);
          expect(error.validationErrors.map((e) => e.split(':')[0]).sort()).toEqual([
            'sweep.algorithms.0.executable',
            'sweep.algorithms.0.name',
            'sweep.timeout',
          ]);
        }
      }
    });

    it('rejects an unknown log level', () => {
      expect(() => validateConfig({ logging: { level: 'verbose' } })).toThrow(ConfigValidationError);
    });
  });

  describe('findConfigFile', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = createTempDir('find-config');
    });

    afterEach(() => {
      removeTempDir(testDir);
    });

    it('returns null when nothing is found', () => {
      expect(findConfigFile(undefined, testDir)).toBeNull();
    });

    it('finds alternate names', () => {
      writeFileSync(join(testDir, 'minebench.yml'), '');
      expect(findConfigFile(undefined, testDir)).toBe(join(testDir, 'minebench.yml'));
    });

    it('checks an explicit path', () => {
      const path = join(testDir, 'custom.yaml');
      expect(findConfigFile(path, testDir)).toBeNull();
      writeFileSync(path, '');
      expect(findConfigFile(path, testDir)).toBe(path);
    });
  });
});
