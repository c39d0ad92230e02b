import { describe, it, expect } from 'vitest';
import {
  MinebenchError,
  GeneratorError,
  InsufficientUniverseError,
  EmptyUniverseError,
  InvalidCountError,
  SweepError,
  MissingExecutableError,
  MissingDatasetError,
  RunFailureError,
  SweepAbortedError,
  ConfigError,
  ConfigNotFoundError,
  ConfigValidationError,
  ResultsFormatError,
  DatasetFormatError,
  FormatError,
  getErrorMessage,
} from '../../src/errors/types.js';

describe('errors/types', () => {
  describe('hierarchy', () => {
    it('roots every error at MinebenchError', () => {
      const errors = [
        new InsufficientUniverseError(3, 8, 7),
        new EmptyUniverseError('inline'),
        new InvalidCountError('x', 'bad'),
        new MissingExecutableError('a', '/a', 'not found'),
        new MissingDatasetError('/d'),
        new SweepAbortedError([]),
        new ConfigNotFoundError('/c.yaml'),
        new ConfigValidationError(['x: bad']),
        new ResultsFormatError('bad'),
        new DatasetFormatError('bad'),
      ];
      for (const error of errors) {
        expect(error).toBeInstanceOf(MinebenchError);
        expect(error).toBeInstanceOf(Error);
      }
      expect(new InsufficientUniverseError(3, 8, 7)).toBeInstanceOf(GeneratorError);
      expect(new MissingDatasetError('/d')).toBeInstanceOf(SweepError);
      expect(new ConfigNotFoundError('/c')).toBeInstanceOf(ConfigError);
      expect(new ResultsFormatError('bad')).toBeInstanceOf(FormatError);
    });
  });

  it('InsufficientUniverseError describes the shortfall', () => {
    const error = new InsufficientUniverseError(3, 8, 7);
    expect(error.message).toBe(
      'Cannot generate 8 unique transactions from a universe of 3 items (at most 7 distinct non-empty subsets)'
    );
    expect(error.code).toBe('GENERATOR_INSUFFICIENT_UNIVERSE');
    expect(error.name).toBe('InsufficientUniverseError');
  });

  it('RunFailureError names the executable, threshold and log', () => {
    const error = new RunFailureError({
      algorithm: 'eclat',
      executable: '/bin/eclat',
      threshold: 10,
      logPath: '/out/eclat_s10.log',
      reason: 'exited with code 1',
      partialRecords: [],
    });
    expect(error.message).toBe('eclat (/bin/eclat) failed at 10% support: exited with code 1 (see /out/eclat_s10.log)');
    expect(error.code).toBe('SWEEP_RUN_FAILED');
    expect(error.context.threshold).toBe(10);
  });

  it('ConfigValidationError lists each problem', () => {
    const error = new ConfigValidationError(['a: one', 'b: two']);
    expect(error.message).toBe('Configuration validation failed:\n  - a: one\n  - b: two');
    expect(error.validationErrors).toEqual(['a: one', 'b: two']);
  });

  it('FormatError appends the line number', () => {
    expect(new ResultsFormatError('bad row', 4).message).toBe('bad row (line 4)');
    expect(new DatasetFormatError('bad graph').message).toBe('bad graph');
  });

  it('keeps the cause and the default severity', () => {
    const error = new MinebenchError('outer', { code: 'X', cause: new Error('inner') });
    expect(error.severity).toBe('medium');
    expect(error.cause?.message).toBe('inner');
    expect(error.context).toEqual({});
  });

  it('getErrorMessage handles non-errors', () => {
    expect(getErrorMessage(new Error('x'))).toBe('x');
    expect(getErrorMessage(42)).toBe('42');
  });
});
