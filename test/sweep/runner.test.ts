import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { runSweep, runPaths, type SweepProgress } from '../../src/sweep/runner.js';
import { SpawnChildRunner, type ChildRunner, type ChildRunResult } from '../../src/sweep/child-runner.js';
import {
  ConfigValidationError,
  MissingDatasetError,
  MissingExecutableError,
  RunFailureError,
  SweepAbortedError,
} from '../../src/errors/types.js';
import {
  MINER_SCRIPTS,
  createTempDir,
  removeTempDir,
  writeDatasetFile,
  writeFakeMiner,
} from '../helpers/fake-miner.js';

describe('sweep/runner', () => {
  let testDir: string;
  let dataset: string;
  let outputDir: string;

  beforeEach(() => {
    testDir = createTempDir('sweep');
    dataset = writeDatasetFile(testDir);
    outputDir = join(testDir, 'out');
  });

  afterEach(() => {
    removeTempDir(testDir);
  });

  it('names outputs and logs after algorithm and threshold', () => {
    expect(runPaths('/runs', 'apriori', 25)).toEqual({ output: '/runs/apriori_s25', log: '/runs/apriori_s25.log' });
  });

  it('keeps run paths apart for names that prefix each other', () => {
    expect(runPaths('/runs', 'a1', 25).output).toBe('/runs/a1_s25');
    expect(runPaths('/runs', 'a12', 5).output).toBe('/runs/a12_s5');
    expect(runPaths('/runs', 'a1_s2', 5).output).not.toBe(runPaths('/runs', 'a1', 25).output);
  });

  it('gives every run its own output and log', async () => {
    const a1 = writeFakeMiner(testDir, 'a1', 'printf "from-a1\\n" > "$3"\necho "a1 $1"');
    const a12 = writeFakeMiner(testDir, 'a12', 'printf "from-a12\\n" > "$3"\necho "a12 $1"');

    const result = await runSweep({
      datasetPath: dataset,
      thresholds: [5, 25],
      algorithms: [
        { name: 'a1', executable: a1 },
        { name: 'a12', executable: a12 },
      ],
      outputDir,
    });

    const refs = result.table.map((r) => r.outputRef);
    expect(new Set(refs).size).toBe(4);
    for (const record of result.table) {
      expect(readFileSync(record.outputRef, 'utf-8')).toBe(`from-${record.algorithm}\n`);
      expect(readFileSync(`${record.outputRef}.log`, 'utf-8')).toBe(`${record.algorithm} -s${record.threshold}\n`);
    }
  });

  it('records one run per algorithm and threshold, in order', async () => {
    const apriori = writeFakeMiner(testDir, 'apriori', MINER_SCRIPTS.ok);
    const eclat = writeFakeMiner(testDir, 'eclat', MINER_SCRIPTS.ok);

    const result = await runSweep({
      datasetPath: dataset,
      thresholds: [25, 10],
      algorithms: [
        { name: 'apriori', executable: apriori },
        { name: 'eclat', executable: eclat },
      ],
      outputDir,
    });

    expect(result.thresholds).toEqual([10, 25]);
    expect(result.table.map((r) => [r.algorithm, r.threshold, r.status])).toEqual([
      ['apriori', 10, 'ok'],
      ['apriori', 25, 'ok'],
      ['eclat', 10, 'ok'],
      ['eclat', 25, 'ok'],
    ]);
    for (const record of result.table) {
      expect(record.runtimeSeconds).toBeGreaterThanOrEqual(0);
      expect(record.outputRef).toBe(join(outputDir, `${record.algorithm}_s${record.threshold}`));
      expect(readFileSync(record.outputRef, 'utf-8')).toBe('A B (50)\n');
      expect(readFileSync(`${record.outputRef}.log`, 'utf-8')).toBe(`writing ${record.outputRef} ... done\n`);
    }
  });

  it('records benign-empty runs and continues', async () => {
    const sparse = writeFakeMiner(testDir, 'sparse', MINER_SCRIPTS.sparse);

    const result = await runSweep({
      datasetPath: dataset,
      thresholds: [10, 50, 90],
      algorithms: [{ name: 'sparse', executable: sparse }],
      outputDir,
    });

    expect(result.table.map((r) => r.status)).toEqual(['ok', 'empty', 'empty']);
    expect(readFileSync(join(outputDir, 'sparse_s50'), 'utf-8')).toBe('');
    expect(readFileSync(join(outputDir, 'sparse_s90.log'), 'utf-8')).toBe('no (frequent) items found\n');
  });

  it('treats exit 0 without output but with the phrase as empty', async () => {
    const miner = writeFakeMiner(testDir, 'quiet', MINER_SCRIPTS.silentEmpty);
    const result = await runSweep({
      datasetPath: dataset,
      thresholds: [10],
      algorithms: [{ name: 'quiet', executable: miner }],
      outputDir,
    });
    expect(result.table[0].status).toBe('empty');
    expect(existsSync(join(outputDir, 'quiet_s10'))).toBe(true);
  });

  it('stops at the first hard failure and carries the partial records', async () => {
    const broken = writeFakeMiner(testDir, 'broken', MINER_SCRIPTS.breaksAt25);
    const ok = writeFakeMiner(testDir, 'fine', MINER_SCRIPTS.ok);

    const error = await runSweep({
      datasetPath: dataset,
      thresholds: [10, 25, 50],
      algorithms: [
        { name: 'broken', executable: broken },
        { name: 'fine', executable: ok },
      ],
      outputDir,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RunFailureError);
    if (!(error instanceof RunFailureError)) return;
    expect(error.algorithm).toBe('broken');
    expect(error.threshold).toBe(25);
    expect(error.reason).toBe('exited with code 3');
    expect(error.logPath).toBe(join(outputDir, 'broken_s25.log'));
    expect(error.message).toBe(
      `broken (${broken}) failed at 25% support: exited with code 3 (see ${join(outputDir, 'broken_s25.log')})`
    );
    expect(error.partialRecords.map((r) => [r.threshold, r.status])).toEqual([
      [10, 'ok'],
      [25, 'failed'],
    ]);
    expect(readFileSync(error.logPath, 'utf-8')).toBe('out of memory\n');
    expect(existsSync(join(outputDir, 'broken_s50.log'))).toBe(false);
    expect(existsSync(join(outputDir, 'fine_s10.log'))).toBe(false);
  });

  it('finds the no-pattern phrase beyond the captured tail', async () => {
    const chatty = writeFakeMiner(
      testDir,
      'chatty',
      'echo "no frequent items found"\ni=0\nwhile [ $i -lt 20 ]; do\n  echo "progress line $i"\n  i=$((i+1))\ndone\nexit 1'
    );
    const result = await runSweep({
      datasetPath: dataset,
      thresholds: [90],
      algorithms: [{ name: 'chatty', executable: chatty }],
      outputDir,
      childRunner: new SpawnChildRunner({ maxCapturedOutput: 64 }),
    });
    expect(result.table[0].status).toBe('empty');
  });

  it('fails the sweep when a run times out', async () => {
    const hang = writeFakeMiner(testDir, 'hang', MINER_SCRIPTS.hang);
    await expect(
      runSweep({
        datasetPath: dataset,
        thresholds: [10],
        algorithms: [{ name: 'hang', executable: hang }],
        outputDir,
        timeoutMs: 100,
      })
    ).rejects.toThrow('timed out after 100ms');
  });

  describe('preconditions', () => {
    it('rejects a missing executable before running anything', async () => {
      const ok = writeFakeMiner(testDir, 'fine', MINER_SCRIPTS.ok);
      await expect(
        runSweep({
          datasetPath: dataset,
          thresholds: [10],
          algorithms: [
            { name: 'fine', executable: ok },
            { name: 'ghost', executable: join(testDir, 'ghost') },
          ],
          outputDir,
        })
      ).rejects.toThrow(MissingExecutableError);
      expect(existsSync(outputDir)).toBe(false);
    });

    it('rejects a file without execute permission', async () => {
      const plain = writeFakeMiner(testDir, 'plain', MINER_SCRIPTS.ok, 0o644);
      const error = await runSweep({
        datasetPath: dataset,
        thresholds: [10],
        algorithms: [{ name: 'plain', executable: plain }],
        outputDir,
      }).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(MissingExecutableError);
      if (error instanceof MissingExecutableError) {
        expect(error.reason).toBe('permission denied');
      }
    });

    it('rejects a missing dataset', async () => {
      const ok = writeFakeMiner(testDir, 'fine', MINER_SCRIPTS.ok);
      await expect(
        runSweep({
          datasetPath: join(testDir, 'missing.dat'),
          thresholds: [10],
          algorithms: [{ name: 'fine', executable: ok }],
          outputDir,
        })
      ).rejects.toThrow(MissingDatasetError);
    });

    it('rejects invalid thresholds', async () => {
      const ok = writeFakeMiner(testDir, 'fine', MINER_SCRIPTS.ok);
      await expect(
        runSweep({ datasetPath: dataset, thresholds: [10, 10], algorithms: [{ name: 'fine', executable: ok }], outputDir })
      ).rejects.toThrow(ConfigValidationError);
      await expect(
        runSweep({ datasetPath: dataset, thresholds: [], algorithms: [{ name: 'fine', executable: ok }], outputDir })
      ).rejects.toThrow(ConfigValidationError);
    });
  });

  describe('templates', () => {
    it('moves an artifact written beside the dataset into the output path', async () => {
      const miner = writeFakeMiner(testDir, 'gspan', 'printf "t # 0\\n" > "$1.fp"');
      const result = await runSweep({
        datasetPath: dataset,
        thresholds: [10],
        algorithms: [{ name: 'gspan', executable: miner, args: ['{dataset}'], artifact: '{dataset}.fp' }],
        outputDir,
      });
      expect(result.table[0].status).toBe('ok');
      expect(readFileSync(join(outputDir, 'gspan_s10'), 'utf-8')).toBe('t # 0\n');
      expect(existsSync(`${dataset}.fp`)).toBe(false);
    });

    it('passes absolute support for {count}', async () => {
      const miner = writeFakeMiner(testDir, 'gaston', 'printf "%s\\n" "$1" > "$3"');
      await runSweep({
        datasetPath: dataset,
        thresholds: [50],
        algorithms: [{ name: 'gaston', executable: miner, args: ['{count}', '{dataset}', '{output}'] }],
        outputDir,
      });
      // 4 transactions at 50%
      expect(readFileSync(join(outputDir, 'gaston_s50'), 'utf-8')).toBe('2\n');
    });

    it('refuses an artifact that would delete the dataset', async () => {
      const miner = writeFakeMiner(testDir, 'gspan', MINER_SCRIPTS.ok);
      await expect(
        runSweep({
          datasetPath: dataset,
          thresholds: [10],
          algorithms: [{ name: 'gspan', executable: miner, artifact: '{dataset}' }],
          outputDir,
        })
      ).rejects.toThrow(ConfigValidationError);
      expect(readFileSync(dataset, 'utf-8')).toBe('A B\nA C\nB C\nA B C\n');
      expect(existsSync(outputDir)).toBe(false);
    });

    it('does not count a stale output from an earlier sweep', async () => {
      const miner = writeFakeMiner(testDir, 'lazy', 'exit 0');
      mkdirSync(outputDir, { recursive: true });
      writeFileSync(join(outputDir, 'lazy_s10'), 'old patterns\n');
      await expect(
        runSweep({ datasetPath: dataset, thresholds: [10], algorithms: [{ name: 'lazy', executable: miner }], outputDir })
      ).rejects.toThrow('output missing');
    });
  });

  describe('with a scripted child runner', () => {
    function scriptedRunner(results: Array<Partial<ChildRunResult>>): ChildRunner & { calls: string[][] } {
      const calls: string[][] = [];
      return {
        calls,
        async run(_command, args) {
          calls.push([...args]);
          const next = results[calls.length - 1] ?? {};
          if (next.exitCode === 0) {
            writeFileSync(args[2], 'A (1)\n');
          }
          return { exitCode: 0, signal: null, timedOut: false, aborted: false, output: '', ...next };
        },
      };
    }

    it('reports progress for every run', async () => {
      const miner = writeFakeMiner(testDir, 'fake', MINER_SCRIPTS.ok);
      const runner = scriptedRunner([{ exitCode: 0 }, { exitCode: 0 }]);
      const events: SweepProgress[] = [];

      await runSweep({
        datasetPath: dataset,
        thresholds: [5, 10],
        algorithms: [{ name: 'fake', executable: miner }],
        outputDir,
        childRunner: runner,
        onProgress: (p) => events.push(p),
      });

      expect(runner.calls.map((args) => args[0])).toEqual(['-s5', '-s10']);
      expect(events.map((e) => [e.phase, e.completed, e.total])).toEqual([
        ['starting', 0, 2],
        ['running', 0, 2],
        ['running', 1, 2],
        ['running', 1, 2],
        ['running', 2, 2],
        ['completed', 2, 2],
      ]);
      expect(events.filter((e) => e.record).map((e) => e.record?.status)).toEqual(['ok', 'ok']);
    });

    it('raises SweepAbortedError with the records so far', async () => {
      const miner = writeFakeMiner(testDir, 'fake', MINER_SCRIPTS.ok);
      const runner = scriptedRunner([{ exitCode: 0 }, { exitCode: null, signal: 'SIGTERM', aborted: true }]);

      const error = await runSweep({
        datasetPath: dataset,
        thresholds: [5, 10, 25],
        algorithms: [{ name: 'fake', executable: miner }],
        outputDir,
        childRunner: runner,
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SweepAbortedError);
      if (error instanceof SweepAbortedError) {
        expect(error.partialRecords.map((r) => r.threshold)).toEqual([5]);
      }
      expect(runner.calls).toHaveLength(2);
    });

    it('does not start when the signal is already aborted', async () => {
      const miner = writeFakeMiner(testDir, 'fake', MINER_SCRIPTS.ok);
      const runner = scriptedRunner([]);
      const controller = new AbortController();
      controller.abort();

      await expect(
        runSweep({
          datasetPath: dataset,
          thresholds: [5],
          algorithms: [{ name: 'fake', executable: miner }],
          outputDir,
          childRunner: runner,
          signal: controller.signal,
        })
      ).rejects.toThrow(SweepAbortedError);
      expect(runner.calls).toHaveLength(0);
    });
  });
});
