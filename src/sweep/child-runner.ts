/**
 * Child process invocation with combined output capture.
 *
 * The runner depends only on the ChildRunner interface so tests can
 * substitute fake executables or a scripted runner.
 */

import { spawn } from 'child_process';
import { createWriteStream, mkdirSync } from 'fs';
import { dirname } from 'path';
import { SWEEP, TIMEOUTS } from '../constants.js';
import { getLogger } from '../logging/logger.js';

export interface ChildRunOptions {
  /** File receiving combined stdout/stderr (truncated first) */
  logPath: string;
  /** Kill the child after this many milliseconds; 0 or undefined disables */
  timeoutMs?: number;
  /** Aborting terminates the child */
  signal?: AbortSignal;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ChildRunResult {
  /** Exit code, or null when the child was killed by a signal or never started */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  aborted: boolean;
  /** Set when the executable could not be started */
  spawnError?: Error;
  /** Tail of the combined output, for classification */
  output: string;
  /** True when the output outgrew the tail and only the log holds all of it */
  outputTruncated?: boolean;
}

export interface ChildRunner {
  run(command: string, args: readonly string[], options: ChildRunOptions): Promise<ChildRunResult>;
}

/**
 * Keeps the last `limit` bytes of a stream.
 */
class OutputTail {
  private chunks: Buffer[] = [];
  private size = 0;
  private total = 0;

  constructor(private readonly limit: number) {}

  get truncated(): boolean {
    return this.total > this.limit;
  }

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    this.total += chunk.length;
    while (this.size > this.limit && this.chunks.length > 1) {
      const dropped = this.chunks.shift();
      this.size -= dropped?.length ?? 0;
    }
  }

  toString(): string {
    const joined = Buffer.concat(this.chunks);
    const start = Math.max(0, joined.length - this.limit);
    return joined.subarray(start).toString('utf-8');
  }
}

/**
 * Spawns the executable directly (no shell) and streams its output to the log.
 */
export class SpawnChildRunner implements ChildRunner {
  constructor(
    private readonly options: { maxCapturedOutput?: number; killGraceMs?: number } = {}
  ) {}

  run(command: string, args: readonly string[], options: ChildRunOptions): Promise<ChildRunResult> {
    const logger = getLogger('child-runner');
    const tail = new OutputTail(this.options.maxCapturedOutput ?? SWEEP.MAX_CAPTURED_OUTPUT);
    const killGraceMs = this.options.killGraceMs ?? TIMEOUTS.SHUTDOWN_KILL;

    mkdirSync(dirname(options.logPath), { recursive: true });
    const log = createWriteStream(options.logPath, { flags: 'w' });
    let logError: Error | undefined;
    log.on('error', (error) => {
      logError = error;
      logger.warn({ logPath: options.logPath, error: error.message }, 'Cannot write run log');
    });

    return new Promise<ChildRunResult>((resolve) => {
      let settled = false;
      let timedOut = false;
      let aborted = false;
      let spawnError: Error | undefined;
      let timeoutTimer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;

      const finish = (exitCode: number | null, signal: NodeJS.Signals | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);

        const result: ChildRunResult = {
          exitCode,
          signal,
          timedOut,
          aborted,
          spawnError,
          output: tail.toString(),
          outputTruncated: tail.truncated,
        };
        if (logError) {
          resolve(result);
          return;
        }
        // Resolve once the log is flushed so callers can read it
        log.end(() => resolve(result));
      };

      const onAbort = (): void => {
        aborted = true;
        terminate();
      };

      if (options.signal?.aborted) {
        aborted = true;
        finish(null, null);
        return;
      }

      logger.debug({ command, args }, 'Spawning');
      const child = spawn(command, [...args], {
        stdio: ['ignore', 'pipe', 'pipe'],
        cwd: options.cwd,
        env: options.env ?? process.env,
      });

      const terminate = (): void => {
        if (child.exitCode !== null || child.signalCode !== null) return;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          logger.warn({ command, pid: child.pid }, 'Child ignored SIGTERM, sending SIGKILL');
          child.kill('SIGKILL');
        }, killGraceMs);
      };

      const onData = (chunk: Buffer): void => {
        tail.push(chunk);
        if (!logError) {
          log.write(chunk);
        }
      };
      child.stdout?.on('data', onData);
      child.stderr?.on('data', onData);

      child.on('error', (error) => {
        if (child.pid === undefined) {
          // Never started: no 'close' is guaranteed to follow
          spawnError = error;
          const line = Buffer.from(`minebench: cannot start ${command}: ${error.message}\n`);
          onData(line);
          finish(null, null);
          return;
        }
        logger.warn({ command, error: error.message }, 'Child process error');
      });

      child.on('close', (code, signal) => {
        finish(code, signal);
      });

      const timeoutMs = options.timeoutMs ?? 0;
      if (timeoutMs > 0) {
        timeoutTimer = setTimeout(() => {
          timedOut = true;
          logger.warn({ command, timeoutMs }, 'Run timed out, terminating');
          terminate();
        }, timeoutMs);
      }

      options.signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
