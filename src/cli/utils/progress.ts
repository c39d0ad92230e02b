/**
 * Progress bar for sweep display.
 */

import cliProgress from 'cli-progress';
import type { SweepProgress } from '../../sweep/runner.js';
import { suppressLogs, restoreLogLevel } from '../../logging/logger.js';

export interface ProgressBarOptions {
  /** Whether to show the progress bar */
  enabled?: boolean;
  /** Stream to write to (defaults to stderr) */
  stream?: NodeJS.WriteStream;
}

interface BarPayload {
  algorithm: string;
  threshold: string;
}

/**
 * Creates and manages a progress bar over algorithm x threshold runs.
 */
export class SweepProgressBar {
  private bar: cliProgress.SingleBar | null = null;
  private enabled: boolean;
  private started = false;
  private total = 0;
  private currentValue = 0;
  private currentPayload: BarPayload = { algorithm: '...', threshold: '-' };
  private stream: NodeJS.WriteStream;

  constructor(options: ProgressBarOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    // Only in a TTY terminal
    this.enabled = (options.enabled ?? true) && (this.stream.isTTY ?? false);

    if (this.enabled) {
      this.bar = new cliProgress.SingleBar(
        {
          format: '{bar} {percentage}% | {algorithm} @ {threshold} ({value}/{total})',
          barCompleteChar: '█',
          barIncompleteChar: '░',
          hideCursor: true,
          clearOnComplete: true,
          stream: this.stream,
          forceRedraw: true,
          linewrap: false,
          synchronousUpdate: true,
        },
        cliProgress.Presets.shades_classic
      );
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  start(total: number): void {
    if (!this.enabled || !this.bar) return;

    // Logs would tear the bar apart
    suppressLogs();
    this.total = total;
    this.currentValue = 0;
    this.bar.start(total, 0, this.currentPayload);
    this.started = true;
  }

  update(progress: SweepProgress): void {
    if (!this.enabled || !this.bar || !this.started) return;

    this.currentValue = progress.completed;
    this.currentPayload = {
      algorithm: progress.algorithm ?? '...',
      threshold: progress.threshold !== undefined ? `${progress.threshold}%` : '-',
    };
    this.bar.update(progress.completed, this.currentPayload);
  }

  stop(): void {
    if (!this.enabled || !this.bar || !this.started) return;

    this.bar.stop();
    this.started = false;
    restoreLogLevel();
  }

  /**
   * Print a line above the bar without tearing it.
   */
  log(message: string): void {
    if (!this.enabled || !this.bar || !this.started) {
      console.log(message);
      return;
    }

    this.bar.stop();
    this.stream.write(message + '\n');
    this.bar.start(this.total, this.currentValue, this.currentPayload);
  }
}
