/**
 * Tests for the sweep progress bar.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SweepProgressBar } from '../../../src/cli/utils/progress.js';
import { suppressLogs, restoreLogLevel } from '../../../src/logging/logger.js';

const bar = vi.hoisted(() => ({
  start: vi.fn(),
  update: vi.fn(),
  stop: vi.fn(),
}));

vi.mock('cli-progress', () => {
  class MockSingleBar {
    start = bar.start;
    update = bar.update;
    stop = bar.stop;
  }
  return {
    default: {
      SingleBar: MockSingleBar,
      Presets: { shades_classic: {} },
    },
  };
});

vi.mock('../../../src/logging/logger.js', () => ({
  suppressLogs: vi.fn(),
  restoreLogLevel: vi.fn(),
}));

function fakeStream(isTTY: boolean): NodeJS.WriteStream & { write: ReturnType<typeof vi.fn> } {
  return { isTTY, write: vi.fn() } as unknown as NodeJS.WriteStream & { write: ReturnType<typeof vi.fn> };
}

describe('SweepProgressBar', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('is disabled outside a TTY', () => {
    const progress = new SweepProgressBar({ stream: fakeStream(false) });
    expect(progress.isEnabled()).toBe(false);
    progress.start(4);
    expect(bar.start).not.toHaveBeenCalled();
    expect(suppressLogs).not.toHaveBeenCalled();
  });

  it('is disabled on request', () => {
    expect(new SweepProgressBar({ enabled: false, stream: fakeStream(true) }).isEnabled()).toBe(false);
  });

  it('silences logs while running', () => {
    const progress = new SweepProgressBar({ stream: fakeStream(true) });
    progress.start(6);
    expect(bar.start).toHaveBeenCalledWith(6, 0, { algorithm: '...', threshold: '-' });
    expect(suppressLogs).toHaveBeenCalledTimes(1);

    progress.stop();
    expect(bar.stop).toHaveBeenCalledTimes(1);
    expect(restoreLogLevel).toHaveBeenCalledTimes(1);
  });

  it('shows the current algorithm and threshold', () => {
    const progress = new SweepProgressBar({ stream: fakeStream(true) });
    progress.start(6);
    progress.update({ phase: 'running', completed: 2, total: 6, algorithm: 'eclat', threshold: 25 });
    expect(bar.update).toHaveBeenCalledWith(2, { algorithm: 'eclat', threshold: '25%' });
  });

  it('ignores updates and stops before start', () => {
    const progress = new SweepProgressBar({ stream: fakeStream(true) });
    progress.update({ phase: 'running', completed: 1, total: 2 });
    progress.stop();
    expect(bar.update).not.toHaveBeenCalled();
    expect(restoreLogLevel).not.toHaveBeenCalled();
  });

  it('writes log lines above the bar and resumes it', () => {
    const stream = fakeStream(true);
    const progress = new SweepProgressBar({ stream });
    progress.start(3);
    progress.update({ phase: 'completed', completed: 1, total: 3, algorithm: 'apriori', threshold: 5 });
    progress.log('✓ apriori @ 5% 0.10s');

    expect(stream.write).toHaveBeenCalledWith('✓ apriori @ 5% 0.10s\n');
    expect(bar.start).toHaveBeenLastCalledWith(3, 1, { algorithm: 'apriori', threshold: '5%' });
  });
});
