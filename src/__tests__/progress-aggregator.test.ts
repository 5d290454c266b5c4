import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ProgressAggregator } from '../progress/progress-aggregator.js';
import type { ProgressSubscription, ProgressUpdate } from '../progress/types.js';
import { createSilentLogger } from './helpers/memory-repository.js';

describe('ProgressAggregator', () => {
  let clock: { t: number };
  let updates: ProgressUpdate[];
  let slot: { subscription: ProgressSubscription | null };
  let aggregator: ProgressAggregator;

  const tick = (ms: number): void => {
    clock.t += ms;
    vi.advanceTimersByTime(ms);
  };

  beforeEach(() => {
    vi.useFakeTimers();
    clock = { t: 0 };
    updates = [];
    slot = {
      subscription: { handler: (update) => updates.push(update), throttleMs: 100 },
    };
    aggregator = new ProgressAggregator(() => slot.subscription, createSilentLogger(), {
      now: () => clock.t,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should announce the scanning phase on start', () => {
    aggregator.start();

    expect(updates).toEqual([
      {
        phase: 'scanning',
        totalBytes: 0,
        completedBytes: 0,
        totalFiles: 0,
        completedFiles: 0,
        currentFile: null,
      },
    ]);
  });

  it('should hold back updates inside the throttle window and flush them later', () => {
    aggregator.start();
    aggregator.setFiles([
      { path: 'a.bin', size: 10 },
      { path: 'b.bin', size: 20 },
    ]);
    aggregator.fileProgress('a.bin', 4);
    expect(updates).toHaveLength(1);

    tick(100);

    expect(updates).toHaveLength(2);
    expect(updates[1]).toEqual({
      phase: 'scanning',
      totalBytes: 30,
      completedBytes: 4,
      totalFiles: 2,
      completedFiles: 0,
      currentFile: { path: 'a.bin', completedBytes: 4, totalBytes: 10 },
    });
  });

  it('should emit phase changes and the final update immediately', () => {
    aggregator.start();
    aggregator.setFiles([{ path: 'a.bin', size: 10 }]);

    aggregator.setPhase('downloading');
    aggregator.fileCompleted('a.bin');
    aggregator.finish();

    expect(updates.map((update) => update.phase)).toEqual(['scanning', 'downloading', 'downloading']);
    expect(updates[2]).toMatchObject({ completedFiles: 1, totalFiles: 1, completedBytes: 10 });

    tick(1_000);
    expect(updates).toHaveLength(3);
  });

  it('should emit nothing after finish', () => {
    aggregator.start();
    aggregator.finish();
    aggregator.finish();
    aggregator.setPhase('finalizing');

    expect(updates).toHaveLength(2);
  });

  it('should never move counters backwards', () => {
    aggregator.setFiles([{ path: 'a.bin', size: 10 }]);

    aggregator.fileProgress('a.bin', 8);
    aggregator.fileProgress('a.bin', 3);
    expect(aggregator.snapshot().completedBytes).toBe(8);

    aggregator.fileProgress('a.bin', 50);
    expect(aggregator.snapshot().completedBytes).toBe(10);

    aggregator.fileCompleted('a.bin');
    aggregator.fileCompleted('a.bin');
    aggregator.fileProgress('a.bin', 0);
    expect(aggregator.snapshot()).toMatchObject({ completedFiles: 1, completedBytes: 10 });
  });

  it('should count a path registered twice only once', () => {
    aggregator.setFiles([{ path: 'a.bin', size: 10 }]);
    aggregator.setFiles([
      { path: 'a.bin', size: 10 },
      { path: 'b.bin', size: 5 },
    ]);

    expect(aggregator.snapshot()).toMatchObject({ totalFiles: 2, totalBytes: 15 });
  });

  it('should deliver to a handler registered mid-run', () => {
    slot.subscription = null;
    aggregator.start();
    aggregator.setFiles([{ path: 'a.bin', size: 10 }]);
    tick(500);
    expect(updates).toHaveLength(0);

    const late: ProgressUpdate[] = [];
    slot.subscription = { handler: (update) => late.push(update), throttleMs: 100 };
    aggregator.setPhase('downloading');

    expect(late).toEqual([
      {
        phase: 'downloading',
        totalBytes: 10,
        completedBytes: 0,
        totalFiles: 1,
        completedFiles: 0,
        currentFile: null,
      },
    ]);
  });

  it('should switch to a replacement handler on the next update', () => {
    const replaced: ProgressUpdate[] = [];
    aggregator.start();

    slot.subscription = { handler: (update) => replaced.push(update), throttleMs: 100 };
    aggregator.setPhase('downloading');

    expect(updates).toHaveLength(1);
    expect(replaced).toHaveLength(1);
    expect(replaced[0]?.phase).toBe('downloading');
  });

  it('should keep going when the handler throws', () => {
    let calls = 0;
    slot.subscription = {
      handler: () => {
        calls++;
        throw new Error('handler failure');
      },
      throttleMs: 0,
    };

    expect(() => {
      aggregator.start();
      aggregator.setFiles([{ path: 'a.bin', size: 1 }]);
      aggregator.finish();
    }).not.toThrow();
    expect(calls).toBe(3);
  });
});
