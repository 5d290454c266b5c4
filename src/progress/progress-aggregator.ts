/**
 * Running progress totals for one operation, emitted through a throttled
 * sink.
 *
 * Per-file byte counts are kept at their maximum, so a file that restarts
 * after a failed attempt never moves the totals backwards. Phase changes
 * and the final update bypass the throttle; anything held back by the
 * throttle is flushed by a trailing timer.
 */

import type { Logger } from 'pino';
import { errorMessage } from '../errors/index.js';
import type {
  CurrentFileProgress,
  ProgressFile,
  ProgressPhase,
  ProgressSinkResolver,
  ProgressUpdate,
} from './types.js';

interface FileCounter {
  size: number;
  bytes: number;
  done: boolean;
}

export interface ProgressAggregatorOptions {
  /** Clock used for throttling */
  now?: () => number;
}

export class ProgressAggregator {
  private readonly resolveSink: ProgressSinkResolver;
  private readonly logger: Logger;
  private readonly now: () => number;

  private readonly files: Map<string, FileCounter> = new Map();
  private phase: ProgressPhase = 'scanning';
  private totalBytes = 0;
  private totalFiles = 0;
  private completedBytes = 0;
  private completedFiles = 0;
  private currentFile: CurrentFileProgress | null = null;

  private lastEmitAt = Number.NEGATIVE_INFINITY;
  private trailingTimer: ReturnType<typeof setTimeout> | null = null;
  private finished = false;

  constructor(resolveSink: ProgressSinkResolver, logger: Logger, options: ProgressAggregatorOptions = {}) {
    this.resolveSink = resolveSink;
    this.logger = logger.child({ component: 'progress' });
    this.now = options.now ?? Date.now;
  }

  /** Current values, as the next update would carry them */
  snapshot(): ProgressUpdate {
    return {
      phase: this.phase,
      totalBytes: this.totalBytes,
      completedBytes: this.completedBytes,
      totalFiles: this.totalFiles,
      completedFiles: this.completedFiles,
      currentFile: this.currentFile ? { ...this.currentFile } : null,
    };
  }

  /** Announce the operation in its scanning phase */
  start(): void {
    this.emit(true);
  }

  /**
   * Register the files the operation will process. Totals only grow, so
   * calling this twice with the same path has no effect the second time.
   */
  setFiles(files: readonly ProgressFile[]): void {
    for (const file of files) {
      if (this.files.has(file.path)) {
        continue;
      }
      this.files.set(file.path, { size: file.size, bytes: 0, done: false });
      this.totalFiles += 1;
      this.totalBytes += file.size;
    }
    this.emit(false);
  }

  /** Enter a new phase. Emits immediately. */
  setPhase(phase: ProgressPhase): void {
    if (this.finished || phase === this.phase) {
      return;
    }
    this.phase = phase;
    this.emit(true);
  }

  /**
   * Report bytes received so far for a file's current attempt.
   */
  fileProgress(filePath: string, bytes: number): void {
    const counter = this.files.get(filePath);
    if (!counter || counter.done) {
      return;
    }
    this.advance(filePath, counter, Math.min(bytes, counter.size));
    this.emit(false);
  }

  /**
   * Mark a file as complete at its full size. Also used for files that
   * were served from the store or were already in place.
   */
  fileCompleted(filePath: string): void {
    const counter = this.files.get(filePath);
    if (!counter || counter.done) {
      return;
    }
    this.advance(filePath, counter, counter.size);
    counter.done = true;
    this.completedFiles += 1;
    this.emit(false);
  }

  /**
   * Send the final update and stop emitting. Later calls are ignored.
   */
  finish(): void {
    if (this.finished) {
      return;
    }
    this.emit(true);
    this.finished = true;
  }

  private advance(filePath: string, counter: FileCounter, bytes: number): void {
    if (bytes > counter.bytes) {
      this.completedBytes += bytes - counter.bytes;
      counter.bytes = bytes;
    }
    this.currentFile = { path: filePath, completedBytes: counter.bytes, totalBytes: counter.size };
  }

  private emit(force: boolean): void {
    if (this.finished) {
      return;
    }
    const subscription = this.resolveSink();
    if (!subscription) {
      this.clearTrailing();
      return;
    }

    const elapsed = this.now() - this.lastEmitAt;
    if (force || elapsed >= subscription.throttleMs) {
      this.deliver();
      return;
    }

    if (this.trailingTimer === null) {
      this.trailingTimer = setTimeout(() => {
        this.trailingTimer = null;
        if (!this.finished && this.resolveSink() !== null) {
          this.deliver();
        }
      }, subscription.throttleMs - elapsed);
      this.trailingTimer.unref();
    }
  }

  private deliver(): void {
    this.clearTrailing();
    this.lastEmitAt = this.now();
    // Re-read the slot: the handler may have been replaced since emit()
    const subscription = this.resolveSink();
    if (!subscription) {
      return;
    }
    try {
      subscription.handler(this.snapshot());
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, 'Progress handler threw');
    }
  }

  private clearTrailing(): void {
    if (this.trailingTimer !== null) {
      clearTimeout(this.trailingTimer);
      this.trailingTimer = null;
    }
  }
}
