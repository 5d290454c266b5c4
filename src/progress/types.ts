/**
 * Types for progress reporting.
 */

/** Stage of an operation */
export type ProgressPhase = 'scanning' | 'downloading' | 'finalizing';

/** Bytes received for the file most recently reported on */
export interface CurrentFileProgress {
  path: string;
  completedBytes: number;
  totalBytes: number;
}

/**
 * Snapshot of an operation's progress. Counters never decrease within
 * one operation.
 */
export interface ProgressUpdate {
  phase: ProgressPhase;
  totalBytes: number;
  completedBytes: number;
  totalFiles: number;
  completedFiles: number;
  currentFile: CurrentFileProgress | null;
}

export type ProgressHandler = (update: ProgressUpdate) => void;

/** A registered handler with its emission interval */
export interface ProgressSubscription {
  handler: ProgressHandler;

  /** Minimum milliseconds between two throttled emissions */
  throttleMs: number;
}

/**
 * Read at every emission, so a handler registered or replaced while an
 * operation runs takes effect on the next update.
 */
export type ProgressSinkResolver = () => ProgressSubscription | null;

/** Listing entry as seen by the aggregator */
export interface ProgressFile {
  path: string;
  size: number;
}
