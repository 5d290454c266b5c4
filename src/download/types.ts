/**
 * Types for the download scheduler and snapshot bookkeeping.
 */

import type { ContentId } from '../hash/types.js';
import type { DownloadError } from '../errors/index.js';
import type { RepoType } from '../remote/types.js';

/**
 * States a file passes through while it is processed.
 *
 *   pending -> up-to-date -> done
 *   pending -> dedup-hit -> finalizing -> done
 *   pending -> fetching -> verifying -> finalizing -> done
 *
 * `failed` is reachable from fetching, verifying and finalizing;
 * `cancelled` from any non-terminal state.
 */
export type FileTaskState =
  | 'pending'
  | 'up-to-date'
  | 'dedup-hit'
  | 'fetching'
  | 'verifying'
  | 'finalizing'
  | 'done'
  | 'failed'
  | 'cancelled';

/** Where the bytes of a completed file came from */
export type FileSource = 'network' | 'dedup' | 'up-to-date';

/** Result of processing one file */
export interface FileOutcome {
  /** Relative path in the repository */
  path: string;

  contentId: ContentId;

  /** Size in bytes from the listing */
  size: number;

  /** Terminal state */
  state: 'done' | 'failed' | 'cancelled';

  /** Set when state is 'done' */
  source?: FileSource;

  /** Final local path, when state is 'done' */
  localPath?: string;

  /** Bytes received from the remote across all attempts */
  bytesFetched: number;

  /** Fetch attempts made (0 for dedup and up-to-date hits) */
  attempts: number;

  /** Set when state is 'failed' or 'cancelled' */
  error?: DownloadError;

  durationMs: number;
}

/** Counters kept by a scheduler across runs */
export interface SchedulerStats {
  filesDownloaded: number;
  dedupHits: number;
  upToDate: number;
  bytesFetched: number;
  retries: number;
  failures: number;
}

/** Persistent record of one materialized file */
export interface SnapshotStateEntry {
  /** Relative path in the repository */
  path: string;

  contentId: ContentId;

  size: number;

  /** Timestamp when the file was written (ms since epoch) */
  materializedAt: number;

  /** Modification time of the destination right after it was written */
  mtimeMs?: number;
}

/** Snapshot bookkeeping persisted at <localDir>/.reposnap/state.json */
export interface SnapshotState {
  /** Version of the state file format */
  version: 1;

  repoId: string;

  repoType: RepoType;

  /** Revision most recently materialized */
  revision: string;

  /** Timestamp of the last completed operation */
  lastCompletedAt: number | null;

  /** Map of path -> SnapshotStateEntry */
  entries: Record<string, SnapshotStateEntry>;
}
