/**
 * Types for the local content-addressed dedup store.
 */

import type { ContentId } from '../hash/types.js';

/** Exclusive claim on ingesting one content id */
export interface IngestLease {
  readonly contentId: ContentId;

  /** Release the claim and wake every waiter. Safe to call more than once. */
  release(): void;
}

/**
 * Result of reserving a content id.
 *
 * When another task already holds the lease, `settled` resolves once that
 * task releases it (whether its ingest succeeded or not). It never rejects.
 */
export type ReserveResult =
  | { acquired: true; lease: IngestLease }
  | { acquired: false; settled: Promise<void> };

/** Options for constructing a LocalDedupStore */
export interface DedupStoreOptions {
  /** Root cache directory; blobs and staging live below it */
  cacheDir: string;
}

/** Counters kept by the store */
export interface DedupStoreStats {
  /** Entries committed by this process */
  writes: number;

  /** Leases currently held */
  activeLeases: number;
}
