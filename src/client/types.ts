/**
 * Types for the reposnap client.
 */

import type { LevelWithSilent, Logger } from 'pino';
import type { CancellationToken } from '../cancellation/index.js';
import type { FileOutcome } from '../download/types.js';
import type { DownloadError } from '../errors/index.js';
import type { ContentHasher, HashAlgorithm } from '../hash/types.js';
import type { RemoteRepositoryClient, RepoRef, RepoRefInput } from '../remote/types.js';
import type { Sleeper } from '../retry/index.js';

/** Configuration, fixed for the lifetime of a client */
export interface ClientConfig {
  /** Base URL of the remote store */
  endpoint: string;

  /** Bearer token; empty for anonymous access */
  token: string;

  /** Root of the dedup store and default snapshot directories */
  cacheDir: string;

  /** Maximum number of files processed at once */
  maxConcurrentDownloads: number;

  /** Serve and record content through the local dedup store */
  enableDedup: boolean;

  /** Re-hash store entries before trusting them */
  verifyDedupHits: boolean;

  /** Digest the remote's content ids are computed with */
  hashAlgorithm: HashAlgorithm;

  /** Fetch attempts per file, first one included */
  maxAttempts: number;

  retryBaseDelayMs: number;

  retryMaxDelayMs: number;

  /** Backoff spread, 0..1 */
  retryJitterRatio: number;

  /** Idle timeout per HTTP request */
  requestTimeoutMs: number;

  /** Default interval between throttled progress updates */
  progressThrottleMs: number;

  logLevel: LevelWithSilent;
}

/** Default configuration values */
export const DEFAULT_CLIENT_CONFIG: Omit<ClientConfig, 'endpoint' | 'token' | 'cacheDir'> = {
  maxConcurrentDownloads: 4,
  enableDedup: true,
  verifyDedupHits: false,
  hashAlgorithm: 'sha256',
  maxAttempts: 4,
  retryBaseDelayMs: 200,
  retryMaxDelayMs: 5_000,
  retryJitterRatio: 0.2,
  requestTimeoutMs: 60_000,
  progressThrottleMs: 200,
  logLevel: 'info',
};

/** Collaborators a client builds itself unless given */
export interface ClientDependencies {
  /** Transport; default: HttpRepositoryClient on config.endpoint */
  remote?: RemoteRepositoryClient;

  logger?: Logger;

  hasher?: ContentHasher;

  /** Backoff sleeper (tests pass one that resolves immediately) */
  sleep?: Sleeper;

  /** fetch used by the default HTTP transport */
  fetchFn?: typeof fetch;
}

/** Request to fetch one file */
export interface DownloadFileRequest extends RepoRefInput {
  /** Path of the file inside the repository */
  filename: string;

  /** Destination root; default: <cacheDir>/snapshots/<repo>/<revision> */
  localDir?: string;

  cancellationToken?: CancellationToken;
}

/** Request to fetch a filtered set of files */
export interface SnapshotRequest extends RepoRefInput {
  /** Destination root; default: <cacheDir>/snapshots/<repo>/<revision> */
  localDir?: string;

  /** Absent or empty: every file is allowed */
  allowPatterns?: readonly string[];

  /** Always wins over allowPatterns */
  ignorePatterns?: readonly string[];

  cancellationToken?: CancellationToken;
}

export type OperationKind = 'listFiles' | 'downloadFile' | 'downloadSnapshot';

/** Summary emitted when an operation ends, successfully or not */
export interface OperationSummary {
  operation: OperationKind;
  repo: RepoRef;

  /** Returned path, when the operation succeeded and returns one */
  localPath: string | null;

  filesTotal: number;
  filesDownloaded: number;
  dedupHits: number;
  upToDate: number;
  filesFailed: number;
  filesCancelled: number;
  bytesFetched: number;
  durationMs: number;

  /** Set when the operation failed */
  error?: DownloadError;
}

/** Counters across the lifetime of a client */
export interface ClientStats {
  released: boolean;
  activeOperations: number;
  operationsStarted: number;
  operationsSucceeded: number;
  operationsFailed: number;
  filesDownloaded: number;
  dedupHits: number;
  upToDate: number;
  bytesFetched: number;
  retries: number;
  fileFailures: number;

  /** Entries committed to the dedup store (0 when dedup is disabled) */
  storeWrites: number;
}

/** Events emitted by the client */
export interface ClientEvents {
  operationStart: (operation: OperationKind, repo: RepoRef) => void;
  fileComplete: (outcome: FileOutcome) => void;
  operationComplete: (summary: OperationSummary) => void;
}
