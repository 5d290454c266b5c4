/**
 * reposnap
 *
 * Fetches single files and filtered repository snapshots from a remote
 * content-addressed store, with a local dedup cache, bounded concurrency,
 * throttled progress and cooperative cancellation.
 */

// Client
export { ReposnapClient, createClient, buildClientConfig, validateClientConfig, defaultCacheDir, DEFAULT_CLIENT_CONFIG } from './client/index.js';
export type {
  ClientConfig,
  ClientDependencies,
  ClientEvents,
  ClientStats,
  DownloadFileRequest,
  OperationKind,
  OperationSummary,
  SnapshotRequest,
  TypedClientEmitter,
} from './client/index.js';

// Errors
export {
  DownloadError,
  ERROR_CODES,
  isDownloadError,
  isTransient,
} from './errors/index.js';
export type { ErrorCode, ErrorDetails, FileFailure } from './errors/index.js';

// Cancellation
export { CancellationSource, CancellationGate, NEVER_CANCELLED, fromAbortSignal } from './cancellation/index.js';
export type { CancellationToken } from './cancellation/index.js';

// Progress
export type { ProgressHandler, ProgressPhase, ProgressUpdate, CurrentFileProgress } from './progress/index.js';

// Filtering
export { FileFilter, filterFiles, checkPath, compilePattern, matchPattern } from './filter/index.js';
export type { FilterOptions, FilterCheckResult } from './filter/index.js';

// Hashing
export { NodeContentHasher, hashBuffer, hashFile, isContentId } from './hash/index.js';
export type { ContentHasher, ContentId, HashAlgorithm } from './hash/index.js';

// Store
export { LocalDedupStore } from './store/index.js';

// Remote transports
export {
  HttpRepositoryClient,
  S3RepositoryClient,
  resolveRepoRef,
  parseListing,
} from './remote/index.js';
export type {
  FileInfo,
  FileList,
  RemoteRepositoryClient,
  RepoRef,
  RepoRefInput,
  RepoType,
  FetchBlobOptions,
  HttpRepositoryClientOptions,
  S3RepositoryClientOptions,
  S3Sender,
} from './remote/index.js';

// Download internals useful to embedders
export type { FileOutcome, FileSource } from './download/index.js';

// Retry
export { DEFAULT_RETRY_POLICY, computeBackoff, withRetry } from './retry/index.js';
export type { RetryPolicy, Sleeper } from './retry/index.js';

export { createLogger } from './logger.js';
