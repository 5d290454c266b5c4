/**
 * Client facade: owns configuration, the dedup store, the remote transport,
 * the progress subscription slot and lifecycle.
 *
 * @example
 * ```ts
 * const client = createClient({ endpoint: 'https://store.example.com' });
 * client.setProgressHandler((update) => render(update));
 *
 * const root = await client.downloadSnapshot({
 *   repoId: 'acme/tiny-model',
 *   allowPatterns: ['*.json', 'weights/**'],
 * });
 *
 * client.release();
 * ```
 */

import { EventEmitter } from 'node:events';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { CancellationGate } from '../cancellation/index.js';
import { DownloadScheduler, Finalizer, SnapshotStateManager } from '../download/index.js';
import type { FileOutcome, ScheduleResult } from '../download/index.js';
import {
  DownloadError,
  cancelledError,
  errorMessage,
  isTransient,
  toDownloadError,
} from '../errors/index.js';
import type { FileFailure } from '../errors/index.js';
import { FileFilter } from '../filter/index.js';
import { NodeContentHasher } from '../hash/index.js';
import type { ContentHasher } from '../hash/index.js';
import { createLogger } from '../logger.js';
import { ProgressAggregator } from '../progress/index.js';
import type { ProgressHandler, ProgressSubscription } from '../progress/index.js';
import {
  HttpRepositoryClient,
  describeRepo,
  isSafeRelativePath,
  resolveRepoRef,
} from '../remote/index.js';
import type { FileInfo, FileList, RemoteRepositoryClient, RepoRef, RepoRefInput } from '../remote/index.js';
import type { RetryPolicy } from '../retry/index.js';
import { LocalDedupStore } from '../store/index.js';
import { buildClientConfig, validateClientConfig } from './config.js';
import type {
  ClientConfig,
  ClientDependencies,
  ClientEvents,
  ClientStats,
  DownloadFileRequest,
  OperationKind,
  OperationSummary,
  SnapshotRequest,
} from './types.js';

/**
 * Typed event emitter interface for the client.
 */
export interface TypedClientEmitter {
  on<K extends keyof ClientEvents>(event: K, listener: ClientEvents[K]): this;
  off<K extends keyof ClientEvents>(event: K, listener: ClientEvents[K]): this;
  emit<K extends keyof ClientEvents>(event: K, ...args: Parameters<ClientEvents[K]>): boolean;
}

export class ReposnapClient extends EventEmitter implements TypedClientEmitter {
  readonly config: ClientConfig;
  private readonly baseLogger: Logger;
  private readonly logger: Logger;
  private readonly hasher: ContentHasher;
  private readonly remote: RemoteRepositoryClient;
  private readonly store: LocalDedupStore | null;
  private readonly scheduler: DownloadScheduler;

  private progressSubscription: ProgressSubscription | null = null;
  private _released = false;
  private _activeOperations = 0;

  // Stats
  private _operationsStarted = 0;
  private _operationsSucceeded = 0;
  private _operationsFailed = 0;

  constructor(config: ClientConfig, deps: ClientDependencies = {}) {
    super();

    const errors = validateClientConfig(config, { requireEndpoint: deps.remote === undefined });
    if (errors.length > 0) {
      throw new DownloadError('INVALID_CONFIG', `Invalid client config: ${errors.join('; ')}`);
    }

    this.config = { ...config };
    this.baseLogger = deps.logger ?? createLogger({ level: config.logLevel });
    this.logger = this.baseLogger.child({ component: 'client' });
    this.hasher = deps.hasher ?? new NodeContentHasher(config.hashAlgorithm);

    const retryPolicy: RetryPolicy = {
      maxAttempts: config.maxAttempts,
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
      jitterRatio: config.retryJitterRatio,
      shouldRetry: isTransient,
    };

    this.remote =
      deps.remote ??
      new HttpRepositoryClient({
        endpoint: config.endpoint,
        token: config.token || undefined,
        requestTimeoutMs: config.requestTimeoutMs,
        retryPolicy,
        sleep: deps.sleep,
        fetchFn: deps.fetchFn,
        logger: this.baseLogger,
      });

    this.store = config.enableDedup
      ? new LocalDedupStore({ cacheDir: config.cacheDir }, this.hasher, this.baseLogger)
      : null;

    this.scheduler = new DownloadScheduler({
      remote: this.remote,
      store: this.store,
      hasher: this.hasher,
      maxConcurrentDownloads: config.maxConcurrentDownloads,
      verifyDedupHits: config.verifyDedupHits,
      retryPolicy,
      sleep: deps.sleep,
      logger: this.baseLogger,
    });
  }

  /** Whether release() has been called */
  get isReleased(): boolean {
    return this._released;
  }

  /** Number of operations currently running */
  get activeOperations(): number {
    return this._activeOperations;
  }

  /**
   * Register the progress handler, replacing any previous one. Running
   * operations pick it up on their next update.
   */
  setProgressHandler(handler: ProgressHandler, throttleMs: number = this.config.progressThrottleMs): void {
    this.assertUsable();
    if (!Number.isFinite(throttleMs) || throttleMs < 0) {
      throw new DownloadError('INVALID_ARGUMENT', `throttleMs must be a non-negative number, got ${throttleMs}`);
    }
    this.progressSubscription = { handler, throttleMs };
  }

  clearProgressHandler(): void {
    this.progressSubscription = null;
  }

  /**
   * List the files of a revision, in the remote's order.
   */
  async listFiles(input: RepoRefInput): Promise<FileList> {
    this.assertUsable();
    const repo = resolveRepoRef(input);
    return this.track('listFiles', repo, null, async (summary) => {
      const files = await this.remote.listFiles(repo);
      summary.filesTotal = files.length;
      return files;
    });
  }

  /**
   * Fetch one file and return its local path.
   *
   * @throws DownloadError with the file's own code on failure, CANCELLED
   *   when cancellation was requested
   */
  async downloadFile(request: DownloadFileRequest): Promise<string> {
    this.assertUsable();
    const repo = resolveRepoRef(request);
    const filename = request.filename.replace(/^\.?\/+/, '');
    if (!isSafeRelativePath(filename)) {
      throw new DownloadError('INVALID_ARGUMENT', `Invalid filename: ${JSON.stringify(request.filename)}`);
    }

    const progress = this.createProgress();
    return this.track('downloadFile', repo, progress, async (summary) => {
      const gate = new CancellationGate(request.cancellationToken);
      progress.start();

      const listing = await this.remote.listFiles(repo);
      gate.check();
      const file = listing.find((entry) => entry.path === filename);
      if (!file) {
        throw new DownloadError('NOT_FOUND', `File ${filename} not found in ${describeRepo(repo)}`, {
          path: filename,
        });
      }
      progress.setFiles([file]);

      const rootDir = request.localDir ?? this.defaultLocalDir(repo);
      const result = await this.schedule(repo, rootDir, [file], gate, progress, summary);
      if (result.cancelled) {
        throw cancelledError({ path: filename });
      }

      const [outcome] = result.outcomes;
      if (outcome?.state !== 'done' || outcome.localPath === undefined) {
        throw outcome?.error ?? new DownloadError('TRANSPORT', `Download of ${filename} did not complete`);
      }
      summary.localPath = outcome.localPath;
      return outcome.localPath;
    });
  }

  /**
   * Fetch every listed file that passes the allow/ignore filter and return
   * the snapshot root.
   *
   * @throws DownloadError PARTIAL_FAILURE when some files failed; the first
   *   failure's code when all failed; CANCELLED when cancelled
   */
  async downloadSnapshot(request: SnapshotRequest): Promise<string> {
    this.assertUsable();
    const repo = resolveRepoRef(request);
    const filter = new FileFilter({
      allowPatterns: request.allowPatterns,
      ignorePatterns: request.ignorePatterns,
    });

    const progress = this.createProgress();
    return this.track('downloadSnapshot', repo, progress, async (summary) => {
      const gate = new CancellationGate(request.cancellationToken);
      progress.start();

      const listing = await this.remote.listFiles(repo);
      gate.check();
      const files = filter.apply(listing);
      this.logger.info(
        { repo: describeRepo(repo), listed: listing.length, selected: files.length },
        'Snapshot resolved'
      );
      progress.setFiles(files);

      const rootDir = path.resolve(request.localDir ?? this.defaultLocalDir(repo));
      try {
        await fsp.mkdir(rootDir, { recursive: true });
      } catch (err) {
        throw toDownloadError(err, 'MATERIALIZE');
      }

      const result = await this.schedule(repo, rootDir, files, gate, progress, summary);
      if (result.cancelled) {
        throw cancelledError();
      }

      const failures: FileFailure[] = [];
      let firstError: DownloadError | undefined;
      for (const outcome of result.outcomes) {
        if (outcome.state !== 'done' && outcome.error) {
          failures.push({ path: outcome.path, code: outcome.error.code, message: outcome.error.message });
          firstError ??= outcome.error;
        }
      }

      if (firstError && failures.length === files.length) {
        throw firstError.withDetails({ failures });
      }
      if (failures.length > 0) {
        throw new DownloadError(
          'PARTIAL_FAILURE',
          `${failures.length} of ${files.length} files failed`,
          { failures }
        );
      }

      summary.localPath = rootDir;
      return rootDir;
    });
  }

  /**
   * Release the client. Fails while operations are outstanding; a second
   * call is a no-op.
   */
  release(): void {
    if (this._released) {
      return;
    }
    if (this._activeOperations > 0) {
      throw new DownloadError(
        'INVALID_STATE',
        `Cannot release client with ${this._activeOperations} operation(s) outstanding`
      );
    }
    this._released = true;
    this.progressSubscription = null;
    this.removeAllListeners();
    this.logger.debug('Client released');
  }

  getStats(): ClientStats {
    const scheduler = this.scheduler.getStats();
    return {
      released: this._released,
      activeOperations: this._activeOperations,
      operationsStarted: this._operationsStarted,
      operationsSucceeded: this._operationsSucceeded,
      operationsFailed: this._operationsFailed,
      filesDownloaded: scheduler.filesDownloaded,
      dedupHits: scheduler.dedupHits,
      upToDate: scheduler.upToDate,
      bytesFetched: scheduler.bytesFetched,
      retries: scheduler.retries,
      fileFailures: scheduler.failures,
      storeWrites: this.store?.getStats().writes ?? 0,
    };
  }

  /**
   * Default destination: <cacheDir>/snapshots/<type>s--<org>--<name>/<revision>
   */
  defaultLocalDir(repo: RepoRef): string {
    const repoDir = `${repo.repoType}s--${repo.repoId.split('/').join('--')}`;
    return path.join(this.config.cacheDir, 'snapshots', repoDir, encodeURIComponent(repo.revision));
  }

  private assertUsable(): void {
    if (this._released) {
      throw new DownloadError('INVALID_STATE', 'Client has been released');
    }
  }

  private createProgress(): ProgressAggregator {
    return new ProgressAggregator(() => this.progressSubscription, this.baseLogger);
  }

  /**
   * Run the scheduler over `files` into `rootDir`, then persist snapshot
   * bookkeeping.
   */
  private async schedule(
    repo: RepoRef,
    rootDir: string,
    files: readonly FileInfo[],
    gate: CancellationGate,
    progress: ProgressAggregator,
    summary: OperationSummary
  ): Promise<ScheduleResult> {
    const state = new SnapshotStateManager(rootDir, repo, this.baseLogger);
    state.load();
    const finalizer = new Finalizer(rootDir, state, this.baseLogger);

    progress.setPhase('downloading');
    const result = await this.scheduler.run({
      files,
      finalizer,
      state,
      gate,
      progress,
      onFileComplete: (outcome: FileOutcome) => {
        this.emit('fileComplete', outcome);
      },
    });
    progress.setPhase('finalizing');

    for (const outcome of result.outcomes) {
      summary.bytesFetched += outcome.bytesFetched;
      if (outcome.state === 'failed') {
        summary.filesFailed++;
      } else if (outcome.state === 'cancelled') {
        summary.filesCancelled++;
      } else if (outcome.source === 'dedup') {
        summary.dedupHits++;
      } else if (outcome.source === 'up-to-date') {
        summary.upToDate++;
      } else {
        summary.filesDownloaded++;
      }
    }

    if (!result.cancelled && result.outcomes.every((outcome) => outcome.state === 'done')) {
      state.recordCompletion(repo.revision);
    }
    try {
      state.save();
    } catch (err) {
      throw toDownloadError(err, 'MATERIALIZE');
    }
    return result;
  }

  /**
   * Bookkeeping shared by every public operation: outstanding count,
   * events, stats, logging and the final progress update.
   */
  private async track<T>(
    operation: OperationKind,
    repo: RepoRef,
    progress: ProgressAggregator | null,
    body: (summary: OperationSummary) => Promise<T>
  ): Promise<T> {
    const startTime = Date.now();
    const summary: OperationSummary = {
      operation,
      repo,
      localPath: null,
      filesTotal: 0,
      filesDownloaded: 0,
      dedupHits: 0,
      upToDate: 0,
      filesFailed: 0,
      filesCancelled: 0,
      bytesFetched: 0,
      durationMs: 0,
    };

    this._activeOperations++;
    this._operationsStarted++;
    this.logger.debug({ operation, repo: describeRepo(repo) }, 'Operation started');
    this.emit('operationStart', operation, repo);

    try {
      const value = await body(summary);
      this._operationsSucceeded++;
      return value;
    } catch (err) {
      const error = toDownloadError(err, 'TRANSPORT');
      summary.error = error;
      this._operationsFailed++;
      if (error.code === 'CANCELLED') {
        this.logger.info({ operation, repo: describeRepo(repo) }, 'Operation cancelled');
      } else {
        this.logger.error(
          { operation, repo: describeRepo(repo), code: error.code, error: errorMessage(error) },
          'Operation failed'
        );
      }
      throw error;
    } finally {
      progress?.finish();
      this._activeOperations--;
      summary.durationMs = Date.now() - startTime;
      if (progress) {
        summary.filesTotal = progress.snapshot().totalFiles;
      }
      this.emit('operationComplete', summary);
    }
  }
}

/**
 * Build a client from environment variables plus overrides.
 */
export function createClient(
  overrides?: Partial<ClientConfig>,
  deps?: ClientDependencies
): ReposnapClient {
  return new ReposnapClient(buildClientConfig(overrides), deps);
}
