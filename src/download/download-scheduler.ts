/**
 * Fans a listing out over a bounded pool of workers and drives each file
 * through its state machine (see FileTaskState).
 *
 * Per file: skip when the destination already holds the listed content,
 * serve from the dedup store when possible, otherwise fetch under an
 * ingest lease with retries, verify, commit and finalize. Failures are
 * recorded per file; processing one file never throws.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import type { CancellationGate } from '../cancellation/index.js';
import {
  DownloadError,
  errorMessage,
  isDownloadError,
  toDownloadError,
} from '../errors/index.js';
import type { ContentHasher } from '../hash/types.js';
import type { ProgressAggregator } from '../progress/index.js';
import type { FileInfo, FileList, RemoteRepositoryClient } from '../remote/types.js';
import { withRetry } from '../retry/index.js';
import type { RetryPolicy, Sleeper } from '../retry/index.js';
import type { LocalDedupStore } from '../store/dedup-store.js';
import { StagedFile } from '../store/staged-file.js';
import type { Finalizer } from './finalizer.js';
import type { SnapshotStateManager } from './snapshot-state.js';
import type { FileOutcome, FileSource, FileTaskState, SchedulerStats } from './types.js';

export interface DownloadSchedulerOptions {
  remote: RemoteRepositoryClient;

  /** null when dedup is disabled: bytes are staged beside the destination */
  store: LocalDedupStore | null;

  hasher: ContentHasher;

  maxConcurrentDownloads: number;

  /** Re-hash store entries before trusting a dedup hit */
  verifyDedupHits: boolean;

  retryPolicy: RetryPolicy;

  sleep?: Sleeper;

  logger: Logger;
}

/** Everything one scheduling run needs besides the scheduler itself */
export interface ScheduleRequest {
  files: FileList;
  finalizer: Finalizer;
  state: SnapshotStateManager;
  gate: CancellationGate;
  progress: ProgressAggregator;

  /** Called as each file reaches a terminal state */
  onFileComplete?: (outcome: FileOutcome) => void;
}

export interface ScheduleResult {
  /** One outcome per file, in listing order */
  outcomes: FileOutcome[];

  /** Whether cancellation was observed at any point */
  cancelled: boolean;
}

/** Mutable per-file bookkeeping shared by the helpers of processFile */
interface FileTask {
  file: FileInfo;
  request: ScheduleRequest;
  state: FileTaskState;
  attempts: number;
  bytesFetched: number;
  staged: StagedFile | null;
}

export class DownloadScheduler {
  private readonly remote: RemoteRepositoryClient;
  private readonly store: LocalDedupStore | null;
  private readonly hasher: ContentHasher;
  private readonly maxConcurrentDownloads: number;
  private readonly verifyDedupHits: boolean;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleeper | undefined;
  private readonly logger: Logger;

  private readonly stats: SchedulerStats = {
    filesDownloaded: 0,
    dedupHits: 0,
    upToDate: 0,
    bytesFetched: 0,
    retries: 0,
    failures: 0,
  };

  constructor(options: DownloadSchedulerOptions) {
    this.remote = options.remote;
    this.store = options.store;
    this.hasher = options.hasher;
    this.maxConcurrentDownloads = Math.max(1, options.maxConcurrentDownloads);
    this.verifyDedupHits = options.verifyDedupHits;
    this.retryPolicy = options.retryPolicy;
    this.sleep = options.sleep;
    this.logger = options.logger.child({ component: 'download-scheduler' });
  }

  getStats(): SchedulerStats {
    return { ...this.stats };
  }

  /**
   * Process every file with at most maxConcurrentDownloads in flight.
   * Resolves once every file has reached a terminal state.
   */
  async run(request: ScheduleRequest): Promise<ScheduleResult> {
    const outcomes: Array<FileOutcome | undefined> = request.files.map(() => undefined);
    const queue = request.files.map((file, index) => ({ file, index }));

    const worker = async (): Promise<void> => {
      for (let item = queue.shift(); item !== undefined; item = queue.shift()) {
        const outcome = await this.processFile(item.file, request);
        outcomes[item.index] = outcome;
        this.notify(request, outcome);
      }
    };

    const concurrency = Math.min(this.maxConcurrentDownloads, queue.length);
    await Promise.all(Array.from({ length: concurrency }, () => worker()));

    return {
      outcomes: outcomes.filter((outcome): outcome is FileOutcome => outcome !== undefined),
      cancelled: request.gate.isCancelled(),
    };
  }

  /**
   * Drive one file to a terminal state.
   */
  async processFile(file: FileInfo, request: ScheduleRequest): Promise<FileOutcome> {
    const startTime = Date.now();
    const task: FileTask = {
      file,
      request,
      state: 'pending',
      attempts: 0,
      bytesFetched: 0,
      staged: null,
    };

    try {
      request.gate.check({ path: file.path });
      const destination = request.finalizer.resolveDestination(file.path);

      let source: FileSource;
      let localPath: string;

      if (await request.state.isMaterialized(file, destination)) {
        this.transition(task, 'up-to-date');
        source = 'up-to-date';
        localPath = destination;
        this.stats.upToDate++;
      } else if (this.store) {
        source = await this.ensureInStore(task, this.store);
        this.transition(task, 'finalizing');
        localPath = await request.finalizer.materialize(file, {
          kind: 'blob',
          blobPath: this.store.entryPath(file.contentId),
        });
      } else {
        const directory = path.dirname(destination);
        const prefix = path.basename(destination);
        source = 'network';
        localPath = await this.fetchWithRetry(
          task,
          () => StagedFile.create(directory, this.hasher, { errorCode: 'MATERIALIZE', prefix }),
          async (staged) => {
            this.transition(task, 'finalizing');
            return request.finalizer.materialize(file, { kind: 'staged', staged });
          }
        );
      }

      if (source === 'dedup') {
        this.stats.dedupHits++;
      } else if (source === 'network') {
        this.stats.filesDownloaded++;
      }
      task.state = 'done';
      request.progress.fileCompleted(file.path);

      this.logger.debug({ path: file.path, source, attempts: task.attempts }, 'File complete');
      return {
        path: file.path,
        contentId: file.contentId,
        size: file.size,
        state: 'done',
        source,
        localPath,
        bytesFetched: task.bytesFetched,
        attempts: task.attempts,
        durationMs: Date.now() - startTime,
      };
    } catch (err) {
      const error = toDownloadError(err, 'TRANSPORT', { path: file.path, contentId: file.contentId });
      const state = error.code === 'CANCELLED' ? 'cancelled' : 'failed';
      if (state === 'failed') {
        this.stats.failures++;
        this.logger.error(
          { path: file.path, code: error.code, attempts: task.attempts, from: task.state, error: error.message },
          'File failed'
        );
      } else {
        this.logger.debug({ path: file.path, from: task.state }, 'File cancelled');
      }
      task.state = state;

      return {
        path: file.path,
        contentId: file.contentId,
        size: file.size,
        state,
        bytesFetched: task.bytesFetched,
        attempts: task.attempts,
        error,
        durationMs: Date.now() - startTime,
      };
    } finally {
      if (task.staged) {
        await task.staged.discard();
        task.staged = null;
      }
    }
  }

  /**
   * Make sure the store holds the file's content id, fetching it under a
   * lease when it does not. Tasks that find the lease taken wait for the
   * holder and look again.
   */
  private async ensureInStore(task: FileTask, store: LocalDedupStore): Promise<'dedup' | 'network'> {
    const { file } = task;

    for (;;) {
      task.request.gate.check({ path: file.path });
      if (await this.checkDedupHit(store, file)) {
        this.transition(task, 'dedup-hit');
        return 'dedup';
      }

      const reservation = store.reserve(file.contentId);
      if (!reservation.acquired) {
        this.logger.debug({ path: file.path, contentId: file.contentId }, 'Waiting for in-flight ingest');
        await reservation.settled;
        continue;
      }

      try {
        // Another task may have committed between the check and the lease
        if (await this.checkDedupHit(store, file)) {
          this.transition(task, 'dedup-hit');
          return 'dedup';
        }
        await this.fetchWithRetry(
          task,
          () => store.openStaged(),
          (staged) => store.commit(staged, file.contentId)
        );
        return 'network';
      } finally {
        reservation.lease.release();
      }
    }
  }

  private async checkDedupHit(store: LocalDedupStore, file: FileInfo): Promise<boolean> {
    if (!(await store.has(file.contentId))) {
      return false;
    }
    if (!this.verifyDedupHits || (await store.verifyEntry(file.contentId))) {
      return true;
    }
    this.logger.warn({ path: file.path, contentId: file.contentId }, 'Store entry failed verification, evicting');
    await store.remove(file.contentId);
    return false;
  }

  /**
   * Fetch into a staged file, verify size and digest, and hand the staged
   * file to `commit`. TRANSPORT and CORRUPTION are retried; a transport
   * failure after some bytes arrived resumes from the staged length.
   */
  private async fetchWithRetry<T>(
    task: FileTask,
    openStaged: () => Promise<StagedFile>,
    commit: (staged: StagedFile) => Promise<T>
  ): Promise<T> {
    const { file, request } = task;
    let resumable = false;

    return withRetry(
      async (attempt) => {
        task.attempts = attempt;
        if (task.staged && !resumable) {
          await task.staged.discard();
          task.staged = null;
        }
        resumable = false;

        const staged = task.staged ?? (await openStaged());
        task.staged = staged;
        this.transition(task, 'fetching');

        try {
          for await (const chunk of this.remote.fetchBlob(file.contentId, { offset: staged.bytes })) {
            if (staged.bytes + chunk.length > file.size) {
              throw new DownloadError('CORRUPTION', `Received more bytes than listed for ${file.path}`, {
                path: file.path,
                contentId: file.contentId,
                expected: String(file.size),
                actual: String(staged.bytes + chunk.length),
              });
            }
            await staged.write(chunk);
            task.bytesFetched += chunk.length;
            this.stats.bytesFetched += chunk.length;
            request.progress.fileProgress(file.path, staged.bytes);
            request.gate.check({ path: file.path });
          }
        } catch (err) {
          resumable = isDownloadError(err) && err.code === 'TRANSPORT' && staged.bytes > 0;
          throw err;
        }

        this.transition(task, 'verifying');
        if (staged.bytes !== file.size) {
          throw new DownloadError('CORRUPTION', `Size mismatch for ${file.path}`, {
            path: file.path,
            contentId: file.contentId,
            expected: String(file.size),
            actual: String(staged.bytes),
          });
        }
        const actual = await staged.close();
        if (actual !== file.contentId) {
          throw new DownloadError('CORRUPTION', `Content hash mismatch for ${file.path}`, {
            path: file.path,
            contentId: file.contentId,
            expected: file.contentId,
            actual,
          });
        }

        const committed = await commit(staged);
        task.staged = null;
        return committed;
      },
      this.retryPolicy,
      {
        sleep: this.sleep,
        beforeAttempt: () => request.gate.check({ path: file.path }),
        onRetry: ({ attempt, delayMs, error }) => {
          this.stats.retries++;
          this.logger.warn(
            { path: file.path, attempt, delayMs, resume: resumable, error: errorMessage(error) },
            'Fetch failed, retrying'
          );
        },
      }
    ).catch((err: unknown) => {
      throw toDownloadError(err, 'TRANSPORT', { attempts: task.attempts });
    });
  }

  /**
   * Move a task to its next state. Cancellation is polled at every
   * transition.
   */
  private transition(task: FileTask, next: FileTaskState): void {
    this.logger.trace({ path: task.file.path, from: task.state, to: next }, 'File state');
    task.state = next;
    task.request.gate.check({ path: task.file.path });
  }

  private notify(request: ScheduleRequest, outcome: FileOutcome): void {
    if (!request.onFileComplete) {
      return;
    }
    try {
      request.onFileComplete(outcome);
    } catch (err) {
      this.logger.warn({ path: outcome.path, error: errorMessage(err) }, 'File completion listener threw');
    }
  }
}
