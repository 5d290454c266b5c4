/**
 * RemoteRepositoryClient over HTTP, using the global fetch.
 *
 * Endpoints:
 *   GET {endpoint}/api/{repoType}s/{repoId}/revisions/{revision}/files
 *   GET {endpoint}/api/blobs/{contentId}        (optional Range header)
 *
 * Status mapping: 404 -> NOT_FOUND, 401/403 -> AUTH, everything else that
 * is not 2xx (and network failures or timeouts) -> TRANSPORT.
 */

import type { Logger } from 'pino';
import type { ContentId } from '../hash/types.js';
import { DownloadError, cancelledError, errorMessage } from '../errors/index.js';
import { DEFAULT_RETRY_POLICY, withRetry } from '../retry/index.js';
import type { RetryPolicy, Sleeper } from '../retry/index.js';
import { describeRepo, parseListing } from './listing.js';
import type { FetchBlobOptions, FileList, RemoteRepositoryClient, RepoRef } from './types.js';

export interface HttpRepositoryClientOptions {
  /** Base URL of the store, e.g. https://store.example.com */
  endpoint: string;

  /** Sent as a bearer token when set */
  token?: string;

  /** Idle timeout per request in ms: headers, and each body chunk (default: 60000) */
  requestTimeoutMs?: number;

  /** Retry policy for listing requests */
  retryPolicy?: RetryPolicy;

  sleep?: Sleeper;

  /** Injected in tests */
  fetchFn?: typeof fetch;

  logger: Logger;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

/**
 * Map a non-2xx status to a DownloadError.
 */
export function errorForStatus(status: number, url: string): DownloadError {
  const details = { statusCode: status };
  if (status === 404) {
    return new DownloadError('NOT_FOUND', `Not found: ${url}`, details);
  }
  if (status === 401 || status === 403) {
    return new DownloadError('AUTH', `Authentication failed (HTTP ${status}) for ${url}`, details);
  }
  return new DownloadError('TRANSPORT', `Request to ${url} failed with HTTP ${status}`, details);
}

/**
 * Abort controller with an idle timer, chained to the caller's signal.
 */
class RequestDeadline {
  private readonly controller = new AbortController();
  private readonly timeoutMs: number;
  private readonly callerSignal: AbortSignal | undefined;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private timedOut = false;

  private readonly onCallerAbort = (): void => {
    this.controller.abort();
  };

  constructor(timeoutMs: number, callerSignal?: AbortSignal) {
    this.timeoutMs = timeoutMs;
    this.callerSignal = callerSignal;
    if (callerSignal?.aborted) {
      this.controller.abort();
    } else {
      callerSignal?.addEventListener('abort', this.onCallerAbort, { once: true });
    }
    this.arm();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** (Re)start the idle timer */
  arm(): void {
    this.disarm();
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, this.timeoutMs);
    this.timer.unref();
  }

  disarm(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  dispose(): void {
    this.disarm();
    this.callerSignal?.removeEventListener('abort', this.onCallerAbort);
  }

  /** Classify an error thrown by fetch or a body read */
  toError(err: unknown, url: string): DownloadError {
    if (err instanceof DownloadError) {
      return err;
    }
    if (this.timedOut) {
      return new DownloadError('TRANSPORT', `Request to ${url} timed out after ${this.timeoutMs}ms`, {}, err);
    }
    if (this.callerSignal?.aborted) {
      return cancelledError();
    }
    return new DownloadError('TRANSPORT', `Request to ${url} failed: ${errorMessage(err)}`, {}, err);
  }
}

export class HttpRepositoryClient implements RemoteRepositoryClient {
  private readonly endpoint: string;
  private readonly token: string | undefined;
  private readonly requestTimeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleeper | undefined;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(options: HttpRepositoryClientOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.token = options.token;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = options.logger.child({ component: 'http-remote' });
  }

  listingUrl(repo: RepoRef): string {
    const repoPath = repo.repoId.split('/').map(encodeURIComponent).join('/');
    return `${this.endpoint}/api/${repo.repoType}s/${repoPath}/revisions/${encodeURIComponent(repo.revision)}/files`;
  }

  blobUrl(contentId: ContentId): string {
    return `${this.endpoint}/api/blobs/${encodeURIComponent(contentId)}`;
  }

  async listFiles(repo: RepoRef): Promise<FileList> {
    const url = this.listingUrl(repo);
    const files = await withRetry(
      async () => parseListing(await this.requestJson(url), url),
      this.retryPolicy,
      {
        sleep: this.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn(
            { repo: describeRepo(repo), attempt, delayMs, error: errorMessage(error) },
            'Listing request failed, retrying'
          );
        },
      }
    );
    this.logger.debug({ repo: describeRepo(repo), files: files.length }, 'Listing received');
    return files;
  }

  async *fetchBlob(contentId: ContentId, options: FetchBlobOptions = {}): AsyncGenerator<Uint8Array> {
    const url = this.blobUrl(contentId);
    const offset = options.offset ?? 0;
    const headers: Record<string, string> = offset > 0 ? { Range: `bytes=${offset}-` } : {};
    const deadline = new RequestDeadline(this.requestTimeoutMs, options.signal);

    try {
      const response = await this.send(url, headers, deadline);
      if (response.body === null) {
        return;
      }

      // A server that ignores Range sends the whole body; drop the prefix
      let skip = offset > 0 && response.status !== 206 ? offset : 0;
      const reader = response.body.getReader();
      try {
        for (;;) {
          deadline.arm();
          const result = await reader.read().catch((err: unknown) => {
            throw deadline.toError(err, url);
          });
          deadline.disarm();
          if (result.done) {
            return;
          }

          let chunk = result.value;
          if (skip > 0) {
            if (chunk.length <= skip) {
              skip -= chunk.length;
              continue;
            }
            chunk = chunk.subarray(skip);
            skip = 0;
          }
          yield chunk;
        }
      } finally {
        await reader.cancel().catch((err: unknown) => {
          this.logger.debug({ contentId, error: errorMessage(err) }, 'Failed to cancel response body');
        });
      }
    } finally {
      deadline.dispose();
    }
  }

  private async requestJson(url: string): Promise<unknown> {
    const deadline = new RequestDeadline(this.requestTimeoutMs);
    try {
      const response = await this.send(url, { Accept: 'application/json' }, deadline);
      let text: string;
      try {
        text = await response.text();
      } catch (err) {
        throw deadline.toError(err, url);
      }
      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch (err) {
        throw new DownloadError('TRANSPORT', `Malformed listing from ${url}: invalid JSON`, {}, err);
      }
    } finally {
      deadline.dispose();
    }
  }

  private async send(
    url: string,
    headers: Record<string, string>,
    deadline: RequestDeadline
  ): Promise<Response> {
    const allHeaders: Record<string, string> = { ...headers };
    if (this.token) {
      allHeaders['Authorization'] = `Bearer ${this.token}`;
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, { headers: allHeaders, signal: deadline.signal });
    } catch (err) {
      throw deadline.toError(err, url);
    }

    if (!response.ok) {
      throw errorForStatus(response.status, url);
    }
    return response;
  }
}
