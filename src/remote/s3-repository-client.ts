/**
 * RemoteRepositoryClient backed by an S3 bucket.
 *
 * Bucket layout:
 *   {prefix}{repoType}s/{repoId}/revisions/{revision}.json   listing manifest
 *   {prefix}blobs/{contentId}                                 content
 *
 * The manifest has the same shape as the HTTP listing response.
 */

import { Readable } from 'node:stream';
import { GetObjectCommand, S3ServiceException } from '@aws-sdk/client-s3';
import type { GetObjectCommandOutput, S3Client } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import type { ContentId } from '../hash/types.js';
import { DownloadError, cancelledError, errorMessage } from '../errors/index.js';
import { DEFAULT_RETRY_POLICY, withRetry } from '../retry/index.js';
import type { RetryPolicy, Sleeper } from '../retry/index.js';
import { describeRepo, parseListing } from './listing.js';
import type { FetchBlobOptions, FileList, RemoteRepositoryClient, RepoRef } from './types.js';

/** The part of S3Client this transport uses */
export type S3Sender = Pick<S3Client, 'send'>;

export interface S3RepositoryClientOptions {
  client: S3Sender;

  bucket: string;

  /** Key prefix, e.g. "mirror/" (default: none) */
  prefix?: string;

  /** Retry policy for manifest requests */
  retryPolicy?: RetryPolicy;

  sleep?: Sleeper;

  logger: Logger;
}

const NOT_FOUND_NAMES = new Set(['NoSuchKey', 'NotFound', 'NoSuchBucket']);
const AUTH_NAMES = new Set([
  'AccessDenied',
  'Forbidden',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
  'InvalidToken',
]);

/**
 * Map an error raised by the S3 client to a DownloadError.
 */
export function classifyS3Error(err: unknown, key: string, signal?: AbortSignal): DownloadError {
  if (err instanceof DownloadError) {
    return err;
  }
  if (err instanceof S3ServiceException) {
    const statusCode = err.$metadata.httpStatusCode;
    const details = statusCode !== undefined ? { statusCode } : {};
    if (NOT_FOUND_NAMES.has(err.name) || statusCode === 404) {
      return new DownloadError('NOT_FOUND', `Not found: s3 key ${key}`, details, err);
    }
    if (AUTH_NAMES.has(err.name) || statusCode === 401 || statusCode === 403) {
      return new DownloadError('AUTH', `Access denied for s3 key ${key}: ${err.name}`, details, err);
    }
    return new DownloadError('TRANSPORT', `S3 request for ${key} failed: ${err.name}`, details, err);
  }
  if (signal?.aborted) {
    return cancelledError();
  }
  return new DownloadError('TRANSPORT', `S3 request for ${key} failed: ${errorMessage(err)}`, {}, err);
}

/**
 * Iterate the chunks of a GetObject body.
 */
async function* readBody(body: GetObjectCommandOutput['Body'], key: string): AsyncGenerator<Uint8Array> {
  if (body === undefined) {
    throw new DownloadError('TRANSPORT', `S3 response body for ${key} is empty`);
  }

  if (body instanceof Readable) {
    const stream: AsyncIterable<unknown> = body;
    for await (const chunk of stream) {
      if (chunk instanceof Uint8Array) {
        yield chunk;
      } else if (typeof chunk === 'string') {
        yield Buffer.from(chunk);
      } else {
        throw new DownloadError('TRANSPORT', `Unexpected chunk type in S3 body for ${key}`);
      }
    }
    return;
  }

  yield await body.transformToByteArray();
}

export class S3RepositoryClient implements RemoteRepositoryClient {
  private readonly client: S3Sender;
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleeper | undefined;
  private readonly logger: Logger;

  constructor(options: S3RepositoryClientOptions) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.prefix = options.prefix ?? '';
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
    this.logger = options.logger.child({ component: 's3-remote' });
  }

  manifestKey(repo: RepoRef): string {
    return `${this.prefix}${repo.repoType}s/${repo.repoId}/revisions/${repo.revision}.json`;
  }

  blobKey(contentId: ContentId): string {
    return `${this.prefix}blobs/${contentId}`;
  }

  async listFiles(repo: RepoRef): Promise<FileList> {
    const key = this.manifestKey(repo);
    const source = `s3://${this.bucket}/${key}`;

    const files = await withRetry(
      async () => {
        const chunks: Uint8Array[] = [];
        for await (const chunk of this.fetchKey(key, 0)) {
          chunks.push(chunk);
        }
        let parsed: unknown;
        try {
          parsed = JSON.parse(Buffer.concat(chunks).toString('utf-8'));
        } catch (err) {
          throw new DownloadError('TRANSPORT', `Malformed listing from ${source}: invalid JSON`, {}, err);
        }
        return parseListing(parsed, source);
      },
      this.retryPolicy,
      {
        sleep: this.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn(
            { repo: describeRepo(repo), attempt, delayMs, error: errorMessage(error) },
            'Manifest request failed, retrying'
          );
        },
      }
    );
    this.logger.debug({ repo: describeRepo(repo), files: files.length }, 'Manifest received');
    return files;
  }

  fetchBlob(contentId: ContentId, options: FetchBlobOptions = {}): AsyncIterable<Uint8Array> {
    return this.fetchKey(this.blobKey(contentId), options.offset ?? 0, options.signal);
  }

  private async *fetchKey(key: string, offset: number, signal?: AbortSignal): AsyncGenerator<Uint8Array> {
    let response: GetObjectCommandOutput;
    try {
      response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Range: offset > 0 ? `bytes=${offset}-` : undefined,
        }),
        { abortSignal: signal }
      );
    } catch (err) {
      throw classifyS3Error(err, key, signal);
    }

    try {
      yield* readBody(response.Body, key);
    } catch (err) {
      throw classifyS3Error(err, key, signal);
    }
  }
}
