import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { Readable } from 'node:stream';
import { GetObjectCommand, NoSuchKey, S3ServiceException } from '@aws-sdk/client-s3';
import { S3RepositoryClient, classifyS3Error } from '../remote/s3-repository-client.js';
import type { S3Sender } from '../remote/s3-repository-client.js';
import { DownloadError, isTransient } from '../errors/index.js';
import { hashBuffer } from '../hash/index.js';
import type { RepoRef } from '../remote/types.js';
import { createSilentLogger, noSleep } from './helpers/memory-repository.js';

const REPO: RepoRef = { repoId: 'acme/widgets', repoType: 'model', revision: 'main' };

interface FakeObject {
  Body?: unknown;
  $metadata: Record<string, unknown>;
}

type SendFn = (command: GetObjectCommand, options?: { abortSignal?: AbortSignal }) => Promise<FakeObject>;

function objectOf(...chunks: string[]): FakeObject {
  return { Body: Readable.from(chunks.map((chunk) => Buffer.from(chunk))), $metadata: {} };
}

function serviceError(name: string, httpStatusCode: number): S3ServiceException {
  return new S3ServiceException({
    name,
    $fault: httpStatusCode >= 500 ? 'server' : 'client',
    $metadata: { httpStatusCode },
    message: `${name} from test`,
  });
}

async function collect(chunks: AsyncIterable<Uint8Array>): Promise<string> {
  const parts: Buffer[] = [];
  for await (const chunk of chunks) {
    parts.push(Buffer.from(chunk));
  }
  return Buffer.concat(parts).toString('utf-8');
}

describe('S3RepositoryClient', () => {
  let send: Mock<SendFn>;
  let client: S3RepositoryClient;

  beforeEach(() => {
    send = vi.fn<SendFn>();
    client = new S3RepositoryClient({
      client: { send } as unknown as S3Sender,
      bucket: 'test-bucket',
      prefix: 'mirror/',
      retryPolicy: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0, jitterRatio: 0, shouldRetry: isTransient },
      sleep: noSleep,
      logger: createSilentLogger(),
    });
  });

  describe('keys', () => {
    it('should lay out manifests and blobs under the prefix', () => {
      expect(client.manifestKey(REPO)).toBe('mirror/models/acme/widgets/revisions/main.json');
      expect(client.blobKey('abc123')).toBe('mirror/blobs/abc123');
    });
  });

  describe('listFiles', () => {
    it('should read and parse the manifest', async () => {
      const manifest = JSON.stringify({
        files: [{ path: 'a.txt', contentId: hashBuffer(Buffer.from('a')), size: 1 }],
      });
      send.mockResolvedValueOnce(objectOf(manifest.slice(0, 10), manifest.slice(10)));

      const files = await client.listFiles(REPO);

      expect(files.map((file) => file.path)).toEqual(['a.txt']);
      const command = send.mock.calls[0]?.[0];
      expect(command).toBeInstanceOf(GetObjectCommand);
      expect(command?.input).toEqual({
        Bucket: 'test-bucket',
        Key: 'mirror/models/acme/widgets/revisions/main.json',
        Range: undefined,
      });
    });

    it('should map a missing manifest to NOT_FOUND without retrying', async () => {
      send.mockRejectedValue(new NoSuchKey({ $metadata: { httpStatusCode: 404 }, message: 'missing' }));

      await expect(client.listFiles(REPO)).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Not found: s3 key mirror/models/acme/widgets/revisions/main.json',
      });
      expect(send).toHaveBeenCalledTimes(1);
    });

    it('should retry a server error', async () => {
      const manifest = JSON.stringify({ files: [] });
      send
        .mockRejectedValueOnce(serviceError('InternalError', 500))
        .mockResolvedValueOnce(objectOf(manifest));

      await expect(client.listFiles(REPO)).resolves.toEqual([]);
      expect(send).toHaveBeenCalledTimes(2);
    });

    it('should reject a manifest that is not JSON', async () => {
      send.mockImplementation(async () => objectOf('not json'));

      await expect(client.listFiles(REPO)).rejects.toMatchObject({
        code: 'TRANSPORT',
        message: 'Malformed listing from s3://test-bucket/mirror/models/acme/widgets/revisions/main.json: invalid JSON',
      });
    });
  });

  describe('fetchBlob', () => {
    it('should stream the object body', async () => {
      send.mockResolvedValueOnce(objectOf('hello ', 'world'));

      await expect(collect(client.fetchBlob('abc123'))).resolves.toBe('hello world');
      expect(send.mock.calls[0]?.[0].input.Key).toBe('mirror/blobs/abc123');
    });

    it('should request a range when resuming', async () => {
      send.mockResolvedValueOnce(objectOf('world'));

      await collect(client.fetchBlob('abc123', { offset: 6 }));

      expect(send.mock.calls[0]?.[0].input.Range).toBe('bytes=6-');
    });

    it('should pass the caller signal to the SDK', async () => {
      const controller = new AbortController();
      send.mockResolvedValueOnce(objectOf('x'));

      await collect(client.fetchBlob('abc123', { signal: controller.signal }));

      expect(send.mock.calls[0]?.[1]).toEqual({ abortSignal: controller.signal });
    });

    it('should read bodies that are not node streams', async () => {
      send.mockResolvedValueOnce({
        Body: { transformToByteArray: async () => new Uint8Array(Buffer.from('bytes')) },
        $metadata: {},
      });

      await expect(collect(client.fetchBlob('abc123'))).resolves.toBe('bytes');
    });

    it('should fail on a missing body', async () => {
      send.mockResolvedValueOnce({ $metadata: {} });

      await expect(collect(client.fetchBlob('abc123'))).rejects.toMatchObject({
        code: 'TRANSPORT',
        message: 'S3 response body for mirror/blobs/abc123 is empty',
      });
    });

    it('should report a broken stream as TRANSPORT', async () => {
      const body = new Readable({
        read() {
          this.destroy(new Error('socket hang up'));
        },
      });
      send.mockResolvedValueOnce({ Body: body, $metadata: {} });

      await expect(collect(client.fetchBlob('abc123'))).rejects.toMatchObject({
        code: 'TRANSPORT',
        message: 'S3 request for mirror/blobs/abc123 failed: socket hang up',
      });
    });
  });
});

describe('classifyS3Error', () => {
  it('should map service errors by name and status', () => {
    expect(classifyS3Error(serviceError('NoSuchBucket', 404), 'k').code).toBe('NOT_FOUND');
    expect(classifyS3Error(serviceError('AccessDenied', 403), 'k')).toMatchObject({
      code: 'AUTH',
      message: 'Access denied for s3 key k: AccessDenied',
      details: { statusCode: 403 },
    });
    expect(classifyS3Error(serviceError('ExpiredToken', 400), 'k').code).toBe('AUTH');
    expect(classifyS3Error(serviceError('SlowDown', 503), 'k').code).toBe('TRANSPORT');
  });

  it('should pass DownloadErrors through', () => {
    const original = new DownloadError('CORRUPTION', 'bad bytes');
    expect(classifyS3Error(original, 'k')).toBe(original);
  });

  it('should report CANCELLED once the signal aborted', () => {
    const controller = new AbortController();
    controller.abort();

    expect(classifyS3Error(new Error('aborted'), 'k', controller.signal).code).toBe('CANCELLED');
  });

  it('should report other errors as TRANSPORT', () => {
    expect(classifyS3Error(new Error('ECONNRESET'), 'k')).toMatchObject({
      code: 'TRANSPORT',
      message: 'S3 request for k failed: ECONNRESET',
    });
  });
});
