/**
 * Temporary file that receives streamed bytes while hashing them.
 *
 * Nothing reads a staged file by its final name: it is either renamed into
 * place once complete, or discarded.
 */

import { randomUUID } from 'node:crypto';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import type { ContentHasher, ContentId, IncrementalDigest } from '../hash/types.js';
import { DownloadError, toDownloadError } from '../errors/index.js';
import type { ErrorCode } from '../errors/index.js';

export interface StagedFileOptions {
  /** Code used for file-system failures (STORAGE in the store, MATERIALIZE beside a destination) */
  errorCode: ErrorCode;

  /** File name prefix */
  prefix?: string;
}

export class StagedFile {
  readonly path: string;
  private readonly digest: IncrementalDigest;
  private readonly errorCode: ErrorCode;
  private handle: fsp.FileHandle | null;
  private finished = false;

  private constructor(
    filePath: string,
    handle: fsp.FileHandle,
    digest: IncrementalDigest,
    errorCode: ErrorCode
  ) {
    this.path = filePath;
    this.handle = handle;
    this.digest = digest;
    this.errorCode = errorCode;
  }

  /**
   * Create an empty staged file inside `dir` (created if missing).
   */
  static async create(
    dir: string,
    hasher: ContentHasher,
    options: StagedFileOptions
  ): Promise<StagedFile> {
    const prefix = options.prefix ?? 'blob';
    const filePath = path.join(dir, `${prefix}.${randomUUID()}.partial`);
    try {
      await fsp.mkdir(dir, { recursive: true });
      const handle = await fsp.open(filePath, 'wx');
      return new StagedFile(filePath, handle, hasher.createDigest(), options.errorCode);
    } catch (err) {
      throw toDownloadError(err, options.errorCode);
    }
  }

  /** Bytes written so far */
  get bytes(): number {
    return this.digest.bytes;
  }

  async write(chunk: Uint8Array): Promise<void> {
    const handle = this.requireOpen();
    try {
      let offset = 0;
      while (offset < chunk.length) {
        const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset);
        offset += bytesWritten;
      }
    } catch (err) {
      throw toDownloadError(err, this.errorCode, { actual: String(this.bytes) });
    }
    this.digest.update(chunk);
  }

  /**
   * Flush and close the file, returning the content id of what was written.
   */
  async close(): Promise<ContentId> {
    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    }
    this.finished = true;
    return this.digest.digest();
  }

  /** Close (if needed) and delete the file. */
  async discard(): Promise<void> {
    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      await handle.close();
    }
    this.finished = true;
    await fsp.rm(this.path, { force: true });
  }

  private requireOpen(): fsp.FileHandle {
    if (this.finished || this.handle === null) {
      throw new DownloadError('INVALID_STATE', `Staged file ${this.path} is already closed`);
    }
    return this.handle;
  }
}
