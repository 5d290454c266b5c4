/**
 * Local content-addressed dedup store.
 *
 * Layout under the cache directory:
 *   blobs/<id[0..2]>/<id>   committed entries
 *   staging/                in-flight writes
 *
 * Writes are staged then renamed into their slot, so a reader never sees a
 * partially written entry. An entry is only committed under the id its
 * bytes hash to.
 */

import * as fs from 'node:fs';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type { ContentHasher, ContentId } from '../hash/types.js';
import { isContentId } from '../hash/content-hasher.js';
import {
  DownloadError,
  errorMessage,
  systemErrorCode,
  toDownloadError,
} from '../errors/index.js';
import { LeaseRegistry } from './lease-registry.js';
import { StagedFile } from './staged-file.js';
import type { DedupStoreOptions, DedupStoreStats, ReserveResult } from './types.js';

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

export class LocalDedupStore {
  readonly cacheDir: string;
  readonly blobsDir: string;
  readonly stagingDir: string;
  private readonly hasher: ContentHasher;
  private readonly logger: Logger;
  private readonly leases = new LeaseRegistry();
  private writes = 0;

  constructor(options: DedupStoreOptions, hasher: ContentHasher, logger: Logger) {
    this.cacheDir = options.cacheDir;
    this.blobsDir = path.join(options.cacheDir, 'blobs');
    this.stagingDir = path.join(options.cacheDir, 'staging');
    this.hasher = hasher;
    this.logger = logger.child({ component: 'dedup-store' });
  }

  /**
   * Path of the committed entry for an id (whether or not it exists).
   */
  entryPath(contentId: ContentId): string {
    assertContentId(contentId);
    return path.join(this.blobsDir, contentId.slice(0, 2), contentId);
  }

  /**
   * Whether an entry is committed for the id.
   *
   * Only a corrupted slot (something other than a regular file) is reported
   * as an error; other stat failures count as a miss.
   */
  async has(contentId: ContentId): Promise<boolean> {
    const entryPath = this.entryPath(contentId);
    let stat: fs.Stats;
    try {
      stat = await fsp.stat(entryPath);
    } catch (err) {
      const code = systemErrorCode(err);
      if (code === undefined || !MISSING_CODES.has(code)) {
        this.logger.warn({ contentId, error: errorMessage(err) }, 'Store lookup failed; treating as miss');
      }
      return false;
    }

    if (!stat.isFile()) {
      throw new DownloadError('CORRUPTION', `Store slot for ${contentId} is not a file`, {
        contentId,
      });
    }
    return true;
  }

  /**
   * Read a committed entry, or null when the store does not have it.
   */
  async read(contentId: ContentId): Promise<Buffer | null> {
    const entryPath = this.entryPath(contentId);
    try {
      return await fsp.readFile(entryPath);
    } catch (err) {
      const code = systemErrorCode(err);
      if (code !== undefined && MISSING_CODES.has(code)) {
        return null;
      }
      throw toDownloadError(err, 'STORAGE', { contentId });
    }
  }

  /**
   * Store bytes under their content id.
   *
   * @throws DownloadError CORRUPTION when the bytes do not hash to the id
   * @throws DownloadError STORAGE on disk-full or permission failures
   */
  async write(contentId: ContentId, bytes: Uint8Array): Promise<void> {
    assertContentId(contentId);
    const staged = await this.openStaged();
    try {
      await staged.write(bytes);
    } catch (err) {
      await staged.discard();
      throw err;
    }
    await this.commit(staged, contentId);
  }

  /**
   * Open a staged file in the store's staging directory for streamed ingest.
   */
  openStaged(): Promise<StagedFile> {
    return StagedFile.create(this.stagingDir, this.hasher, { errorCode: 'STORAGE' });
  }

  /**
   * Verify a staged file against the id and rename it into its slot.
   * The staged file is consumed either way.
   */
  async commit(staged: StagedFile, contentId: ContentId): Promise<void> {
    const entryPath = this.entryPath(contentId);
    let actual: ContentId;
    try {
      actual = await staged.close();
    } catch (err) {
      await staged.discard();
      throw toDownloadError(err, 'STORAGE', { contentId });
    }

    if (actual !== contentId) {
      await staged.discard();
      throw new DownloadError('CORRUPTION', `Content hash mismatch for ${contentId}`, {
        contentId,
        expected: contentId,
        actual,
      });
    }

    try {
      await fsp.mkdir(path.dirname(entryPath), { recursive: true });
      await fsp.rename(staged.path, entryPath);
    } catch (err) {
      await staged.discard();
      throw toDownloadError(err, 'STORAGE', { contentId });
    }

    this.writes++;
    this.logger.debug({ contentId, bytes: staged.bytes }, 'Entry committed');
  }

  /**
   * Claim the right to ingest an id. See ReserveResult.
   */
  reserve(contentId: ContentId): ReserveResult {
    assertContentId(contentId);
    return this.leases.reserve(contentId);
  }

  /**
   * Re-hash a committed entry and compare it with its id.
   * Returns false when the entry is missing or its bytes no longer match.
   */
  async verifyEntry(contentId: ContentId): Promise<boolean> {
    const entryPath = this.entryPath(contentId);
    try {
      const result = await this.hasher.hashFile(entryPath);
      return result.contentId === contentId;
    } catch (err) {
      this.logger.warn({ contentId, error: errorMessage(err) }, 'Failed to verify store entry');
      return false;
    }
  }

  /** Delete a committed entry. Missing entries are ignored. */
  async remove(contentId: ContentId): Promise<void> {
    try {
      await fsp.rm(this.entryPath(contentId), { force: true });
    } catch (err) {
      throw toDownloadError(err, 'STORAGE', { contentId });
    }
  }

  getStats(): DedupStoreStats {
    return {
      writes: this.writes,
      activeLeases: this.leases.size,
    };
  }
}

function assertContentId(contentId: string): void {
  if (!isContentId(contentId)) {
    throw new DownloadError('INVALID_ARGUMENT', `Invalid content id: ${JSON.stringify(contentId)}`, {
      contentId,
    });
  }
}
