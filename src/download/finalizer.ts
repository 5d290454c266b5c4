/**
 * Moves verified bytes to their destination under a local root.
 *
 * The destination is only ever produced by a rename, so an observer sees
 * either the previous file or the complete new one. Every failure here is
 * reported as MATERIALIZE.
 */

import { randomUUID } from 'node:crypto';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { DownloadError, errorMessage, toDownloadError } from '../errors/index.js';
import type { FileInfo } from '../remote/types.js';
import type { StagedFile } from '../store/staged-file.js';
import { STATE_DIR_NAME } from './snapshot-state.js';
import type { SnapshotStateManager } from './snapshot-state.js';

/** Where the bytes to materialize currently live */
export type MaterializeSource =
  | { kind: 'blob'; blobPath: string }
  | { kind: 'staged'; staged: StagedFile };

export class Finalizer {
  readonly rootDir: string;
  private readonly state: SnapshotStateManager;
  private readonly logger: Logger;

  constructor(rootDir: string, state: SnapshotStateManager, logger: Logger) {
    this.rootDir = path.resolve(rootDir);
    this.state = state;
    this.logger = logger.child({ component: 'finalizer' });
  }

  /**
   * Absolute destination of a relative path.
   *
   * @throws DownloadError MATERIALIZE when the path escapes the root or
   * lands in the bookkeeping directory
   */
  resolveDestination(relativePath: string): string {
    const destination = path.resolve(this.rootDir, ...relativePath.split('/'));
    const relative = path.relative(this.rootDir, destination);
    if (
      relative === '' ||
      relative === '..' ||
      relative.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relative)
    ) {
      throw new DownloadError('MATERIALIZE', `Path escapes the destination directory: ${relativePath}`, {
        path: relativePath,
      });
    }
    if (relative.split(path.sep)[0] === STATE_DIR_NAME) {
      throw new DownloadError('MATERIALIZE', `Path is reserved for snapshot bookkeeping: ${relativePath}`, {
        path: relativePath,
      });
    }
    return destination;
  }

  /**
   * Place a file's bytes at its destination and record it.
   * Returns the destination path.
   */
  async materialize(file: FileInfo, source: MaterializeSource): Promise<string> {
    const destination = this.resolveDestination(file.path);
    let tempPath: string | null = null;
    let mtimeMs: number;

    try {
      await fsp.mkdir(path.dirname(destination), { recursive: true });

      if (source.kind === 'blob') {
        tempPath = `${destination}.${randomUUID()}.partial`;
        await fsp.copyFile(source.blobPath, tempPath);
        await fsp.rename(tempPath, destination);
      } else {
        tempPath = source.staged.path;
        await source.staged.close();
        await fsp.rename(tempPath, destination);
      }
      tempPath = null;
      mtimeMs = (await fsp.stat(destination)).mtimeMs;
    } catch (err) {
      if (tempPath !== null) {
        await this.removeTemp(tempPath);
      }
      throw toDownloadError(err, 'MATERIALIZE', { path: file.path });
    }

    this.state.updateEntry(file, mtimeMs);
    this.logger.debug({ path: file.path, size: file.size, source: source.kind }, 'File materialized');
    return destination;
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await fsp.rm(tempPath, { force: true });
    } catch (err) {
      this.logger.warn({ tempPath, error: errorMessage(err) }, 'Failed to remove temporary file');
    }
  }
}
