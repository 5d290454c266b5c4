/**
 * Persistent record of which files have been materialized into a local
 * directory, and under which content id.
 *
 * Stored as JSON beside the files so a second run can skip files that are
 * already in place.
 */

import * as fs from 'node:fs';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { errorMessage } from '../errors/index.js';
import type { FileInfo, RepoRef } from '../remote/types.js';
import type { SnapshotState, SnapshotStateEntry } from './types.js';

/** Directory (relative to the local root) holding bookkeeping files */
export const STATE_DIR_NAME = '.reposnap';
export const STATE_FILE_NAME = 'state.json';

function isSnapshotState(value: unknown): value is SnapshotState {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'version' in value &&
    value.version === 1 &&
    'repoId' in value &&
    typeof value.repoId === 'string' &&
    'entries' in value &&
    typeof value.entries === 'object' &&
    value.entries !== null
  );
}

function isEntry(value: unknown): value is SnapshotStateEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'contentId' in value &&
    typeof value.contentId === 'string' &&
    'size' in value &&
    typeof value.size === 'number'
  );
}

export class SnapshotStateManager {
  private state: SnapshotState;
  readonly filePath: string;
  private readonly logger: Logger;
  private dirty = false;

  constructor(localDir: string, repo: RepoRef, logger: Logger) {
    this.filePath = path.join(localDir, STATE_DIR_NAME, STATE_FILE_NAME);
    this.logger = logger.child({ component: 'snapshot-state' });
    this.state = {
      version: 1,
      repoId: repo.repoId,
      repoType: repo.repoType,
      revision: repo.revision,
      lastCompletedAt: null,
      entries: {},
    };
  }

  /** Number of tracked files */
  get size(): number {
    return Object.keys(this.state.entries).length;
  }

  get lastCompletedAt(): number | null {
    return this.state.lastCompletedAt;
  }

  /**
   * Load state from disk. A missing or unreadable file, or one written for
   * another repository, leaves the state empty.
   */
  load(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      this.logger.warn({ filePath: this.filePath, error: errorMessage(err) }, 'Unreadable state file, starting fresh');
      return;
    }

    if (!isSnapshotState(parsed)) {
      this.logger.warn({ filePath: this.filePath }, 'Unrecognised state file, starting fresh');
      return;
    }
    if (parsed.repoId !== this.state.repoId || parsed.repoType !== this.state.repoType) {
      this.logger.info(
        { filePath: this.filePath, recordedRepo: parsed.repoId },
        'State file belongs to another repository, starting fresh'
      );
      return;
    }

    const entries: Record<string, SnapshotStateEntry> = {};
    for (const [relativePath, entry] of Object.entries(parsed.entries)) {
      if (isEntry(entry)) {
        entries[relativePath] = {
          path: relativePath,
          contentId: entry.contentId,
          size: entry.size,
          materializedAt: typeof entry.materializedAt === 'number' ? entry.materializedAt : 0,
          ...(typeof entry.mtimeMs === 'number' ? { mtimeMs: entry.mtimeMs } : {}),
        };
      }
    }

    this.state = {
      ...this.state,
      lastCompletedAt: typeof parsed.lastCompletedAt === 'number' ? parsed.lastCompletedAt : null,
      entries,
    };
  }

  /**
   * Save state to disk when it changed. Written to a temp file and renamed.
   */
  save(): void {
    if (!this.dirty) {
      return;
    }

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const tempPath = `${this.filePath}.${randomUUID()}.partial`;
    fs.writeFileSync(tempPath, JSON.stringify(this.state, null, 2), 'utf-8');
    fs.renameSync(tempPath, this.filePath);
    this.dirty = false;
  }

  getEntry(relativePath: string): SnapshotStateEntry | undefined {
    return this.state.entries[relativePath];
  }

  /**
   * Whether `absolutePath` already holds this file: the recorded content id
   * matches the listing, and the file on disk has the listed size and the
   * recorded modification time.
   */
  async isMaterialized(file: FileInfo, absolutePath: string): Promise<boolean> {
    const entry = this.state.entries[file.path];
    if (!entry || entry.contentId !== file.contentId || entry.size !== file.size) {
      return false;
    }
    try {
      const stat = await fsp.stat(absolutePath);
      if (!stat.isFile() || stat.size !== file.size) {
        return false;
      }
      if (entry.mtimeMs !== undefined && stat.mtimeMs !== entry.mtimeMs) {
        this.logger.debug({ path: file.path }, 'File changed on disk since it was written');
        return false;
      }
      return true;
    } catch (err) {
      this.logger.debug({ path: file.path, error: errorMessage(err) }, 'Recorded file missing on disk');
      return false;
    }
  }

  /**
   * Record a file after it was written to its destination. Without
   * `mtimeMs` only the size is checked on later runs.
   */
  updateEntry(file: FileInfo, mtimeMs?: number): void {
    this.state.entries[file.path] = {
      path: file.path,
      contentId: file.contentId,
      size: file.size,
      materializedAt: Date.now(),
      ...(mtimeMs !== undefined ? { mtimeMs } : {}),
    };
    this.dirty = true;
  }

  /**
   * Record a completed operation against a revision.
   */
  recordCompletion(revision: string): void {
    this.state.revision = revision;
    this.state.lastCompletedAt = Date.now();
    this.dirty = true;
  }

  getTrackedPaths(): string[] {
    return Object.keys(this.state.entries);
  }
}
