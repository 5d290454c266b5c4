/**
 * Repository references and listing validation shared by the transports.
 */

import { isContentId } from '../hash/content-hasher.js';
import { DownloadError } from '../errors/index.js';
import type { FileInfo, FileList, RepoRef, RepoRefInput, RepoType } from './types.js';
import { REPO_TYPES } from './types.js';

export const DEFAULT_REPO_TYPE: RepoType = 'model';
export const DEFAULT_REVISION = 'main';

function isRepoType(value: string): value is RepoType {
  return REPO_TYPES.some((type) => type === value);
}

/**
 * Whether a relative path stays inside the directory it is resolved
 * against: no absolute paths, no `.`/`..` or empty segments, no backslashes.
 */
export function isSafeRelativePath(value: string): boolean {
  if (value.length === 0 || value.startsWith('/') || value.includes('\\') || value.includes('\0')) {
    return false;
  }
  return value.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..');
}

/**
 * Apply defaults and validate a repository reference.
 *
 * @throws DownloadError INVALID_ARGUMENT
 */
export function resolveRepoRef(input: RepoRefInput): RepoRef {
  const repoType = input.repoType ?? DEFAULT_REPO_TYPE;
  const revision = input.revision ?? DEFAULT_REVISION;

  if (!isRepoType(repoType)) {
    throw new DownloadError('INVALID_ARGUMENT', `Unknown repo type: ${String(repoType)}`);
  }
  const segments = input.repoId.split('/');
  if (segments.length > 2 || !isSafeRelativePath(input.repoId)) {
    throw new DownloadError('INVALID_ARGUMENT', `Invalid repo id: ${JSON.stringify(input.repoId)}`);
  }
  if (revision.trim() === '' || revision.includes('\0')) {
    throw new DownloadError('INVALID_ARGUMENT', `Invalid revision: ${JSON.stringify(revision)}`);
  }

  return { repoId: input.repoId, repoType, revision };
}

/** Human-readable `type:id@revision` label for logs and messages */
export function describeRepo(repo: RepoRef): string {
  return `${repo.repoType}:${repo.repoId}@${repo.revision}`;
}

function malformed(source: string, reason: string): DownloadError {
  return new DownloadError('TRANSPORT', `Malformed listing from ${source}: ${reason}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a decoded listing document `{ files: [{ path, contentId, size }] }`
 * and return its entries frozen, in order.
 *
 * @throws DownloadError TRANSPORT when the document is malformed
 */
export function parseListing(document: unknown, source: string): FileList {
  const rawFiles: unknown = isRecord(document) ? document['files'] : undefined;
  if (!Array.isArray(rawFiles)) {
    throw malformed(source, 'expected an object with a "files" array');
  }
  const entries: readonly unknown[] = rawFiles;

  const seen = new Set<string>();
  const files: FileInfo[] = [];

  for (const [index, entry] of entries.entries()) {
    if (!isRecord(entry)) {
      throw malformed(source, `entry ${index} is not an object`);
    }
    const { path, contentId, size } = entry;

    if (typeof path !== 'string' || !isSafeRelativePath(path)) {
      throw malformed(source, `entry ${index} has an unsafe path`);
    }
    if (seen.has(path)) {
      throw malformed(source, `duplicate path ${path}`);
    }
    if (typeof contentId !== 'string' || !isContentId(contentId.toLowerCase())) {
      throw malformed(source, `entry ${path} has an invalid content id`);
    }
    if (typeof size !== 'number' || !Number.isSafeInteger(size) || size < 0) {
      throw malformed(source, `entry ${path} has an invalid size`);
    }

    seen.add(path);
    files.push(Object.freeze({ path, contentId: contentId.toLowerCase(), size }));
  }

  return Object.freeze(files);
}
