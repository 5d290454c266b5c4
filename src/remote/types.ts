/**
 * Types for the remote content-addressed repository store.
 */

import type { ContentId } from '../hash/types.js';

/** Kind of repository */
export type RepoType = 'model' | 'dataset' | 'space';

export const REPO_TYPES: readonly RepoType[] = ['model', 'dataset', 'space'];

/** Fully resolved repository reference */
export interface RepoRef {
  /** `name` or `org/name` */
  repoId: string;

  repoType: RepoType;

  /** Branch, tag or commit */
  revision: string;
}

/** Repository reference as callers write it; defaults fill the rest */
export interface RepoRefInput {
  repoId: string;

  /** Default: 'model' */
  repoType?: RepoType;

  /** Default: 'main' */
  revision?: string;
}

/** One listed file. Frozen once produced. */
export interface FileInfo {
  /** Relative path inside the repository, `/`-separated */
  readonly path: string;

  readonly contentId: ContentId;

  /** Size in bytes */
  readonly size: number;
}

/** Listing in the order the remote returned it */
export type FileList = readonly FileInfo[];

export interface FetchBlobOptions {
  /** Start reading at this byte offset (default: 0) */
  offset?: number;

  /** Aborts the request */
  signal?: AbortSignal;
}

/**
 * Capability the download path consumes: list a revision, stream bytes by
 * content id.
 */
export interface RemoteRepositoryClient {
  /**
   * @throws DownloadError NOT_FOUND, AUTH or TRANSPORT
   */
  listFiles(repo: RepoRef): Promise<FileList>;

  /**
   * Stream the bytes of a content id, starting at `offset`.
   * Errors surface from the iterator as NOT_FOUND, AUTH or TRANSPORT.
   */
  fetchBlob(contentId: ContentId, options?: FetchBlobOptions): AsyncIterable<Uint8Array>;
}
