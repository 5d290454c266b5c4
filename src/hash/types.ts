/**
 * Types for content hashing.
 */

/** Supported digest algorithms (all from node:crypto) */
export type HashAlgorithm = 'sha256' | 'sha512' | 'sha1';

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ['sha256', 'sha512', 'sha1'];

/** Lowercase hex digest identifying a byte sequence */
export type ContentId = string;

/** Result of hashing a file on disk */
export interface FileHashResult {
  /** Hex-encoded digest */
  contentId: ContentId;

  /** Algorithm used */
  algorithm: HashAlgorithm;

  /** Number of bytes hashed */
  sizeBytes: number;
}

/** Incremental digest fed with chunks as they arrive */
export interface IncrementalDigest {
  update(chunk: Uint8Array): void;

  /** Number of bytes fed so far */
  readonly bytes: number;

  /** Finish and return the content id. Further updates are not allowed. */
  digest(): ContentId;
}

/**
 * Computes and checks content identifiers.
 */
export interface ContentHasher {
  readonly algorithm: HashAlgorithm;
  hash(bytes: Uint8Array): ContentId;
  verify(bytes: Uint8Array, expected: ContentId): boolean;
  createDigest(): IncrementalDigest;
  hashFile(filePath: string): Promise<FileHashResult>;
}
