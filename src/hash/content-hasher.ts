/**
 * Content hasher for content-addressed deduplication.
 *
 * Computes hex digests with Node.js crypto. Files are hashed through a
 * read stream so memory stays constant regardless of file size.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import type {
  ContentHasher,
  ContentId,
  FileHashResult,
  HashAlgorithm,
  IncrementalDigest,
} from './types.js';

const CONTENT_ID_PATTERN = /^[0-9a-f]{16,128}$/;

/**
 * Whether a string has the textual form of a content id (lowercase hex).
 * Ids are used as file names in the store, so nothing else is accepted.
 */
export function isContentId(value: string): value is ContentId {
  return CONTENT_ID_PATTERN.test(value);
}

/**
 * Compute the hash of a file using a streaming approach.
 *
 * @throws If the file cannot be read
 */
export async function hashFile(
  filePath: string,
  algorithm: HashAlgorithm = 'sha256'
): Promise<FileHashResult> {
  return new Promise<FileHashResult>((resolve, reject) => {
    const hash = crypto.createHash(algorithm);
    let sizeBytes = 0;

    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      sizeBytes += chunk.length;
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve({
        contentId: hash.digest('hex'),
        algorithm,
        sizeBytes,
      });
    });

    stream.on('error', (err: Error) => {
      reject(new Error(`Failed to hash file ${filePath}: ${err.message}`));
    });
  });
}

/**
 * Compute the content id of an in-memory buffer.
 */
export function hashBuffer(content: Uint8Array, algorithm: HashAlgorithm = 'sha256'): ContentId {
  return crypto.createHash(algorithm).update(content).digest('hex');
}

class NodeIncrementalDigest implements IncrementalDigest {
  private readonly hash: crypto.Hash;
  private fed = 0;
  private result: ContentId | null = null;

  constructor(algorithm: HashAlgorithm) {
    this.hash = crypto.createHash(algorithm);
  }

  get bytes(): number {
    return this.fed;
  }

  update(chunk: Uint8Array): void {
    if (this.result !== null) {
      throw new Error('Digest already finalized');
    }
    this.hash.update(chunk);
    this.fed += chunk.length;
  }

  digest(): ContentId {
    if (this.result === null) {
      this.result = this.hash.digest('hex');
    }
    return this.result;
  }
}

/**
 * ContentHasher backed by node:crypto.
 */
export class NodeContentHasher implements ContentHasher {
  readonly algorithm: HashAlgorithm;

  constructor(algorithm: HashAlgorithm = 'sha256') {
    this.algorithm = algorithm;
  }

  hash(bytes: Uint8Array): ContentId {
    return hashBuffer(bytes, this.algorithm);
  }

  verify(bytes: Uint8Array, expected: ContentId): boolean {
    return this.hash(bytes) === expected.toLowerCase();
  }

  createDigest(): IncrementalDigest {
    return new NodeIncrementalDigest(this.algorithm);
  }

  hashFile(filePath: string): Promise<FileHashResult> {
    return hashFile(filePath, this.algorithm);
  }
}
