export { NodeContentHasher, hashFile, hashBuffer, isContentId } from './content-hasher.js';
export type {
  ContentHasher,
  ContentId,
  FileHashResult,
  HashAlgorithm,
  IncrementalDigest,
} from './types.js';
export { HASH_ALGORITHMS } from './types.js';
