export { LocalDedupStore } from './dedup-store.js';
export { LeaseRegistry } from './lease-registry.js';
export { StagedFile } from './staged-file.js';
export type { StagedFileOptions } from './staged-file.js';
export type {
  IngestLease,
  ReserveResult,
  DedupStoreOptions,
  DedupStoreStats,
} from './types.js';
