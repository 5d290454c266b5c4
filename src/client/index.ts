export { ReposnapClient, createClient } from './reposnap-client.js';
export type { TypedClientEmitter } from './reposnap-client.js';
export { buildClientConfig, validateClientConfig, defaultCacheDir } from './config.js';
export { DEFAULT_CLIENT_CONFIG } from './types.js';
export type {
  ClientConfig,
  ClientDependencies,
  ClientEvents,
  ClientStats,
  DownloadFileRequest,
  OperationKind,
  OperationSummary,
  SnapshotRequest,
} from './types.js';
