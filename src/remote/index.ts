export { HttpRepositoryClient, DEFAULT_REQUEST_TIMEOUT_MS, errorForStatus } from './http-repository-client.js';
export type { HttpRepositoryClientOptions } from './http-repository-client.js';
export { S3RepositoryClient, classifyS3Error } from './s3-repository-client.js';
export type { S3RepositoryClientOptions, S3Sender } from './s3-repository-client.js';
export {
  DEFAULT_REPO_TYPE,
  DEFAULT_REVISION,
  describeRepo,
  isSafeRelativePath,
  parseListing,
  resolveRepoRef,
} from './listing.js';
export { REPO_TYPES } from './types.js';
export type {
  FetchBlobOptions,
  FileInfo,
  FileList,
  RemoteRepositoryClient,
  RepoRef,
  RepoRefInput,
  RepoType,
} from './types.js';
