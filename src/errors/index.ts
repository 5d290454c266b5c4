export {
  DownloadError,
  ERROR_CODES,
  isDownloadError,
  isTransient,
  errorMessage,
  systemErrorCode,
  toDownloadError,
  cancelledError,
} from './download-error.js';
export type { ErrorCode, ErrorDetails, FileFailure } from './download-error.js';
