/**
 * Error type shared by every reposnap component.
 *
 * Each error carries a machine-checkable code, a human-readable message
 * and optional structured details (which file, which content id, which
 * files failed in a snapshot).
 */

/** Error codes surfaced to callers */
export const ERROR_CODES = [
  'NOT_FOUND',
  'AUTH',
  'TRANSPORT',
  'CORRUPTION',
  'STORAGE',
  'CANCELLED',
  'MATERIALIZE',
  'PARTIAL_FAILURE',
  'INVALID_ARGUMENT',
  'INVALID_CONFIG',
  'INVALID_STATE',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/** One failed file inside a snapshot operation */
export interface FileFailure {
  /** Relative path of the file */
  path: string;

  /** Code of the error that failed the file */
  code: ErrorCode;

  /** Message of the error that failed the file */
  message: string;
}

/** Structured details attached to a DownloadError */
export interface ErrorDetails {
  /** Relative path of the file the error concerns */
  path?: string;

  /** Content id the error concerns */
  contentId?: string;

  /** Expected value (digest, size) for corruption errors */
  expected?: string;

  /** Actual value (digest, size) for corruption errors */
  actual?: string;

  /** Number of attempts made before the error surfaced */
  attempts?: number;

  /** HTTP status code returned by the remote store */
  statusCode?: number;

  /** Per-file failures of a snapshot operation */
  failures?: FileFailure[];
}

export class DownloadError extends Error {
  public readonly code: ErrorCode;
  public readonly details: ErrorDetails;

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message);
    this.name = 'DownloadError';
    this.code = code;
    this.details = details;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }

  /** Copy of this error with extra details merged in */
  withDetails(details: ErrorDetails): DownloadError {
    return new DownloadError(this.code, this.message, { ...this.details, ...details }, this.cause);
  }

  toJSON(): { name: string; code: ErrorCode; message: string; details: ErrorDetails } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function isDownloadError(err: unknown): err is DownloadError {
  return err instanceof DownloadError;
}

/** Whether an error is worth another fetch attempt */
export function isTransient(err: unknown): boolean {
  return isDownloadError(err) && (err.code === 'TRANSPORT' || err.code === 'CORRUPTION');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Node system error code (ENOENT, ENOSPC, ...) of an unknown error, if any.
 */
export function systemErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Wrap an unknown error into a DownloadError, keeping DownloadErrors as-is.
 */
export function toDownloadError(
  err: unknown,
  fallbackCode: ErrorCode,
  details: ErrorDetails = {}
): DownloadError {
  if (isDownloadError(err)) {
    return Object.keys(details).length > 0 ? err.withDetails(details) : err;
  }
  return new DownloadError(fallbackCode, errorMessage(err), details, err);
}

export function cancelledError(details: ErrorDetails = {}): DownloadError {
  return new DownloadError('CANCELLED', 'Operation cancelled', details);
}
