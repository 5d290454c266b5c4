/**
 * Cooperative, poll-based cancellation.
 *
 * Callers hand in a token; the download path samples it at state
 * transitions and after every fetched chunk. Nothing is ever pushed to
 * the running work.
 */

import { cancelledError } from '../errors/index.js';
import type { ErrorDetails } from '../errors/index.js';

/** Caller-supplied cancellation predicate */
export interface CancellationToken {
  isCancellationRequested(): boolean;
}

/** Token that never requests cancellation */
export const NEVER_CANCELLED: CancellationToken = {
  isCancellationRequested: () => false,
};

/**
 * Owner side of a token: `cancel()` flips the token it hands out.
 */
export class CancellationSource {
  private requested = false;

  readonly token: CancellationToken = {
    isCancellationRequested: () => this.requested,
  };

  get isCancellationRequested(): boolean {
    return this.requested;
  }

  cancel(): void {
    this.requested = true;
  }
}

/**
 * Adapt an AbortSignal to a CancellationToken.
 */
export function fromAbortSignal(signal: AbortSignal): CancellationToken {
  return {
    isCancellationRequested: () => signal.aborted,
  };
}

/**
 * Per-operation gate. Once it has observed a cancellation request it
 * stays closed, even if the token later reports false.
 */
export class CancellationGate {
  private readonly token: CancellationToken;
  private latched = false;

  constructor(token: CancellationToken = NEVER_CANCELLED) {
    this.token = token;
  }

  isCancelled(): boolean {
    if (!this.latched && this.token.isCancellationRequested()) {
      this.latched = true;
    }
    return this.latched;
  }

  /**
   * @throws DownloadError CANCELLED once cancellation has been requested
   */
  check(details: ErrorDetails = {}): void {
    if (this.isCancelled()) {
      throw cancelledError(details);
    }
  }
}
