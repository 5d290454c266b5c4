/**
 * Bounded retry with exponential backoff and jitter.
 */

import { isTransient } from '../errors/index.js';

export type RetryPolicy = {
  maxAttempts: number; // total attempts, first one included
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number; // 0.2 = +/-20%
  shouldRetry: (err: unknown) => boolean;
};

export type Sleeper = (ms: number) => Promise<void>;

export type RetryContext = {
  /** Attempt that just failed (1-based) */
  attempt: number;
  /** Delay before the next attempt */
  delayMs: number;
  error: unknown;
};

export interface RetryOptions {
  /** Injected in tests to skip real waiting */
  sleep?: Sleeper;

  /** Called after a failed attempt that will be retried */
  onRetry?: (context: RetryContext) => void;

  /** Called before every attempt; throwing aborts the loop with that error */
  beforeAttempt?: (attempt: number) => void;

  /** Random source in [0, 1) used for jitter */
  random?: () => number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 200,
  maxDelayMs: 5_000,
  jitterRatio: 0.2,
  shouldRetry: isTransient,
};

export const defaultSleep: Sleeper = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Delay before the attempt following `attempt` (1-based).
 * `min(maxDelay, base * 2^(attempt-1))`, then spread by +/- jitterRatio.
 */
export function computeBackoff(
  attempt: number,
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs' | 'jitterRatio'>,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(policy.maxDelayMs, exponential);
  const spread = capped * policy.jitterRatio;
  const jittered = capped - spread + random() * spread * 2;
  return Math.max(0, Math.round(jittered));
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or attempts run out.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    options.beforeAttempt?.(attempt);
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !policy.shouldRetry(err)) {
        throw err;
      }
      const delayMs = computeBackoff(attempt, policy, options.random);
      options.onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs);
    }
  }
}
