export { DEFAULT_RETRY_POLICY, computeBackoff, defaultSleep, withRetry } from './retry-policy.js';
export type { RetryContext, RetryOptions, RetryPolicy, Sleeper } from './retry-policy.js';
