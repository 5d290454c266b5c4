/**
 * Client configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically.
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { HASH_ALGORITHMS } from '../hash/types.js';
import type { HashAlgorithm } from '../hash/types.js';
import { isLogLevel } from '../logger.js';
import type { ClientConfig } from './types.js';
import { DEFAULT_CLIENT_CONFIG } from './types.js';

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function getEnvBoolean(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return fallback;
}

function isHashAlgorithm(value: string): value is HashAlgorithm {
  return HASH_ALGORITHMS.some((algorithm) => algorithm === value);
}

/** Cache directory used when neither an override nor REPOSNAP_CACHE_DIR is set */
export function defaultCacheDir(): string {
  return path.join(os.homedir(), '.cache', 'reposnap');
}

/**
 * Build client config from environment variables and optional overrides.
 *
 * Environment variables:
 * - REPOSNAP_ENDPOINT: Base URL of the remote store
 * - REPOSNAP_TOKEN: Bearer token (default: none)
 * - REPOSNAP_CACHE_DIR: Cache directory (default: ~/.cache/reposnap)
 * - REPOSNAP_MAX_CONCURRENT: Max concurrent downloads (default: 4)
 * - REPOSNAP_ENABLE_DEDUP: Use the local dedup store (default: true)
 * - REPOSNAP_VERIFY_DEDUP_HITS: Re-hash store entries before use (default: false)
 * - REPOSNAP_HASH_ALGORITHM: sha256, sha512 or sha1 (default: sha256)
 * - REPOSNAP_MAX_ATTEMPTS: Fetch attempts per file (default: 4)
 * - REPOSNAP_REQUEST_TIMEOUT_MS: Idle timeout per request (default: 60000)
 * - REPOSNAP_LOG_LEVEL: pino log level (default: info)
 */
export function buildClientConfig(overrides?: Partial<ClientConfig>): ClientConfig {
  const envAlgorithm = getEnv('REPOSNAP_HASH_ALGORITHM', DEFAULT_CLIENT_CONFIG.hashAlgorithm);
  const envLogLevel = getEnv('REPOSNAP_LOG_LEVEL', DEFAULT_CLIENT_CONFIG.logLevel);

  return {
    endpoint: overrides?.endpoint ?? getEnv('REPOSNAP_ENDPOINT', ''),
    token: overrides?.token ?? getEnv('REPOSNAP_TOKEN', ''),
    cacheDir: overrides?.cacheDir ?? getEnv('REPOSNAP_CACHE_DIR', defaultCacheDir()),
    maxConcurrentDownloads:
      overrides?.maxConcurrentDownloads ??
      getEnvNumber('REPOSNAP_MAX_CONCURRENT', DEFAULT_CLIENT_CONFIG.maxConcurrentDownloads),
    enableDedup:
      overrides?.enableDedup ?? getEnvBoolean('REPOSNAP_ENABLE_DEDUP', DEFAULT_CLIENT_CONFIG.enableDedup),
    verifyDedupHits:
      overrides?.verifyDedupHits ??
      getEnvBoolean('REPOSNAP_VERIFY_DEDUP_HITS', DEFAULT_CLIENT_CONFIG.verifyDedupHits),
    hashAlgorithm:
      overrides?.hashAlgorithm ??
      (isHashAlgorithm(envAlgorithm) ? envAlgorithm : DEFAULT_CLIENT_CONFIG.hashAlgorithm),
    maxAttempts: overrides?.maxAttempts ?? getEnvNumber('REPOSNAP_MAX_ATTEMPTS', DEFAULT_CLIENT_CONFIG.maxAttempts),
    retryBaseDelayMs: overrides?.retryBaseDelayMs ?? DEFAULT_CLIENT_CONFIG.retryBaseDelayMs,
    retryMaxDelayMs: overrides?.retryMaxDelayMs ?? DEFAULT_CLIENT_CONFIG.retryMaxDelayMs,
    retryJitterRatio: overrides?.retryJitterRatio ?? DEFAULT_CLIENT_CONFIG.retryJitterRatio,
    requestTimeoutMs:
      overrides?.requestTimeoutMs ??
      getEnvNumber('REPOSNAP_REQUEST_TIMEOUT_MS', DEFAULT_CLIENT_CONFIG.requestTimeoutMs),
    progressThrottleMs: overrides?.progressThrottleMs ?? DEFAULT_CLIENT_CONFIG.progressThrottleMs,
    logLevel: overrides?.logLevel ?? (isLogLevel(envLogLevel) ? envLogLevel : DEFAULT_CLIENT_CONFIG.logLevel),
  };
}

/**
 * Validate a client configuration.
 * Returns an array of error messages (empty = valid).
 *
 * The endpoint is only required when the client builds its own HTTP
 * transport.
 */
export function validateClientConfig(
  config: ClientConfig,
  options: { requireEndpoint?: boolean } = {}
): string[] {
  const errors: string[] = [];
  const requireEndpoint = options.requireEndpoint ?? true;

  if (!config.endpoint) {
    if (requireEndpoint) {
      errors.push('endpoint is required: specify the remote store URL');
    }
  } else {
    let protocol = '';
    try {
      protocol = new URL(config.endpoint).protocol;
    } catch {
      errors.push(`endpoint is not a valid URL: ${config.endpoint}`);
    }
    if (protocol !== '' && protocol !== 'http:' && protocol !== 'https:') {
      errors.push('endpoint must use http or https');
    }
  }

  if (!config.cacheDir) {
    errors.push('cacheDir is required');
  }

  if (!Number.isInteger(config.maxConcurrentDownloads) || config.maxConcurrentDownloads < 1) {
    errors.push('maxConcurrentDownloads must be an integer of at least 1');
  }

  if (config.maxConcurrentDownloads > 64) {
    errors.push('maxConcurrentDownloads must not exceed 64');
  }

  if (!isHashAlgorithm(config.hashAlgorithm)) {
    errors.push(`hashAlgorithm must be one of ${HASH_ALGORITHMS.join(', ')}`);
  }

  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    errors.push('maxAttempts must be an integer of at least 1');
  }

  if (config.maxAttempts > 20) {
    errors.push('maxAttempts must not exceed 20');
  }

  if (config.retryBaseDelayMs < 0) {
    errors.push('retryBaseDelayMs must not be negative');
  }

  if (config.retryMaxDelayMs < config.retryBaseDelayMs) {
    errors.push('retryMaxDelayMs must be at least retryBaseDelayMs');
  }

  if (config.retryJitterRatio < 0 || config.retryJitterRatio > 1) {
    errors.push('retryJitterRatio must be between 0 and 1');
  }

  if (config.requestTimeoutMs < 1) {
    errors.push('requestTimeoutMs must be at least 1');
  }

  if (config.progressThrottleMs < 0) {
    errors.push('progressThrottleMs must not be negative');
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(`logLevel is not a pino level: ${config.logLevel}`);
  }

  return errors;
}
