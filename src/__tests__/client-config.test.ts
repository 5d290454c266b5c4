import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as os from 'node:os';
import * as path from 'node:path';
import { buildClientConfig, defaultCacheDir, validateClientConfig } from '../client/config.js';
import type { ClientConfig } from '../client/types.js';

describe('Client Config', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('REPOSNAP_')) {
        delete process.env[key];
      }
    }
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('buildClientConfig', () => {
    it('should return defaults when no overrides or env vars', () => {
      const config = buildClientConfig({ endpoint: 'https://store.example.test' });

      expect(config.cacheDir).toBe(path.join(os.homedir(), '.cache', 'reposnap'));
      expect(config.cacheDir).toBe(defaultCacheDir());
      expect(config.token).toBe('');
      expect(config.maxConcurrentDownloads).toBe(4);
      expect(config.enableDedup).toBe(true);
      expect(config.verifyDedupHits).toBe(false);
      expect(config.hashAlgorithm).toBe('sha256');
      expect(config.maxAttempts).toBe(4);
      expect(config.retryBaseDelayMs).toBe(200);
      expect(config.retryMaxDelayMs).toBe(5_000);
      expect(config.retryJitterRatio).toBe(0.2);
      expect(config.requestTimeoutMs).toBe(60_000);
      expect(config.progressThrottleMs).toBe(200);
      expect(config.logLevel).toBe('info');
    });

    it('should use REPOSNAP_ENDPOINT from environment', () => {
      process.env['REPOSNAP_ENDPOINT'] = 'https://env.example.test';
      const config = buildClientConfig();

      expect(config.endpoint).toBe('https://env.example.test');
    });

    it('should prefer override over environment variable', () => {
      process.env['REPOSNAP_ENDPOINT'] = 'https://env.example.test';
      const config = buildClientConfig({ endpoint: 'https://override.example.test' });

      expect(config.endpoint).toBe('https://override.example.test');
    });

    it('should read numbers from env', () => {
      process.env['REPOSNAP_MAX_CONCURRENT'] = '8';
      process.env['REPOSNAP_MAX_ATTEMPTS'] = '6';
      process.env['REPOSNAP_REQUEST_TIMEOUT_MS'] = '1500';
      const config = buildClientConfig();

      expect(config.maxConcurrentDownloads).toBe(8);
      expect(config.maxAttempts).toBe(6);
      expect(config.requestTimeoutMs).toBe(1_500);
    });

    it('should fall back to defaults for unparseable numbers', () => {
      process.env['REPOSNAP_MAX_CONCURRENT'] = 'lots';
      const config = buildClientConfig();

      expect(config.maxConcurrentDownloads).toBe(4);
    });

    it('should read booleans from env', () => {
      process.env['REPOSNAP_ENABLE_DEDUP'] = 'false';
      process.env['REPOSNAP_VERIFY_DEDUP_HITS'] = '1';
      const config = buildClientConfig();

      expect(config.enableDedup).toBe(false);
      expect(config.verifyDedupHits).toBe(true);
    });

    it('should ignore unrecognised boolean values', () => {
      process.env['REPOSNAP_ENABLE_DEDUP'] = 'maybe';
      const config = buildClientConfig();

      expect(config.enableDedup).toBe(true);
    });

    it('should read the hash algorithm and log level from env', () => {
      process.env['REPOSNAP_HASH_ALGORITHM'] = 'sha512';
      process.env['REPOSNAP_LOG_LEVEL'] = 'debug';
      const config = buildClientConfig();

      expect(config.hashAlgorithm).toBe('sha512');
      expect(config.logLevel).toBe('debug');
    });

    it('should fall back for unknown algorithms and log levels', () => {
      process.env['REPOSNAP_HASH_ALGORITHM'] = 'md5';
      process.env['REPOSNAP_LOG_LEVEL'] = 'loud';
      const config = buildClientConfig();

      expect(config.hashAlgorithm).toBe('sha256');
      expect(config.logLevel).toBe('info');
    });

    it('should read the token and cache dir from env', () => {
      process.env['REPOSNAP_TOKEN'] = 'test-secret';
      process.env['REPOSNAP_CACHE_DIR'] = '/env/cache';
      const config = buildClientConfig();

      expect(config.token).toBe('test-secret');
      expect(config.cacheDir).toBe('/env/cache');
    });
  });

  describe('validateClientConfig', () => {
    function validConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
      return buildClientConfig({ endpoint: 'https://store.example.test', cacheDir: '/tmp/cache', ...overrides });
    }

    it('should return no errors for valid config', () => {
      expect(validateClientConfig(validConfig())).toEqual([]);
    });

    it('should require an endpoint unless told otherwise', () => {
      const config = validConfig({ endpoint: '' });

      expect(validateClientConfig(config)).toEqual(['endpoint is required: specify the remote store URL']);
      expect(validateClientConfig(config, { requireEndpoint: false })).toEqual([]);
    });

    it('should reject malformed endpoints', () => {
      expect(validateClientConfig(validConfig({ endpoint: 'not a url' }))).toEqual([
        'endpoint is not a valid URL: not a url',
      ]);
      expect(validateClientConfig(validConfig({ endpoint: 'ftp://store.example.test' }))).toEqual([
        'endpoint must use http or https',
      ]);
    });

    it('should require a cache dir', () => {
      expect(validateClientConfig(validConfig({ cacheDir: '' }))).toContain('cacheDir is required');
    });

    it('should bound maxConcurrentDownloads', () => {
      expect(validateClientConfig(validConfig({ maxConcurrentDownloads: 0 }))).toContain(
        'maxConcurrentDownloads must be an integer of at least 1'
      );
      expect(validateClientConfig(validConfig({ maxConcurrentDownloads: 1.5 }))).toContain(
        'maxConcurrentDownloads must be an integer of at least 1'
      );
      expect(validateClientConfig(validConfig({ maxConcurrentDownloads: 65 }))).toContain(
        'maxConcurrentDownloads must not exceed 64'
      );
    });

    it('should bound maxAttempts', () => {
      expect(validateClientConfig(validConfig({ maxAttempts: 0 }))).toContain(
        'maxAttempts must be an integer of at least 1'
      );
      expect(validateClientConfig(validConfig({ maxAttempts: 21 }))).toContain('maxAttempts must not exceed 20');
    });

    it('should check retry timings', () => {
      expect(validateClientConfig(validConfig({ retryBaseDelayMs: -1 }))).toContain(
        'retryBaseDelayMs must not be negative'
      );
      expect(validateClientConfig(validConfig({ retryBaseDelayMs: 500, retryMaxDelayMs: 100 }))).toEqual([
        'retryMaxDelayMs must be at least retryBaseDelayMs',
      ]);
      expect(validateClientConfig(validConfig({ retryJitterRatio: 1.5 }))).toEqual([
        'retryJitterRatio must be between 0 and 1',
      ]);
    });

    it('should check timeouts and throttle', () => {
      expect(validateClientConfig(validConfig({ requestTimeoutMs: 0 }))).toEqual([
        'requestTimeoutMs must be at least 1',
      ]);
      expect(validateClientConfig(validConfig({ progressThrottleMs: -5 }))).toEqual([
        'progressThrottleMs must not be negative',
      ]);
    });

    it('should collect every error', () => {
      const errors = validateClientConfig(validConfig({ endpoint: '', cacheDir: '', maxAttempts: 0 }));

      expect(errors).toHaveLength(3);
    });
  });
});
