import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Default logger used when the caller does not inject one.
 */
export function createLogger(options: { level?: LevelWithSilent } = {}): Logger {
  return pino({ name: 'reposnap', level: options.level ?? 'info' });
}
