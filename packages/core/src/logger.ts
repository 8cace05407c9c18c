/**
 * Root logger construction.
 *
 * Components take a `Logger` in their constructor and derive a child with
 * their own `component` binding, so one root decides level and destination.
 */

import { pino, destination, type Logger, type LevelWithSilent } from 'pino';
import { PRODUCT_NAME } from './constants.js';

/** Levels accepted by {@link createLogger} */
export const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export interface CreateLoggerOptions {
  /** Minimum level to emit. Defaults to 'warn'. */
  level?: LevelWithSilent;

  /** File descriptor to write to. Defaults to 2 (stderr) so stdout stays free for progress output. */
  destination?: number;
}

export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  return pino(
    {
      name: PRODUCT_NAME,
      level: options?.level ?? 'warn',
    },
    destination(options?.destination ?? 2)
  );
}
