/**
 * Coordinator configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically.
 */

import type { LevelWithSilent } from 'pino';
import { DEFAULT_CURL_BINARY, DEFAULT_KILL_GRACE_MS } from './constants.js';
import { isLogLevel, LOG_LEVELS } from './logger.js';

/** Process-level settings for running transfers */
export interface CoordinatorConfig {
  /** Transfer tool binary */
  binary: string;

  /** Milliseconds between SIGTERM and SIGKILL when cancelling */
  killGraceMs: number;

  /** Running from a packaged install with an embedded CA bundle */
  packaged: boolean;

  /** Embedded directory of the packaged install */
  installerEmbeddedDir: string;

  /** Minimum log level */
  logLevel: LevelWithSilent;
}

/** Default configuration values */
export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = {
  binary: DEFAULT_CURL_BINARY,
  killGraceMs: DEFAULT_KILL_GRACE_MS,
  packaged: false,
  installerEmbeddedDir: '',
  logLevel: 'warn',
};

/** Upper bound for killGraceMs: 1 minute */
const MAX_KILL_GRACE_MS = 60_000;

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
  return raw === 'true' || raw === '1';
}

/**
 * Build coordinator config from environment variables and optional overrides.
 *
 * Environment variables:
 * - SFETCH_CURL_BINARY: transfer tool binary (default: curl)
 * - SFETCH_KILL_GRACE_MS: SIGTERM to SIGKILL grace period (default: 5000)
 * - SFETCH_PACKAGED: "true" or "1" when running from a packaged install
 * - SFETCH_INSTALLER_EMBEDDED_DIR: embedded directory of the packaged install
 * - SFETCH_LOG_LEVEL: pino level (default: warn)
 */
export function buildCoordinatorConfig(
  overrides?: Partial<CoordinatorConfig>
): CoordinatorConfig {
  const envLevel = getEnv('SFETCH_LOG_LEVEL', DEFAULT_COORDINATOR_CONFIG.logLevel);

  return {
    binary: overrides?.binary ?? getEnv('SFETCH_CURL_BINARY', DEFAULT_COORDINATOR_CONFIG.binary),
    killGraceMs:
      overrides?.killGraceMs ??
      getEnvNumber('SFETCH_KILL_GRACE_MS', DEFAULT_COORDINATOR_CONFIG.killGraceMs),
    packaged:
      overrides?.packaged ??
      getEnvBoolean('SFETCH_PACKAGED', DEFAULT_COORDINATOR_CONFIG.packaged),
    installerEmbeddedDir:
      overrides?.installerEmbeddedDir ??
      getEnv('SFETCH_INSTALLER_EMBEDDED_DIR', DEFAULT_COORDINATOR_CONFIG.installerEmbeddedDir),
    logLevel:
      overrides?.logLevel ??
      (isLogLevel(envLevel) ? envLevel : DEFAULT_COORDINATOR_CONFIG.logLevel),
  };
}

/**
 * Validate a coordinator configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateCoordinatorConfig(config: CoordinatorConfig): string[] {
  const errors: string[] = [];

  if (!config.binary) {
    errors.push('binary is required');
  }

  if (config.killGraceMs < 0) {
    errors.push('killGraceMs must not be negative');
  }

  if (config.killGraceMs > MAX_KILL_GRACE_MS) {
    errors.push(`killGraceMs must not exceed ${MAX_KILL_GRACE_MS} (1 minute)`);
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  if (config.packaged && !config.installerEmbeddedDir) {
    errors.push('installerEmbeddedDir is required when packaged is true');
  }

  return errors;
}
