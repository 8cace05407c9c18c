/**
 * Transport option builder.
 *
 * Pure translation of a {@link TransportConfig} into curl arguments and
 * environment overrides. Values are not checked here; curl rejects what
 * it cannot use.
 */

import * as path from 'node:path';
import {
  CA_BUNDLE_ENV_VAR,
  EMBEDDED_CA_BUNDLE_FILE,
  MAX_REDIRECTS,
  USER_AGENT,
} from '../constants.js';
import type { TransportConfig, TransportOptions } from './types.js';

/**
 * Build the curl arguments shared by every operation.
 *
 * Fixed flags come first, then the optional policies in a stable order:
 * CA file, CA directory, resume, insecure, client cert, auth, headers.
 */
export function buildTransportOptions(config: TransportConfig): TransportOptions {
  const args = [
    '--fail',
    '--location',
    '--max-redirs', String(MAX_REDIRECTS),
    '--user-agent', USER_AGENT,
  ];

  if (config.caCertPath) {
    args.push('--cacert', config.caCertPath);
  }

  if (config.caDirPath) {
    args.push('--capath', config.caDirPath);
  }

  if (config.resume) {
    args.push('--continue-at', '-');
  }

  if (config.insecureTLS) {
    args.push('--insecure');
  }

  if (config.clientCertPath) {
    args.push('--cert', config.clientCertPath);
  }

  if (config.auth) {
    args.push('-u', config.auth);
  }

  for (const header of config.headers ?? []) {
    args.push('-H', header);
  }

  return { args, env: buildEnvironmentOverrides(config) };
}

/**
 * Packaged installs point curl at the bundled CA file; everything else
 * inherits the environment untouched.
 */
export function buildEnvironmentOverrides(config: TransportConfig): Record<string, string> {
  if (!config.packaged) {
    return {};
  }

  return {
    [CA_BUNDLE_ENV_VAR]: path.resolve(config.installerEmbeddedDir ?? '', EMBEDDED_CA_BUNDLE_FILE),
  };
}

/**
 * Validate a transport configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateTransportConfig(config: TransportConfig): string[] {
  const errors: string[] = [];

  for (const [index, header] of (config.headers ?? []).entries()) {
    if (header.trim().length === 0) {
      errors.push(`headers[${index}] is empty`);
    } else if (!header.includes(':') && !header.endsWith(';')) {
      errors.push(`headers[${index}] must look like "Name: value" or "Name;"`);
    }
  }

  if (config.auth !== undefined && config.auth.length === 0) {
    errors.push('auth must not be an empty string');
  }

  if (config.packaged && !config.installerEmbeddedDir) {
    errors.push('installerEmbeddedDir is required when packaged is true');
  }

  return errors;
}
