/**
 * Transport flags shared by every sfetch command.
 */

import * as path from 'path';
import { Command } from 'commander';
import type { CoordinatorConfig, TransportConfig } from '@supervised-fetch/core';

/** Parsed transport flags as commander hands them to an action */
export interface TransportCliOptions {
  user?: string;
  cacert?: string;
  capath?: string;
  cert?: string;
  continue?: boolean;
  insecure?: boolean;
  header: string[];
  verbose?: boolean;
}

/** Destination used when the source has no usable file name */
export const FALLBACK_DESTINATION = 'download';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Attach the transport flags to a command */
export function addTransportOptions(cmd: Command): Command {
  return cmd
    .option('-u, --user <auth>', 'Credentials as user[:password]')
    .option('--cacert <file>', 'CA certificate file to verify the peer with')
    .option('--capath <dir>', 'Directory of CA certificates to verify the peer with')
    .option('--cert <file>', 'Client certificate to present')
    .option('-k, --insecure', 'Skip TLS certificate verification')
    .option('-H, --header <header>', 'Extra request header (repeatable)', collect, [])
    .option('--verbose', 'Log transfer details to stderr');
}

/**
 * Merge CLI flags with the packaging settings from the process config.
 */
export function toTransportConfig(
  opts: TransportCliOptions,
  config: CoordinatorConfig
): TransportConfig {
  return {
    auth: opts.user,
    caCertPath: opts.cacert,
    caDirPath: opts.capath,
    clientCertPath: opts.cert,
    resume: opts.continue ?? false,
    insecureTLS: opts.insecure ?? false,
    headers: opts.header,
    packaged: config.packaged,
    installerEmbeddedDir: config.installerEmbeddedDir || undefined,
  };
}

/**
 * Pick a local file name for a source: the last path segment of a URL,
 * the base name of anything else.
 */
export function defaultDestination(source: string): string {
  let name: string;
  try {
    const segments = new URL(source).pathname.split('/').filter(Boolean);
    name = path.basename(decodeSegment(segments[segments.length - 1] ?? ''));
  } catch {
    name = path.basename(source);
  }

  if (!name || name === '.' || name === '..') {
    return FALLBACK_DESTINATION;
  }
  return name;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
