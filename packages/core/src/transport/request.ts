/**
 * Transfer request construction.
 *
 * Credentials embedded in an http(s) source URL are moved into the
 * transport config here, once, so the URL that reaches curl or the logs
 * never carries them.
 */

import type { TransferRequest, TransportConfig } from './types.js';

/** Credentials lifted out of a source URL */
export interface ExtractedCredentials {
  /** Source with user-info removed */
  source: string;

  /** `user`, `user:password` or `:password`, or null when the URL carried none */
  auth: string | null;
}

/**
 * Split user-info out of an http-family URL.
 *
 * A source that does not parse as a URL, or is not http-family, or has no
 * user-info, comes back unchanged. It may be a path or a scheme curl
 * still understands.
 */
export function extractUrlCredentials(source: string): ExtractedCredentials {
  let url: URL;
  try {
    url = new URL(source);
  } catch {
    return { source, auth: null };
  }

  if (!url.protocol.startsWith('http') || (!url.username && !url.password)) {
    return { source, auth: null };
  }

  const auth = url.password ? `${url.username}:${url.password}` : url.username;
  url.username = '';
  url.password = '';

  return { source: url.toString(), auth };
}

/**
 * Build an immutable transfer request.
 *
 * URL credentials only fill `auth` when the caller left it unset; they are
 * stripped from the source either way.
 */
export function createTransferRequest(
  source: string,
  destination: string,
  config: TransportConfig = {}
): TransferRequest {
  const extracted = extractUrlCredentials(source);

  const merged: TransportConfig = {
    ...config,
    headers: config.headers ? [...config.headers] : undefined,
  };
  if (merged.auth === undefined && extracted.auth !== null) {
    merged.auth = extracted.auth;
  }

  return Object.freeze({
    source: extracted.source,
    destination,
    config: Object.freeze(merged),
  });
}
