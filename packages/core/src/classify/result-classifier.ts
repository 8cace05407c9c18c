/**
 * Maps a finished invocation onto an {@link Outcome}.
 */

import type { InvocationResult } from '../invocation/types.js';
import type { Outcome } from './types.js';

/** curl's error line: `curl: (6) Could not resolve host: ...` */
const CURL_ERROR_PATTERN = /curl:\s+\(\d+\)\s*/;

/**
 * Pull the human-readable message out of curl's stderr.
 *
 * Everything after the first `curl: (N) ` to the end of the stream, less
 * one trailing newline. Empty when curl printed no such line.
 */
export function extractToolMessage(stderr: string): string {
  const match = CURL_ERROR_PATTERN.exec(stderr);
  if (!match) {
    return '';
  }
  return stderr.slice(match.index + match[0].length).replace(/\r?\n$/, '');
}

/**
 * Classify an invocation result.
 *
 * Cancellation wins over any exit code, since a terminated curl may still
 * report 0 or a meaningless failure code.
 */
export function classifyResult(result: InvocationResult): Outcome {
  if (result.wasCancelled) {
    return { kind: 'cancelled' };
  }

  if (result.exitCode === 0) {
    return { kind: 'success' };
  }

  return {
    kind: 'tool-error',
    message: extractToolMessage(result.stderr),
    exitCode: result.exitCode,
  };
}
