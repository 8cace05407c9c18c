/**
 * Error types raised by the transfer pipeline.
 *
 * Only conditions the caller cannot branch on as an outcome are thrown.
 * Cancellation and tool-reported failures are normally returned as
 * {@link Outcome} values; {@link outcomeToError} converts them for callers
 * that prefer exceptions.
 *
 * @module errors
 */

import type { Outcome } from './classify/types.js';

/** Base class for every error thrown by this package */
export class SupervisedFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SupervisedFetchError';
  }
}

/**
 * The transfer tool could not be launched at all (missing binary,
 * permission denied). Not retried.
 */
export class SpawnFailureError extends SupervisedFetchError {
  public readonly binary: string;
  public readonly code: string | null;

  constructor(binary: string, cause: Error) {
    super(`Failed to launch "${binary}": ${cause.message}`, { cause });
    this.name = 'SpawnFailureError';
    this.binary = binary;
    this.code = readErrorCode(cause);
  }
}

/** A coordinator was asked to start a transfer while one is in flight */
export class CoordinatorBusyError extends SupervisedFetchError {
  constructor() {
    super('A transfer is already in progress on this coordinator');
    this.name = 'CoordinatorBusyError';
  }
}

/** The operator aborted the transfer */
export class TransferCancelledError extends SupervisedFetchError {
  constructor() {
    super('Transfer was interrupted');
    this.name = 'TransferCancelledError';
  }
}

/** curl ran and exited non-zero */
export class TransferToolError extends SupervisedFetchError {
  public readonly exitCode: number | null;
  public readonly toolMessage: string;

  constructor(toolMessage: string, exitCode: number | null) {
    super(
      toolMessage
        ? `Transfer failed: ${toolMessage}`
        : `Transfer failed with exit code ${exitCode ?? 'unknown'}`
    );
    this.name = 'TransferToolError';
    this.exitCode = exitCode;
    this.toolMessage = toolMessage;
  }
}

/**
 * Convert a non-success outcome into the matching error.
 * Returns null for a successful outcome.
 */
export function outcomeToError(outcome: Outcome): SupervisedFetchError | null {
  switch (outcome.kind) {
    case 'success':
      return null;
    case 'cancelled':
      return new TransferCancelledError();
    case 'tool-error':
      return new TransferToolError(outcome.message, outcome.exitCode);
  }
}

function readErrorCode(err: Error): string | null {
  if ('code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}
