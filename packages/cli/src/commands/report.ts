import chalk from 'chalk';
import { SpawnFailureError, type Outcome } from '@supervised-fetch/core';
import { failure, warn } from '../ui.js';
import { EXIT_CODES } from '../context.js';

/**
 * Print a non-success outcome and return the exit code for it.
 * Success is left to the caller, which knows what it produced.
 */
export function reportOutcome(outcome: Outcome): number {
  switch (outcome.kind) {
    case 'success':
      return EXIT_CODES.success;
    case 'cancelled':
      warn('Transfer interrupted');
      return EXIT_CODES.cancelled;
    case 'tool-error':
      failure(
        outcome.message
          ? `Transfer failed: ${outcome.message}`
          : `Transfer failed (curl exit code ${outcome.exitCode ?? 'unknown'})`
      );
      return EXIT_CODES.toolError;
  }
}

/** Map an error thrown by a transfer to an exit code, printing it */
export function reportError(error: unknown): number {
  if (error instanceof SpawnFailureError) {
    failure(`Could not run ${chalk.bold(error.binary)}: ${error.message}`);
    return EXIT_CODES.spawnFailure;
  }
  failure(error instanceof Error ? error.message : String(error));
  return EXIT_CODES.toolError;
}
