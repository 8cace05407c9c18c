/**
 * Types for the transfer coordinator facade.
 */

import type { Outcome } from '../classify/types.js';
import type { InterruptSource } from '../invocation/types.js';
import type { InvocationRunner } from '../invocation/invocation-runner.js';

/** Terminal surface the coordinator draws progress on */
export interface TransferUI {
  /** Erase the current line */
  clearLine(): void;

  /** Draw text, optionally followed by a newline */
  renderDetail(text: string, appendNewline: boolean): void;
}

/** Lifecycle of a single coordinator call */
export type CoordinatorState = 'idle' | 'building' | 'running';

/** Options for creating a TransferCoordinator */
export interface TransferCoordinatorOptions {
  /** Progress rendering target; no progress is drawn without one */
  ui?: TransferUI;

  /** Interrupt notifications, registered for each invocation */
  interrupts?: InterruptSource;

  /** Custom runner (for testing or a non-default binary) */
  runner?: InvocationRunner;

  /** Platform used for console quirks. Defaults to process.platform. */
  platform?: NodeJS.Platform;
}

/** Per-call options */
export interface TransferCallOptions {
  /** Aborting this signal cancels the call */
  signal?: AbortSignal;
}

/** Result of a HEAD probe */
export interface HeaderProbeResult {
  /** Header text curl wrote to stdout */
  headerText: string;

  outcome: Outcome;
}
