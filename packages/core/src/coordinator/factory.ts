/**
 * Builds a coordinator from process-level configuration.
 */

import type { Logger } from 'pino';
import type { CoordinatorConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { InvocationRunner } from '../invocation/invocation-runner.js';
import { ProcessInterruptSource } from '../invocation/interrupts.js';
import type { InterruptSource } from '../invocation/types.js';
import { TransferCoordinator } from './transfer-coordinator.js';
import type { TransferUI } from './types.js';

export interface CreateTransferCoordinatorOptions {
  /** Progress rendering target */
  ui?: TransferUI;

  /** Logger to use instead of a fresh root at `config.logLevel` */
  logger?: Logger;

  /** Interrupt source. Defaults to SIGINT/SIGTERM on this process; pass null to disable. */
  interrupts?: InterruptSource | null;
}

/**
 * Wire logger, runner and interrupt handling from a {@link CoordinatorConfig}.
 */
export function createTransferCoordinator(
  config: CoordinatorConfig,
  options?: CreateTransferCoordinatorOptions
): TransferCoordinator {
  const logger = options?.logger ?? createLogger({ level: config.logLevel });
  const runner = new InvocationRunner(logger, {
    binary: config.binary,
    killGraceMs: config.killGraceMs,
  });
  const interrupts =
    options?.interrupts === undefined ? new ProcessInterruptSource() : options.interrupts ?? undefined;

  return new TransferCoordinator(logger, {
    runner,
    ui: options?.ui,
    interrupts,
  });
}
