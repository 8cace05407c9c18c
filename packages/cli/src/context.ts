/**
 * What a command needs from its surroundings, injectable for tests.
 */

import {
  buildCoordinatorConfig,
  createTransferCoordinator,
  type CoordinatorConfig,
  type TransferCoordinator,
  type TransferUI,
} from '@supervised-fetch/core';

/** The coordinator operations the commands call */
export type Transferer = Pick<TransferCoordinator, 'fetchToFile' | 'probeHeaders'>;

export interface CliContext {
  /** Resolve process config, with CLI overrides applied */
  loadConfig(overrides?: Partial<CoordinatorConfig>): CoordinatorConfig;

  /** Build a coordinator for one command run */
  createTransferer(config: CoordinatorConfig, ui?: TransferUI): Transferer;

  /** Whether stdout is an interactive terminal */
  isInteractive(): boolean;
}

export const defaultContext: CliContext = {
  loadConfig: (overrides) => buildCoordinatorConfig(overrides),
  createTransferer: (config, ui) => createTransferCoordinator(config, { ui }),
  isInteractive: () => process.stdout.isTTY === true,
};

/** Exit codes set by sfetch commands */
export const EXIT_CODES = {
  success: 0,
  toolError: 1,
  invalidConfig: 2,
  spawnFailure: 127,
  cancelled: 130,
} as const;
