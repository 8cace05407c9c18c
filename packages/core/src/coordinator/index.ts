export { TransferCoordinator } from './transfer-coordinator.js';
export { createTransferCoordinator } from './factory.js';
export type { CreateTransferCoordinatorOptions } from './factory.js';
export type {
  CoordinatorState,
  HeaderProbeResult,
  TransferCallOptions,
  TransferCoordinatorOptions,
  TransferUI,
} from './types.js';
