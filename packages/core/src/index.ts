/**
 * @supervised-fetch/core
 *
 * Supervised curl transfers: command-line construction from transport
 * policies, live progress parsing, cooperative cancellation and outcome
 * classification.
 */

// Transport module
export {
  buildTransportOptions,
  buildEnvironmentOverrides,
  validateTransportConfig,
  createTransferRequest,
  extractUrlCredentials,
} from './transport/index.js';

export type {
  TransportConfig,
  TransportOptions,
  TransferRequest,
  ExtractedCredentials,
} from './transport/index.js';

// Progress module
export {
  ProgressStreamParser,
  parseProgressRecord,
  formatProgressLine,
} from './progress/index.js';

export type { ProgressSample } from './progress/index.js';

// Invocation module
export { InvocationRunner, ProcessInterruptSource } from './invocation/index.js';

export type {
  InvocationRunnerOptions,
  InvocationResult,
  InterruptSource,
  RunOptions,
  SignalEmitter,
  SpawnProcess,
  StderrChunkHandler,
} from './invocation/index.js';

// Classification
export { classifyResult, extractToolMessage } from './classify/index.js';

export type {
  Outcome,
  OutcomeKind,
  SuccessOutcome,
  CancelledOutcome,
  ToolErrorOutcome,
} from './classify/index.js';

// Coordinator
export { TransferCoordinator, createTransferCoordinator } from './coordinator/index.js';

export type {
  CreateTransferCoordinatorOptions,
  CoordinatorState,
  HeaderProbeResult,
  TransferCallOptions,
  TransferCoordinatorOptions,
  TransferUI,
} from './coordinator/index.js';

// Config, logging and errors
export {
  buildCoordinatorConfig,
  validateCoordinatorConfig,
  DEFAULT_COORDINATOR_CONFIG,
} from './config.js';

export type { CoordinatorConfig } from './config.js';

export { createLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { CreateLoggerOptions } from './logger.js';

export {
  SupervisedFetchError,
  SpawnFailureError,
  CoordinatorBusyError,
  TransferCancelledError,
  TransferToolError,
  outcomeToError,
} from './errors.js';

export { USER_AGENT, PRODUCT_NAME, PRODUCT_VERSION } from './constants.js';
