export { InvocationRunner } from './invocation-runner.js';
export type { InvocationRunnerOptions } from './invocation-runner.js';
export { ProcessInterruptSource } from './interrupts.js';
export type { SignalEmitter } from './interrupts.js';
export type {
  InvocationResult,
  InterruptSource,
  RunOptions,
  SpawnProcess,
  StderrChunkHandler,
} from './types.js';
