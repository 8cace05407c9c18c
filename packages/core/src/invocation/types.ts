/**
 * Types for running curl as a supervised child process.
 */

import type { ChildProcess, SpawnOptions } from 'node:child_process';

/** Everything captured from one finished invocation */
export interface InvocationResult {
  /** Exit code, or null when the process died by signal or never started */
  exitCode: number | null;

  /** Signal that terminated the process, if any */
  signal: NodeJS.Signals | null;

  /** Full captured stdout (header text for a HEAD probe) */
  stdout: string;

  /** Full captured stderr (progress meter and error line) */
  stderr: string;

  /** Cancellation was observed before or during the run */
  wasCancelled: boolean;
}

/** Receives stderr text as it arrives, in write order */
export type StderrChunkHandler = (chunk: string) => void;

/** Per-call options for {@link InvocationRunner.run} */
export interface RunOptions {
  /** Live stderr consumer, called until the process exits */
  onStderrChunk?: StderrChunkHandler;

  /** Aborting this signal cancels the invocation */
  signal?: AbortSignal;
}

/** Child process factory; matches the `spawn(command, args, options)` overload */
export type SpawnProcess = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildProcess;

/** Source of out-of-band interrupt notifications (e.g. Ctrl-C) */
export interface InterruptSource {
  /**
   * Register a listener for the duration of one invocation.
   * Returns a function that unregisters it.
   */
  onInterrupt(listener: () => void): () => void;
}
