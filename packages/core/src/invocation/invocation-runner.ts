/**
 * Invocation runner for the transfer tool.
 *
 * Spawns curl, streams its stderr to a live consumer while capturing both
 * output streams in full, and tears the process down on cancellation:
 * SIGTERM first, SIGKILL once the grace period runs out.
 *
 * @module invocation-runner
 */

import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import type { Logger } from 'pino';
import { DEFAULT_CURL_BINARY, DEFAULT_KILL_GRACE_MS } from '../constants.js';
import { SpawnFailureError } from '../errors.js';
import type {
  InvocationResult,
  RunOptions,
  SpawnProcess,
  StderrChunkHandler,
} from './types.js';

/** Options for creating an InvocationRunner */
export interface InvocationRunnerOptions {
  /** Transfer tool binary. Defaults to 'curl'. */
  binary?: string;

  /** Milliseconds between SIGTERM and SIGKILL on cancellation. Defaults to 5000. */
  killGraceMs?: number;

  /** Environment the overrides are layered onto. Defaults to process.env. */
  baseEnv?: NodeJS.ProcessEnv;

  /** Custom process spawner (for testing) */
  spawnProcess?: SpawnProcess;
}

const defaultSpawn: SpawnProcess = (command, args, options) => spawn(command, args, options);

/**
 * Runs one curl invocation at a time.
 *
 * Usage:
 *   const runner = new InvocationRunner(logger);
 *   const result = await runner.run(args, env, { onStderrChunk });
 *   // elsewhere, e.g. from a signal handler:
 *   runner.cancel();
 */
export class InvocationRunner {
  private readonly logger: Logger;
  private readonly binary: string;
  private readonly killGraceMs: number;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly spawnProcess: SpawnProcess;
  private active: AbortController | null = null;

  constructor(logger: Logger, options?: InvocationRunnerOptions) {
    this.logger = logger.child({ component: 'invocation-runner' });
    this.binary = options?.binary ?? DEFAULT_CURL_BINARY;
    this.killGraceMs = options?.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.baseEnv = options?.baseEnv ?? process.env;
    this.spawnProcess = options?.spawnProcess ?? defaultSpawn;
  }

  /** Whether an invocation is in flight */
  get isRunning(): boolean {
    return this.active !== null;
  }

  /**
   * Cancel the in-flight invocation. A no-op when nothing is running or
   * the process has already exited; safe to call repeatedly.
   */
  cancel(): void {
    this.active?.abort();
  }

  /**
   * Run the transfer tool to completion.
   *
   * Resolves with the captured result for any exit, including cancellation.
   * Rejects with {@link SpawnFailureError} only when the tool cannot be
   * launched.
   */
  async run(
    args: readonly string[],
    envOverrides: Record<string, string>,
    options?: RunOptions
  ): Promise<InvocationResult> {
    const external = options?.signal;
    if (external?.aborted) {
      this.logger.info('Invocation cancelled before start');
      return { exitCode: null, signal: null, stdout: '', stderr: '', wasCancelled: true };
    }

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    external?.addEventListener('abort', forwardAbort, { once: true });
    this.active = controller;

    try {
      return await this.execute(args, envOverrides, controller.signal, options?.onStderrChunk);
    } finally {
      external?.removeEventListener('abort', forwardAbort);
      if (this.active === controller) {
        this.active = null;
      }
    }
  }

  // ─── Private methods ───────────────────────────────────────────

  private execute(
    args: readonly string[],
    envOverrides: Record<string, string>,
    signal: AbortSignal,
    onStderrChunk: StderrChunkHandler | undefined
  ): Promise<InvocationResult> {
    return new Promise<InvocationResult>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = this.spawnProcess(this.binary, args, {
          env: { ...this.baseEnv, ...envOverrides },
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (err) {
        reject(this.spawnFailure(err));
        return;
      }

      const stdoutChunks: string[] = [];
      const stderrChunks: string[] = [];
      let spawned = false;
      let exited = false;
      let settled = false;
      let wasCancelled = false;
      let killTimer: NodeJS.Timeout | null = null;

      const cleanup = (): void => {
        signal.removeEventListener('abort', terminate);
        if (killTimer) {
          clearTimeout(killTimer);
          killTimer = null;
        }
      };

      const terminate = (): void => {
        if (exited || wasCancelled) return;
        wasCancelled = true;
        this.logger.info({ pid: child.pid }, 'Invocation interrupted, terminating transfer tool');
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          killTimer = null;
          if (!exited) {
            this.logger.warn(
              { pid: child.pid, graceMs: this.killGraceMs },
              'Transfer tool ignored SIGTERM, sending SIGKILL'
            );
            child.kill('SIGKILL');
          }
        }, this.killGraceMs);
      };

      child.stdout?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        stdoutChunks.push(chunk);
      });

      child.stderr?.setEncoding('utf8');
      child.stderr?.on('data', (chunk: string) => {
        stderrChunks.push(chunk);
        if (!exited) {
          onStderrChunk?.(chunk);
        }
      });

      child.once('spawn', () => {
        spawned = true;
        this.logger.debug({ pid: child.pid, binary: this.binary }, 'Transfer tool started');
      });

      child.once('exit', (code, exitSignal) => {
        exited = true;
        this.logger.debug({ pid: child.pid, exitCode: code, signal: exitSignal }, 'Transfer tool exited');
      });

      child.on('error', (err) => {
        if (spawned) {
          this.logger.warn({ pid: child.pid, error: err.message }, 'Transfer tool process error');
          return;
        }
        cleanup();
        if (settled) return;
        settled = true;
        reject(this.spawnFailure(err));
      });

      child.once('close', (code, closeSignal) => {
        cleanup();
        if (settled) return;
        settled = true;
        resolve({
          exitCode: code,
          signal: closeSignal,
          stdout: stdoutChunks.join(''),
          stderr: stderrChunks.join(''),
          wasCancelled,
        });
      });

      signal.addEventListener('abort', terminate, { once: true });
    });
  }

  private spawnFailure(err: unknown): SpawnFailureError {
    const cause = err instanceof Error ? err : new Error(String(err));
    this.logger.error({ binary: this.binary, error: cause.message }, 'Failed to launch transfer tool');
    return new SpawnFailureError(this.binary, cause);
  }
}
