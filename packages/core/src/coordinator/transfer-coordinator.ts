/**
 * Transfer coordinator.
 *
 * Public face of the package: composes the option builder, invocation
 * runner, progress parser and result classifier into `fetchToFile` and
 * `probeHeaders`. Holds no state between calls.
 *
 * @module transfer-coordinator
 */

import type { Logger } from 'pino';
import { classifyResult } from '../classify/result-classifier.js';
import type { Outcome } from '../classify/types.js';
import { CoordinatorBusyError } from '../errors.js';
import { InvocationRunner } from '../invocation/invocation-runner.js';
import type { InterruptSource, InvocationResult, StderrChunkHandler } from '../invocation/types.js';
import { formatProgressLine, ProgressStreamParser } from '../progress/progress-parser.js';
import { buildTransportOptions } from '../transport/option-builder.js';
import type { TransferRequest } from '../transport/types.js';
import type {
  CoordinatorState,
  HeaderProbeResult,
  TransferCallOptions,
  TransferCoordinatorOptions,
  TransferUI,
} from './types.js';

/**
 * Runs transfers through curl and reports their outcome.
 *
 * Not meant for overlapping calls: a second call while one is running
 * rejects with {@link CoordinatorBusyError}. Separate instances are
 * independent.
 *
 * @example
 * ```ts
 * const coordinator = new TransferCoordinator(logger, {
 *   ui: new TerminalUI(),
 *   interrupts: new ProcessInterruptSource(),
 * });
 * const request = createTransferRequest('https://example.com/box.img', '/tmp/box.img');
 * const outcome = await coordinator.fetchToFile(request);
 * ```
 */
export class TransferCoordinator {
  private readonly logger: Logger;
  private readonly runner: InvocationRunner;
  private readonly ui: TransferUI | undefined;
  private readonly interrupts: InterruptSource | undefined;
  private readonly platform: NodeJS.Platform;
  private state: CoordinatorState = 'idle';

  constructor(logger: Logger, options?: TransferCoordinatorOptions) {
    this.logger = logger.child({ component: 'transfer-coordinator' });
    this.runner = options?.runner ?? new InvocationRunner(logger);
    this.ui = options?.ui;
    this.interrupts = options?.interrupts;
    this.platform = options?.platform ?? process.platform;
  }

  /** Current lifecycle state */
  getState(): CoordinatorState {
    return this.state;
  }

  /**
   * Download `request.source` to `request.destination`.
   *
   * Progress is drawn on the UI when one is configured. The progress line
   * is cleared on every exit path, including a spawn failure.
   */
  async fetchToFile(request: TransferRequest, options?: TransferCallOptions): Promise<Outcome> {
    this.begin();
    try {
      const { args, env } = buildTransportOptions(request.config);
      args.push('--output', request.destination, request.source);

      this.logger.info(
        { source: request.source, destination: request.destination },
        'Starting download'
      );

      const onStderrChunk = this.ui ? this.progressRenderer(this.ui) : undefined;

      try {
        const result = await this.invoke(args, env, onStderrChunk, options?.signal);
        return this.finish(result);
      } finally {
        this.clearProgress();
      }
    } finally {
      this.state = 'idle';
    }
  }

  /**
   * Fetch only the response headers of `request.source`.
   * No progress is drawn; header text is curl's stdout.
   */
  async probeHeaders(
    request: TransferRequest,
    options?: TransferCallOptions
  ): Promise<HeaderProbeResult> {
    this.begin();
    try {
      const { args, env } = buildTransportOptions(request.config);
      args.unshift('-I');
      args.push(request.source);

      this.logger.info({ source: request.source }, 'Probing headers');

      const result = await this.invoke(args, env, undefined, options?.signal);
      return { headerText: result.stdout, outcome: this.finish(result) };
    } finally {
      this.state = 'idle';
    }
  }

  /** Cancel the running call, if any */
  cancel(): void {
    this.runner.cancel();
  }

  // ─── Private methods ───────────────────────────────────────────

  private begin(): void {
    if (this.state !== 'idle') {
      throw new CoordinatorBusyError();
    }
    this.state = 'building';
  }

  private async invoke(
    args: string[],
    env: Record<string, string>,
    onStderrChunk: StderrChunkHandler | undefined,
    signal: AbortSignal | undefined
  ): Promise<InvocationResult> {
    const unregister = this.interrupts?.onInterrupt(() => {
      this.logger.info('Transfer interrupted');
      this.runner.cancel();
    });

    this.state = 'running';
    try {
      return await this.runner.run(args, env, { onStderrChunk, signal });
    } finally {
      unregister?.();
    }
  }

  private finish(result: InvocationResult): Outcome {
    const outcome = classifyResult(result);

    if (outcome.kind === 'tool-error') {
      this.logger.warn(
        { exitCode: result.exitCode, signal: result.signal, message: outcome.message },
        'Transfer tool reported failure'
      );
    } else {
      this.logger.info({ outcome: outcome.kind }, 'Transfer finished');
    }

    return outcome;
  }

  /** One parser per call, so a partial record never leaks into the next transfer */
  private progressRenderer(ui: TransferUI): StderrChunkHandler {
    const parser = new ProgressStreamParser();
    return (chunk) => {
      for (const sample of parser.feed(chunk)) {
        ui.clearLine();
        ui.renderDetail(formatProgressLine(sample), false);
      }
    };
  }

  private clearProgress(): void {
    if (!this.ui) return;

    this.ui.clearLine();

    // The Windows console does not always clear; move past the stale line.
    if (this.platform === 'win32') {
      this.ui.renderDetail('', true);
    }
  }
}
