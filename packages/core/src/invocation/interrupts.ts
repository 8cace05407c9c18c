/**
 * Interrupt sources backed by process signals.
 */

import type { InterruptSource } from './types.js';

/** The slice of `process` used to listen for signals */
export interface SignalEmitter {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Turns SIGINT/SIGTERM into interrupt notifications.
 *
 * Listeners are attached only while an invocation is registered, so the
 * process keeps its default signal behavior between transfers.
 */
export class ProcessInterruptSource implements InterruptSource {
  private readonly signals: readonly NodeJS.Signals[];
  private readonly target: SignalEmitter;

  constructor(
    signals: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'],
    target: SignalEmitter = process
  ) {
    this.signals = signals;
    this.target = target;
  }

  onInterrupt(listener: () => void): () => void {
    const handler = (): void => {
      listener();
    };

    for (const signal of this.signals) {
      this.target.on(signal, handler);
    }

    return () => {
      for (const signal of this.signals) {
        this.target.off(signal, handler);
      }
    };
  }
}
