import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { vi } from 'vitest';
import type { Logger } from 'pino';

export interface MockLogger {
  info: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
  child: ReturnType<typeof vi.fn>;
}

// Create a mock logger whose child() returns itself
export function createMockLogger(): MockLogger {
  const logger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function asLogger(mock: MockLogger): Logger {
  return mock as unknown as Logger;
}

/** Let stream data and nextTick callbacks drain */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * In-process stand-in for a curl child process.
 *
 * Tests drive it explicitly: `start()` emits 'spawn', `writeStderr()` pushes
 * meter output, `finish()` emits 'exit' then 'close'.
 */
export class FakeChildProcess extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid = 4242;
  readonly killSignals: string[] = [];

  /** When set, kill() finishes the process with this signal */
  exitOnKill = true;

  kill(signal?: NodeJS.Signals | number): boolean {
    const name = typeof signal === 'string' ? signal : 'SIGTERM';
    this.killSignals.push(name);
    if (this.exitOnKill) {
      void this.finish(null, name);
    }
    return true;
  }

  start(): void {
    this.emit('spawn');
  }

  async writeStdout(text: string): Promise<void> {
    this.stdout.write(text);
    await flush();
  }

  async writeStderr(text: string): Promise<void> {
    this.stderr.write(text);
    await flush();
  }

  async finish(code: number | null, signal: string | null = null): Promise<void> {
    this.emit('exit', code, signal);
    this.stdout.end();
    this.stderr.end();
    await flush();
    this.emit('close', code, signal);
  }

  fail(err: Error): void {
    this.emit('error', err);
  }
}

export function enoent(binary: string): Error {
  return Object.assign(new Error(`spawn ${binary} ENOENT`), { code: 'ENOENT' });
}
