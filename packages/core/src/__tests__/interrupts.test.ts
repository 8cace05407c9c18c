import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { ProcessInterruptSource } from '../invocation/interrupts.js';

describe('ProcessInterruptSource', () => {
  it('should notify on each configured signal while registered', () => {
    const target = new EventEmitter();
    const source = new ProcessInterruptSource(['SIGINT', 'SIGTERM'], target);
    const listener = vi.fn();

    source.onInterrupt(listener);
    target.emit('SIGINT');
    target.emit('SIGTERM');

    expect(listener).toHaveBeenCalledTimes(2);
  });

  it('should detach every handler on unregister', () => {
    const target = new EventEmitter();
    const source = new ProcessInterruptSource(['SIGINT', 'SIGTERM'], target);
    const listener = vi.fn();

    const unregister = source.onInterrupt(listener);
    unregister();
    target.emit('SIGINT');

    expect(listener).not.toHaveBeenCalled();
    expect(target.listenerCount('SIGINT')).toBe(0);
    expect(target.listenerCount('SIGTERM')).toBe(0);
  });

  it('should keep registrations independent', () => {
    const target = new EventEmitter();
    const source = new ProcessInterruptSource(['SIGINT'], target);
    const first = vi.fn();
    const second = vi.fn();

    const unregisterFirst = source.onInterrupt(first);
    source.onInterrupt(second);
    unregisterFirst();
    target.emit('SIGINT');

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('should listen to the real process by default', () => {
    const before = process.listenerCount('SIGINT');
    const unregister = new ProcessInterruptSource(['SIGINT']).onInterrupt(vi.fn());

    expect(process.listenerCount('SIGINT')).toBe(before + 1);
    unregister();
    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
