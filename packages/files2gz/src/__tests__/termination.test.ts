import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { TerminationFlag, waitForTermination } from '../daemon/termination.js';

describe('TerminationFlag', () => {
  it('should start unset', () => {
    const flag = new TerminationFlag();
    expect(flag.requested).toBe(false);
  });

  it.each(['SIGTERM', 'SIGINT'] as const)('should be set by %s', (signal) => {
    const source = new EventEmitter();
    const onSignal = vi.fn();
    const flag = new TerminationFlag();
    flag.install(source, onSignal);

    source.emit(signal, signal);

    expect(flag.requested).toBe(true);
    expect(onSignal).toHaveBeenCalledWith(signal);
  });

  it('should stay set when a second signal arrives', () => {
    const source = new EventEmitter();
    const onSignal = vi.fn();
    const flag = new TerminationFlag();
    flag.install(source, onSignal);

    source.emit('SIGINT', 'SIGINT');
    source.emit('SIGTERM', 'SIGTERM');

    expect(flag.requested).toBe(true);
    expect(onSignal.mock.calls).toEqual([['SIGINT'], ['SIGTERM']]);
  });

  it('should ignore other signals', () => {
    const source = new EventEmitter();
    const flag = new TerminationFlag();
    flag.install(source);

    source.emit('SIGHUP', 'SIGHUP');

    expect(flag.requested).toBe(false);
  });

  it('should install listeners only once', () => {
    const source = new EventEmitter();
    const flag = new TerminationFlag();

    flag.install(source);
    flag.install(source);

    expect(source.listenerCount('SIGTERM')).toBe(1);
    expect(source.listenerCount('SIGINT')).toBe(1);
  });

  it('should remove its listeners on uninstall', () => {
    const source = new EventEmitter();
    const flag = new TerminationFlag();
    flag.install(source);

    flag.uninstall();

    expect(source.listenerCount('SIGTERM')).toBe(0);
    expect(source.listenerCount('SIGINT')).toBe(0);
  });
});

describe('waitForTermination', () => {
  it('should resolve immediately when already requested', async () => {
    const flag = new TerminationFlag();
    flag.request('SIGTERM');

    await expect(waitForTermination(flag, 1000)).resolves.toBeUndefined();
  });

  it('should resolve once the flag is set', async () => {
    const flag = new TerminationFlag();
    let done = false;
    const waiting = waitForTermination(flag, 10).then(() => {
      done = true;
    });

    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(done).toBe(false);

    flag.request('SIGINT');
    await waiting;
    expect(done).toBe(true);
  });
});
