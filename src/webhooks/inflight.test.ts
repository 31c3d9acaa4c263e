import { describe, it, expect, vi } from 'vitest';
import { InflightRegistry, awaitWithSignal } from './inflight.js';

function deferred<T>() {
  let resolve!: (value: T) => void;
  let reject!: (err: unknown) => void;
  const promise = new Promise<T>((res, rej) => { resolve = res; reject = rej; });
  return { promise, resolve, reject };
}

describe('InflightRegistry', () => {
  it('shares one task between concurrent callers of the same key', async () => {
    const registry = new InflightRegistry<string, number>();
    const gate = deferred<number>();
    const task = vi.fn(() => gate.promise);

    const a = registry.run('k', task);
    const b = registry.run('k', task);
    expect(registry.has('k')).toBe(true);

    gate.resolve(7);
    await expect(Promise.all([a, b])).resolves.toEqual([7, 7]);
    expect(task).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(0);
  });

  it('runs different keys independently', async () => {
    const registry = new InflightRegistry<string, string>();
    const slow = deferred<string>();

    const a = registry.run('a', () => slow.promise);
    const b = registry.run('b', async () => 'b');

    await expect(b).resolves.toBe('b');
    expect(registry.has('a')).toBe(true);

    slow.resolve('a');
    await expect(a).resolves.toBe('a');
  });

  it('drops the entry after a failure so the next call retries', async () => {
    const registry = new InflightRegistry<string, number>();
    const task = vi.fn()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce(2);

    await expect(registry.run('k', task)).rejects.toThrow('boom');
    expect(registry.has('k')).toBe(false);
    await expect(registry.run('k', task)).resolves.toBe(2);
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('handles tasks that throw synchronously', async () => {
    const registry = new InflightRegistry<string, number>();
    const p = registry.run('k', () => { throw new Error('sync'); });

    await expect(p).rejects.toThrow('sync');
    expect(registry.has('k')).toBe(false);
  });
});

describe('awaitWithSignal', () => {
  it('passes the value through without a signal', async () => {
    await expect(awaitWithSignal(Promise.resolve(1))).resolves.toBe(1);
  });

  it('rejects immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('gone'));
    await expect(awaitWithSignal(Promise.resolve(1), controller.signal)).rejects.toThrow('gone');
  });

  it('detaches the caller without settling the shared promise', async () => {
    const gate = deferred<number>();
    const controller = new AbortController();

    const detached = awaitWithSignal(gate.promise, controller.signal);
    controller.abort(new Error('caller gave up'));
    await expect(detached).rejects.toThrow('caller gave up');

    gate.resolve(5);
    await expect(gate.promise).resolves.toBe(5);
  });
});
