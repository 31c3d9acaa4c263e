/**
 * Per-key in-flight request registry
 * Concurrent callers for the same key share one pending promise;
 * the entry is dropped as soon as it settles so the next miss starts fresh.
 */

export class InflightRegistry<K, V> {
  private pending = new Map<K, Promise<V>>();

  /**
   * Join the pending task for `key`, or start one with `task`.
   * `task` runs at most once per key while its promise is outstanding.
   */
  run(key: K, task: () => Promise<V>): Promise<V> {
    const existing = this.pending.get(key);
    if (existing) return existing;

    // Deferred a tick so a synchronous throw still lands after the entry is registered
    const promise: Promise<V> = Promise.resolve()
      .then(task)
      .finally(() => {
        if (this.pending.get(key) === promise) this.pending.delete(key);
      });

    this.pending.set(key, promise);
    return promise;
  }

  has(key: K): boolean {
    return this.pending.has(key);
  }

  get size(): number {
    return this.pending.size;
  }
}

/**
 * Race a shared promise against one caller's abort signal.
 * Aborting only detaches this caller; the shared promise keeps running.
 */
export function awaitWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
