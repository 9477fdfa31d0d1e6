/**
 * Serializes work per key. Callers holding different keys run concurrently;
 * callers sharing a key queue in arrival order (single writer per key).
 */
export interface RebuildLock {
  run<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

export class KeyedMutex implements RebuildLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(fn);
    // The queue only tracks completion; the caller still sees the rejection.
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
