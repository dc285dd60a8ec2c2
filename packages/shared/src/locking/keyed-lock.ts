/**
 * Keyed async mutex - serializes async operations that share a key while
 * different keys run concurrently. Waiters are served in arrival order.
 */

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier holder of `key` has finished.
   * The lock is released on every exit path, including a thrown error.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const tail = previous.then(() => gate);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** True while a holder or waiter exists for `key`. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with a holder or waiters. */
  get size(): number {
    return this.tails.size;
  }
}

const processLock = new KeyedLock();

/**
 * Serialize async operations on the same `key` within this process.
 */
export function withProcessLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  return processLock.run(key, fn);
}
