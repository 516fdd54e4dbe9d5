/**
 * Per-key serialisation queue.
 *
 * For a given key only one async task runs at a time; later calls for the
 * same key wait in FIFO order. Keys are independent of each other, so two
 * callers never block one another.
 *
 *   const mutex = new KeyedMutex<string>();
 *   await mutex.run(callerId, async () => { ... });
 */
export class KeyedMutex<K = string> {
  private readonly tails = new Map<K, Promise<void>>();

  /**
   * Run `fn` exclusively for `key` and return its result.
   * A rejection from `fn` is passed through and still releases the key.
   */
  async run<T>(key: K, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tails.set(key, gate);

    await prev;

    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === gate) {
        this.tails.delete(key);
      }
    }
  }
}
