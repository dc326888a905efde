/**
 * Promise-based lock keyed by string
 *
 * Work queued under the same key runs one at a time, in call order;
 * different keys never wait on each other. Only coordinates callers in
 * this process.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier call for `key` has settled
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Last holder for this key cleans up
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with work queued or running
   */
  get size(): number {
    return this.tails.size;
  }
}
