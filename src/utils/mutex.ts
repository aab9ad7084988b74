/**
 * Per-key async mutex.
 */

/**
 * Serializes async critical sections that share a key.
 *
 * Each key holds the tail of a promise chain; a new section waits for the
 * tail, then becomes the tail itself. Keys are dropped once idle.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
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
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with a pending or running section.
   */
  get size(): number {
    return this.tails.size;
  }
}
