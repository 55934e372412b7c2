/**
 * Per-key exclusive sections for async operations.
 *
 * @packageDocumentation
 */

/**
 * Serializes async operations that share a key while letting operations on
 * different keys interleave freely.
 *
 * Each key holds the tail of a promise chain; a new operation waits for the
 * tail to settle (fulfilled or rejected) before it starts.
 *
 * @example
 * ```typescript
 * const mutex = new KeyedMutex();
 * await mutex.runExclusive(sessionId, async () => {
 *   const { value, version } = await store.load(sessionId);
 *   await store.save(sessionId, next(value), version);
 * });
 * ```
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs `operation` once every earlier operation on `key` has settled.
   *
   * @param key - The entity key.
   * @param operation - The work to run exclusively.
   * @returns Whatever `operation` resolves to.
   */
  async runExclusive<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether any operation currently holds or waits for `key`.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
