/**
 * Per-key FIFO mutex.
 *
 * Each key owns a promise chain; callers for the same key run strictly in
 * arrival order while different keys proceed in parallel. Entries are
 * removed once a key's chain drains.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
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
   * Hold several keys at once. Keys are de-duplicated and acquired in
   * ascending order, so two callers locking the same pair can't deadlock.
   */
  async runExclusiveMany<T>(keys: readonly string[], fn: () => Promise<T> | T): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const acquire = async (index: number): Promise<T> => {
      if (index >= ordered.length) return fn();
      return this.runExclusive(ordered[index], () => acquire(index + 1));
    };
    return acquire(0);
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
