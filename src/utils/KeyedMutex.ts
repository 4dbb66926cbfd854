/**
 * Per-key serialization.
 * Operations sharing a key run one at a time in arrival order; operations
 * on different keys never wait on each other.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, op: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      return await op();
    } finally {
      release();
      // Last one out cleans up so idle hosts don't accumulate entries.
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with a running or queued operation. */
  get size(): number {
    return this.tails.size;
  }
}
