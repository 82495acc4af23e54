/**
 * Per-key serialisation of async work.
 *
 * Calls for the same key run one after another in arrival order; calls for
 * different keys do not wait on each other.
 */
export class KeyedMutex {
  private locks = new Map<string, Promise<void>>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.locks.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.locks.set(key, next);
    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.locks.get(key) === next) {
        this.locks.delete(key);
      }
    }
  }

  /** Whether any call for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.locks.has(key);
  }
}
