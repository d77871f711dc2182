/**
 * In-process critical sections keyed by string
 *
 * Work submitted under the same key runs strictly one after another;
 * different keys run concurrently. Cross-process safety comes from the
 * conditional writes in the store, not from this lock.
 */

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with queued or running work
   */
  get size(): number {
    return this.tails.size;
  }
}

export const reportLockKey = (resortId: string, date: string): string => `${resortId}#${date}`;
