/**
 * @squadline/runtime - Async Lock
 *
 * Promise-chained mutual exclusion for the event loop.
 * Each `runExclusive` call waits for the previous holder to release before
 * running, so critical sections run strictly in arrival order.
 *
 * @example
 * ```typescript
 * const lock = new AsyncLock();
 * await lock.runExclusive(async () => {
 *   const current = entries.get(key);
 *   entries.set(key, next(current));
 * });
 * ```
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `operation` once every earlier holder has released the lock
   */
  async runExclusive<T>(operation: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;

    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    await previous;
    try {
      return await operation();
    } finally {
      this.pending--;
      release();
    }
  }

  /**
   * Whether any caller holds or is waiting for the lock
   */
  isLocked(): boolean {
    return this.pending > 0;
  }
}
