/**
 * FIFO async mutual exclusion.
 *
 * Callers queue behind the previous holder; a failing critical section
 * releases the lock and rethrows to its own caller only.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders: number = 0;

  get isLocked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    this.holders++;

    await previous;
    try {
      return await fn();
    } finally {
      this.holders--;
      release();
    }
  }

  /**
   * Resolves once every critical section queued so far has finished
   */
  async drain(): Promise<void> {
    await this.runExclusive(() => undefined);
  }
}
