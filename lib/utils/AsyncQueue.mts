/**
 * Unbounded single-consumer queue exposed as an async iterable.
 *
 * Items pushed after close() are ignored. Items already buffered when the
 * queue closes are still delivered unless the close discards them.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiter: ((result: IteratorResult<T>) => void) | null = null;
  private closed: boolean = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.buffer.length;
  }

  push(item: T): boolean {
    if (this.closed) return false;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  close(discardPending: boolean = false): void {
    if (this.closed) return;
    this.closed = true;
    if (discardPending) this.buffer = [];

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const item = this.buffer.shift();
      if (item !== undefined) {
        return Promise.resolve({ value: item, done: false });
      }
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('AsyncQueue supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close(true);
        return { value: undefined, done: true };
      },
    };
  }
}
