/**
 * Push-to-pull adapter: producers push items, a single consumer iterates.
 */

interface Waiter<T> {
  resolve(result: IteratorResult<T>): void;
  reject(error: unknown): void;
}

/**
 * Unbounded single-consumer async queue. Items pushed before the consumer
 * starts are buffered; after `end()` or `fail()` further pushes are dropped.
 */
export class EventQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;
  private consumed = false;

  push(item: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.items.push(item);
    }
  }

  /** Complete the sequence once buffered items are drained. */
  end(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  /** Terminate the sequence with an error once buffered items are drained. */
  fail(error: unknown): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = { error };
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consumed) {
      throw new Error('Event sequence is not restartable');
    }
    this.consumed = true;
    return {
      next: () => this.next(),
      return: async () => {
        this.end();
        this.items = [];
        return { value: undefined, done: true };
      },
    };
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [head] = this.items.splice(0, 1);
      return Promise.resolve({ value: head, done: false });
    }
    if (this.failure) return Promise.reject(this.failure.error);
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }
}
