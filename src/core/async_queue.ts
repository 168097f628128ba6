type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (err: Error) => void;
};

/**
 * Unbounded FIFO channel. Producers push without waiting; a single consumer
 * pulls with `next()` or `for await`. Closing with an error lets the consumer
 * drain what was already pushed, then rejects its next pull.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Array<Waiter<T>> = [];
  private closed = false;
  private failure: Error | null = null;

  push(item: T) {
    if (this.closed) {
      throw new Error('AsyncQueue is closed');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
      return;
    }
    this.items.push(item);
  }

  close(err?: Error) {
    if (this.closed) return;
    this.closed = true;
    this.failure = err ?? null;
    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      if (this.failure) {
        waiter.reject(this.failure);
      } else {
        waiter.resolve({ value: undefined, done: true });
      }
    }
  }

  async next(): Promise<IteratorResult<T>> {
    const item = this.items.shift();
    if (item !== undefined) {
      return { value: item, done: false };
    }
    if (this.closed) {
      if (this.failure) throw this.failure;
      return { value: undefined, done: true };
    }
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }

  isClosed(): boolean {
    return this.closed;
  }
}
