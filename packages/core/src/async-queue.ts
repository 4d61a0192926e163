/**
 * Async queue that hands items from a producer to a `for await...of` consumer.
 *
 * Every `push` resolves only once a consumer has taken the item, so a producer
 * awaiting each push never runs ahead of the consumer by more than one item.
 * Errors are surfaced to both sides instead of silently ending iteration.
 */
export class AsyncEventQueue<T> implements AsyncIterable<T> {
  private queue: Array<{ item: T; delivered: () => void; failed: (error: Error) => void }> = [];
  private waiters: Array<{
    resolve: (result: IteratorResult<T>) => void;
    reject: (error: Error) => void;
  }> = [];
  private done = false;
  private error: Error | null = null;

  /**
   * Push an item to the queue.
   * Resolves when a consumer has received it; rejects if the queue is aborted first.
   */
  push(item: T): Promise<void> {
    if (this.error) {
      return Promise.reject(this.error);
    }
    if (this.done) {
      return Promise.reject(new Error('Cannot push to a queue that has ended'));
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
      return Promise.resolve();
    }

    return new Promise((delivered, failed) => {
      this.queue.push({ item, delivered, failed });
    });
  }

  /**
   * End the queue normally.
   * Items already queued are still delivered; waiting consumers receive `{ done: true }`.
   */
  end(): void {
    if (this.done) return;

    this.done = true;
    if (this.queue.length === 0) {
      this.flushWaiters();
    }
  }

  /**
   * End the queue with an error.
   * Waiting consumers and pending pushes are rejected, queued items are discarded,
   * and future `next()` calls reject with the same error.
   */
  abort(error: Error): void {
    if (this.error) return;

    this.done = true;
    this.error = error;
    for (const pending of this.queue) {
      pending.failed(error);
    }
    this.queue = [];
    this.flushWaiters();
  }

  /**
   * Whether the queue has ended (normally or with error).
   */
  get isDone(): boolean {
    return this.done;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: () => {
        this.abort(new Error('Queue consumer stopped'));
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private next(): Promise<IteratorResult<T>> {
    const error = this.error;
    if (error) {
      return Promise.reject(error);
    }

    const pending = this.queue.shift();
    if (pending) {
      pending.delivered();
      return Promise.resolve({ value: pending.item, done: false });
    }

    if (this.done) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private flushWaiters(): void {
    for (const { resolve, reject } of this.waiters) {
      if (this.error) {
        reject(this.error);
      } else {
        resolve({ value: undefined, done: true });
      }
    }
    this.waiters = [];
  }
}
