type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
};

/**
 * Unbounded push queue consumed as an async iterable by a single reader.
 * `close()` ends iteration after buffered items drain; `fail()` ends it with
 * an error once buffered items drain.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private waiter: Waiter<T> | null = null;
  private closed = false;
  private failure: { error: unknown } | null = null;

  constructor(signal?: AbortSignal) {
    if (signal?.aborted) {
      this.closed = true;
    } else {
      signal?.addEventListener('abort', () => this.close(), { once: true });
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isDone(): boolean {
    return this.closed || this.failure !== null;
  }

  push(item: T): void {
    if (this.isDone) return;
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve({ value: item, done: false });
      return;
    }
    this.items.push(item);
  }

  close(): void {
    if (this.isDone) return;
    this.closed = true;
    this.settleWaiter();
  }

  fail(error: unknown): void {
    if (this.isDone) return;
    this.failure = { error };
    this.settleWaiter();
  }

  private settleWaiter(): void {
    if (!this.waiter) return;
    const { resolve, reject } = this.waiter;
    this.waiter = null;
    if (this.failure) {
      reject(this.failure.error);
    } else {
      resolve({ value: undefined, done: true });
    }
  }

  private next(): Promise<IteratorResult<T>> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
