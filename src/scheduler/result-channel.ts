/**
 * Unbounded single-consumer completion queue. Producers push as work
 * completes; the consumer iterates in arrival order.
 */
export class ResultChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private pending: { resolve: (result: IteratorResult<T>) => void; reject: (error: unknown) => void } | null = null;
  private closed = false;
  private failure: { error: unknown } | null = null;

  get size(): number {
    return this.buffer.length;
  }

  push(item: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed ResultChannel');
    }
    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve({ value: item, done: false });
      return;
    }
    this.buffer.push(item);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve({ value: undefined, done: true });
    }
  }

  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    if (this.pending) {
      const { reject } = this.pending;
      this.pending = null;
      reject(error);
    }
  }

  /** Removes and returns everything buffered but not yet read. */
  takeAll(): T[] {
    return this.buffer.splice(0, this.buffer.length);
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.pending) {
      return Promise.reject(new Error('ResultChannel supports a single pending reader'));
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
