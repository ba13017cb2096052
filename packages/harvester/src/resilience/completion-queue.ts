/**
 * Completion Queue
 *
 * Unbounded single-consumer channel. Producers push from any task; one
 * consumer drains with `for await`. Iteration ends after `close()` once the
 * buffer is empty.
 */

export class CompletionQueue<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiter: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;

  push(item: T): void {
    if (this.closed) {
      throw new Error('CompletionQueue is closed');
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: item, done: false });
      return;
    }

    this.buffer.push(item);
  }

  close(): void {
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    if (this.waiter) {
      return Promise.reject(new Error('CompletionQueue supports a single consumer'));
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
