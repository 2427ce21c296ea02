/**
 * @module utils/async-channel
 * @fileoverview Push-to-pull bridge: producers `push()`, consumers iterate
 * with `for await`.
 *
 * Unbounded. Values pushed after `close()` are dropped; consumers drain the
 * buffer before they see the end of the stream.
 */

type Waiter<T> = (result: IteratorResult<T>) => void;

export class AsyncChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private readonly closeListeners: Array<() => void> = [];

  push(value: T): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.buffer.push(value);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters) {
      waiter({ value: undefined, done: true });
    }
    this.waiters = [];

    for (const listener of this.closeListeners.splice(0)) {
      listener();
    }
  }

  /** Run `listener` once when the channel closes (immediately if it already has). */
  onClose(listener: () => void): void {
    if (this.closed) {
      listener();
      return;
    }
    this.closeListeners.push(listener);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of values waiting to be pulled. */
  get pending(): number {
    return this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        if (this.buffer.length > 0) {
          const value = this.buffer[0];
          this.buffer.splice(0, 1);
          return Promise.resolve({ value, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T>>((resolve) => {
          this.waiters.push(resolve);
        });
      },
      // `break` out of a for-await loop ends the subscription.
      return: (): Promise<IteratorResult<T>> => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
