/**
 * Single-consumer hand-off queue with a fixed capacity. Producers never
 * block: `trySend` reports a full or closed channel instead.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiter: ((value: T | undefined) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number = 1) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  trySend(item: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return true;
    }
    if (this.buffer.length >= this.capacity) {
      return false;
    }
    this.buffer.push(item);
    return true;
  }

  /** Next item, or `undefined` once the channel is closed and drained. */
  receive(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    if (this.waiter) {
      return Promise.reject(new Error("BoundedChannel supports a single consumer"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(undefined);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const item = await this.receive();
      if (item === undefined) {
        return;
      }
      yield item;
    }
  }
}
