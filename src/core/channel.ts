/**
 * Bounded async channel
 * Single-consumer queue used by the hub registry loop and per-client writers.
 */

export class Channel<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(value: T | undefined) => void> = [];
  private closed = false;

  constructor(private readonly capacity: number = Number.POSITIVE_INFINITY) {}

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue without waiting. Returns false when full or closed.
   */
  trySend(value: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
      return true;
    }

    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push(value);
    return true;
  }

  /**
   * Enqueue ignoring capacity. Used for control commands that must not be lost.
   */
  send(value: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  /**
   * Next value, or undefined once the channel is closed and drained
   */
  receive(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }
}
