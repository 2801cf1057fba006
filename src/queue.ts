export class QueueClosedError extends Error {
  constructor() {
    super('queue is closed');
    this.name = 'QueueClosedError';
  }
}

/**
 * FIFO queue with a fixed capacity. `push` suspends while the queue is full,
 * iteration suspends while it is empty. `close` lets consumers drain what is
 * left; `abort` discards buffered items and fails both sides with the reason.
 */
export class BoundedQueue<T> implements AsyncIterable<T> {
  readonly capacity: number;
  private readonly items: Array<{ value: T }> = [];
  private readonly spaceWaiters: Array<() => void> = [];
  private readonly itemWaiters: Array<() => void> = [];
  private closed = false;
  private failure: Error | undefined;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${String(capacity)}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed || this.failure !== undefined;
  }

  async push(value: T): Promise<void> {
    for (;;) {
      if (this.failure) throw this.failure;
      if (this.closed) throw new QueueClosedError();
      if (this.items.length < this.capacity) break;
      await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
    }
    this.items.push({ value });
    this.wake(this.itemWaiters);
  }

  /** Enqueues without waiting. Returns false when full or closed. */
  offer(value: T): boolean {
    if (this.isClosed || this.items.length >= this.capacity) return false;
    this.items.push({ value });
    this.wake(this.itemWaiters);
    return true;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    for (;;) {
      if (this.failure) throw this.failure;
      const head = this.items.shift();
      if (head) {
        this.wake(this.spaceWaiters);
        return { done: false, value: head.value };
      }
      if (this.closed) return { done: true, value: undefined };
      await new Promise<void>((resolve) => this.itemWaiters.push(resolve));
    }
  }

  close(): void {
    this.closed = true;
    this.wake(this.itemWaiters);
    this.wake(this.spaceWaiters);
  }

  abort(reason: Error): void {
    this.failure ??= reason;
    this.items.length = 0;
    this.wake(this.itemWaiters);
    this.wake(this.spaceWaiters);
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }

  private wake(waiters: Array<() => void>): void {
    for (const resolve of waiters.splice(0)) resolve();
  }
}
