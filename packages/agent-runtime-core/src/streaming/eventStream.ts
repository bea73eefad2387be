/**
 * Backpressure-Aware Event Stream
 *
 * Buffered single-consumer channel. Producers push events in order and may
 * await `drained()` when `push` reports backpressure; the consumer pulls
 * them through `consume()`.
 */

interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
}

export interface EventStreamOptions {
  readonly highWaterMark?: number;
  readonly lowWaterMark?: number;
}

export class BackpressureEventStream<T> {
  private readonly buffer: T[] = [];
  private readonly highWaterMark: number;
  private readonly lowWaterMark: number;
  private isClosed = false;
  private hasConsumer = false;
  private consumerLeft = false;
  private waiter?: Waiter<T>;
  private drainWaiters: Array<() => void> = [];

  constructor(options: EventStreamOptions = {}) {
    this.highWaterMark = options.highWaterMark ?? 100;
    this.lowWaterMark = options.lowWaterMark ?? 20;
  }

  /**
   * Push an event to the stream.
   * @returns true while the buffer is below the high water mark
   */
  push(event: T): boolean {
    if (this.isClosed) {
      return false;
    }

    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = undefined;
      resolve({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }

    return this.buffer.length < this.highWaterMark;
  }

  /**
   * Resolves once the consumer has pulled the buffer down to the low water
   * mark, or has stopped consuming.
   */
  drained(): Promise<void> {
    if (this.isClosed || this.consumerLeft || this.buffer.length <= this.lowWaterMark) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = undefined;
      resolve({ value: undefined, done: true });
    }
    this.releaseDrainWaiters();
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Consume events using an async generator.
   * Throws if multiple consumers attempt to consume simultaneously.
   * Producers waiting on `drained()` are released when the consumer returns.
   */
  async *consume(): AsyncGenerator<T, void, undefined> {
    if (this.hasConsumer) {
      throw new Error("BackpressureEventStream only supports a single consumer");
    }
    this.hasConsumer = true;
    this.consumerLeft = false;

    try {
      while (!this.isClosed || this.buffer.length > 0) {
        if (this.buffer.length > 0) {
          const [next] = this.buffer.splice(0, 1);
          if (this.buffer.length <= this.lowWaterMark) {
            this.releaseDrainWaiters();
          }
          yield next;
          continue;
        }
        const next = await new Promise<IteratorResult<T, undefined>>((resolve) => {
          this.waiter = { resolve };
        });
        if (next.done) {
          break;
        }
        yield next.value;
      }
    } finally {
      this.hasConsumer = false;
      this.consumerLeft = true;
      this.releaseDrainWaiters();
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  private releaseDrainWaiters(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
