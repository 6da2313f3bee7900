/**
 * Bounded Channel
 *
 * Async queue with a fixed buffer used by generated DAO `stream()` methods.
 * The producer awaits `push` and is suspended once `capacity` values are
 * buffered ahead of the consumer. Consumers read with `for await`.
 */

export class ChannelClosedError extends Error {
  constructor() {
    super('Cannot push to a closed channel');
    this.name = 'ChannelClosedError';
  }
}

interface Slot<T> {
  value: T;
}

type ConsumerWaiter<T> = (result: IteratorResult<T, undefined>) => void;

interface ProducerWaiter {
  resolve: () => void;
}

export class BoundedChannel<T> implements AsyncIterable<T> {
  readonly capacity: number;
  private buffer: Slot<T>[] = [];
  private consumers: ConsumerWaiter<T>[] = [];
  private producers: ProducerWaiter[] = [];
  private closed = false;

  /**
   * @param capacity - number of values buffered ahead of the consumer; 0 hands
   * each value directly to a waiting consumer
   */
  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Channel capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Number of values currently buffered */
  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue a value, waiting while the buffer is full.
   * Rejects with ChannelClosedError if the channel is (or becomes) closed.
   */
  async push(value: T): Promise<void> {
    for (;;) {
      if (this.closed) {
        throw new ChannelClosedError();
      }

      const consumer = this.consumers.shift();
      if (consumer) {
        consumer({ value, done: false });
        return;
      }

      if (this.buffer.length < this.capacity) {
        this.buffer.push({ value });
        return;
      }

      await new Promise<void>((resolve) => {
        this.producers.push({ resolve });
      });
    }
  }

  /**
   * Take the next value. Resolves `done` once the channel is closed and drained.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    const slot = this.buffer.shift();
    if (slot) {
      this.wakeProducer();
      return Promise.resolve({ value: slot.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.consumers.push(resolve);
      // A rendezvous producer may be parked waiting for exactly this consumer
      this.wakeProducer();
    });
  }

  /**
   * Close the channel. Buffered values stay readable; waiting consumers
   * finish, waiting producers are rejected.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const consumer of this.consumers.splice(0)) {
      consumer({ value: undefined, done: true });
    }
    for (const producer of this.producers.splice(0)) {
      producer.resolve();
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
    };
  }

  private wakeProducer(): void {
    this.producers.shift()?.resolve();
  }
}
