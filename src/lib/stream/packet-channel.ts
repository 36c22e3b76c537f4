import { CHANNEL_CAPACITY } from "../protocol/constants.ts";
import { ChannelClosedError } from "../utils/errors.ts";

interface BlockedSender<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Bounded FIFO channel between the frame reader and its consumers
 *
 * - `send` resolves once the value is queued or handed to a receiver, and
 *   stays pending while the queue is full.
 * - `receive` resolves with the next value, or `null` once the channel is
 *   closed and drained.
 * - With several receivers waiting, each value goes to exactly one of them,
 *   in the order they asked.
 * - `close` rejects blocked and later senders with `ChannelClosedError`.
 */
export class PacketChannel<T extends object> implements AsyncIterable<T> {
  public readonly capacity: number;

  private readonly queue: T[] = [];
  private readonly receivers: Array<(value: T | null) => void> = [];
  private readonly senders: Array<BlockedSender<T>> = [];
  private closed = false;

  constructor(capacity: number = CHANNEL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Channel capacity must be a positive integer, got ${capacity}`,
      );
    }
    this.capacity = capacity;
  }

  /** Number of queued values */
  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  public send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
      return Promise.resolve();
    }

    if (this.queue.length < this.capacity) {
      this.queue.push(value);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  public receive(): Promise<T | null> {
    if (this.queue.length > 0) {
      const value = this.queue[0];
      this.queue.shift();

      // A slot opened up: admit the oldest blocked sender
      const sender = this.senders.shift();
      if (sender) {
        this.queue.push(sender.value);
        sender.resolve();
      }

      return Promise.resolve(value);
    }

    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Close the channel. Queued values remain receivable. Idempotent.
   */
  public close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
    // Receivers only wait on an empty queue
    for (const receiver of this.receivers.splice(0)) {
      receiver(null);
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const value = await this.receive();
      if (value === null) return;
      yield value;
    }
  }
}
