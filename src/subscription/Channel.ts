import { TsdbError } from '../core/errors';

/**
 * Send on, or close of, a channel that is already closed
 */
export class ChannelClosedError extends TsdbError {
  constructor() {
    super('channel is closed');
  }
}

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Bounded FIFO channel between one producer loop and its consumers.
 * A capacity of 0 only hands values to receivers already waiting.
 *
 * @example
 * ```typescript
 * const messages = new Channel<SubscribedMessage>(64);
 * for await (const message of messages) {
 *   handle(message);
 * }
 * ```
 */
export class Channel<T> implements AsyncIterable<T> {
  readonly capacity: number;

  private buffer: T[] = [];
  private receivers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private senders: Array<PendingSend<T>> = [];
  private isClosed = false;

  constructor(capacity = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`invalid channel capacity: ${capacity}`);
    }
    this.capacity = capacity;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of buffered values */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Deliver without waiting
   * @returns false when the buffer is full and nobody is waiting
   * @throws ChannelClosedError
   */
  trySend(value: T): boolean {
    if (this.isClosed) {
      throw new ChannelClosedError();
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value });
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return true;
    }
    return false;
  }

  /**
   * Deliver, waiting for room in the buffer
   * @throws ChannelClosedError, also when the channel closes while waiting
   */
  send(value: T): Promise<void> {
    if (this.trySend(value)) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  /**
   * Next value; `done` once the channel is closed and drained
   */
  receive(): Promise<IteratorResult<T, undefined>> {
    const value = this.takeBuffered();
    if (value !== undefined) {
      return Promise.resolve({ done: false, value: value.item });
    }

    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ done: false, value: sender.value });
    }

    if (this.isClosed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Close the channel. Buffered values can still be received.
   * @throws ChannelClosedError if already closed
   */
  close(): void {
    if (this.isClosed) {
      throw new ChannelClosedError();
    }
    this.isClosed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver({ done: true, value: undefined });
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const result = await this.receive();
      if (result.done) return;
      yield result.value;
    }
  }

  /**
   * Shift the oldest buffered value and refill from a waiting sender
   */
  private takeBuffered(): { item: T } | undefined {
    if (this.buffer.length === 0) {
      return undefined;
    }
    const [item] = this.buffer.splice(0, 1);
    const sender = this.senders.shift();
    if (sender) {
      this.buffer.push(sender.value);
      sender.resolve();
    }
    return { item };
  }
}
