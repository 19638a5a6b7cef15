/**
 * Bounded FIFO channel between a feed pump and its consumer.
 *
 * `send` resolves once the value is buffered or handed to a waiting
 * receiver; while the buffer is full it waits, so a slow consumer slows the
 * pump instead of growing memory. After `close()` buffered values are still
 * delivered, then receivers see the end of the stream.
 */

interface PendingSend<T> {
  value: T;
  resolve: (accepted: boolean) => void;
}

export class BoundedChannel<T> implements AsyncIterable<T> {
  private buffer: Array<{ value: T }> = [];
  private receivers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private senders: Array<PendingSend<T>> = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Buffered values not yet received */
  get size(): number {
    return this.buffer.length;
  }

  /** Senders waiting for buffer space */
  get blockedSenders(): number {
    return this.senders.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * @returns false if the channel was closed before the value was accepted
   */
  send(value: T): Promise<boolean> {
    if (this.isClosed) {
      return Promise.resolve(false);
    }

    const receiver = this.receivers.shift();
    if (receiver !== undefined) {
      receiver({ value, done: false });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.senders.push({ value, resolve });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      const sender = this.senders.shift();
      if (sender !== undefined) {
        this.buffer.push({ value: sender.value });
        sender.resolve(true);
      }
      return Promise.resolve({ value: item.value, done: false });
    }

    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Stops accepting values. Senders still waiting for space are refused.
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    for (const sender of this.senders.splice(0)) {
      sender.resolve(false);
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const result = await this.receive();
      if (result.done === true) {
        return;
      }
      yield result.value;
    }
  }
}
