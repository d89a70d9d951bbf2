/**
 * Ordered FIFO channel between cooperative tasks.
 *
 * `send` suspends while `capacity` values are buffered, which gives producers
 * back-pressure; `receive` suspends while the channel is empty. After
 * `close`, pending and future receivers get `undefined` once the buffer is
 * drained, and pending and future senders are rejected.
 */

export class ChannelClosedError extends Error {
  constructor() {
    super('Channel is closed');
    this.name = 'ChannelClosedError';
  }
}

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class AsyncChannel<T> {
  private readonly buffer: T[] = [];
  private readonly receivers: Array<(value: T | undefined) => void> = [];
  private readonly senders: Array<PendingSend<T>> = [];
  private isClosed = false;

  /**
   * @param capacity - buffered values before `send` suspends; `Infinity`
   *   makes the channel unbounded, 0 makes every send a rendezvous
   */
  constructor(private readonly capacity = Infinity) {
    if (!(capacity >= 0)) {
      throw new RangeError(`Channel capacity must be >= 0, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  send(value: T): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new ChannelClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  /**
   * Non-suspending send; false when the channel is full or closed
   */
  trySend(value: T): boolean {
    if (this.isClosed) {
      return false;
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return true;
    }
    return false;
  }

  receive(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push(sender.value);
        sender.resolve();
      }
      return Promise.resolve(value);
    }

    // Rendezvous channel: hand over directly from a waiting sender
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve(sender.value);
    }

    if (this.isClosed) {
      return Promise.resolve(undefined);
    }

    return new Promise(resolve => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }
}
