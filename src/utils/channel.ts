// src/utils/channel.ts
/**
 * Minimal bounded single-consumer channel built on promise queues.
 * `send` waits while the buffer is full; `recv` waits while it is empty.
 * Once closed, pending and future `send`s reject and `recv` drains what is
 * left before reporting closure.
 */

/**
 * Raised by {@link BoundedChannel.send} after the channel has been closed.
 */
export class ChannelClosedError extends Error {
  constructor() {
    super('channel closed');
    this.name = 'ChannelClosedError';
  }
}

/** Outcome of a non-blocking receive. */
export type TryRecv<T> = { kind: 'item'; value: T } | { kind: 'empty' } | { kind: 'closed' };

export class BoundedChannel<T> {
  private readonly buf: T[] = [];
  private readonly receivers: Array<(v: T | undefined) => void> = [];
  private readonly senders: Array<{ item: T; resolve: () => void; reject: (e: Error) => void }> = [];
  private closed = false;

  /**
   * @param capacity Maximum number of buffered items (>= 1).
   */
  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Number of items currently buffered. */
  get size(): number {
    return this.buf.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueues `item`, waiting for free capacity.
   * @throws {ChannelClosedError} when the channel is (or becomes) closed.
   */
  send(item: T): Promise<void> {
    if (this.closed) return Promise.reject(new ChannelClosedError());
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return Promise.resolve();
    }
    if (this.buf.length < this.capacity) {
      this.buf.push(item);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.senders.push({ item, resolve, reject });
    });
  }

  /**
   * Waits for the next item. Resolves `undefined` once the channel is closed and drained.
   */
  recv(): Promise<T | undefined> {
    const polled = this.tryRecv();
    if (polled.kind === 'item') return Promise.resolve(polled.value);
    if (polled.kind === 'closed') return Promise.resolve(undefined);
    return new Promise<T | undefined>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /** Non-blocking receive. */
  tryRecv(): TryRecv<T> {
    if (this.buf.length > 0) {
      const value = this.buf.shift();
      this.admitSender();
      if (value !== undefined) return { kind: 'item', value };
    }
    return this.closed ? { kind: 'closed' } : { kind: 'empty' };
  }

  /**
   * Closes the channel. Blocked senders are rejected, blocked receivers get `undefined`.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const s of this.senders.splice(0)) s.reject(new ChannelClosedError());
    for (const r of this.receivers.splice(0)) r(undefined);
  }

  private admitSender(): void {
    const next = this.senders.shift();
    if (!next) return;
    this.buf.push(next.item);
    next.resolve();
  }
}
