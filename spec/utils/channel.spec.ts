import { describe, expect, it } from 'vitest';
import { BoundedChannel, ChannelClosedError } from '../../src/utils/channel.ts';

describe('BoundedChannel', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new BoundedChannel<number>(0)).toThrow('channel capacity must be a positive integer, got 0');
  });

  it('delivers items in order', async () => {
    const ch = new BoundedChannel<number>(4);
    await ch.send(1);
    await ch.send(2);
    expect(ch.size).toBe(2);
    expect(await ch.recv()).toBe(1);
    expect(await ch.recv()).toBe(2);
  });

  it('hands an item straight to a waiting receiver', async () => {
    const ch = new BoundedChannel<string>(1);
    const pending = ch.recv();
    await ch.send('a');
    expect(await pending).toBe('a');
    expect(ch.size).toBe(0);
  });

  it('blocks senders while full and admits them as items are taken', async () => {
    const ch = new BoundedChannel<number>(1);
    await ch.send(1);
    let admitted = false;
    const blocked = ch.send(2).then(() => {
      admitted = true;
    });
    await Promise.resolve();
    expect(admitted).toBe(false);

    expect(ch.tryRecv()).toEqual({ kind: 'item', value: 1 });
    await blocked;
    expect(admitted).toBe(true);
    expect(ch.tryRecv()).toEqual({ kind: 'item', value: 2 });
    expect(ch.tryRecv()).toEqual({ kind: 'empty' });
  });

  it('drains buffered items after close, then reports closure', async () => {
    const ch = new BoundedChannel<number>(2);
    await ch.send(7);
    ch.close();
    expect(ch.isClosed).toBe(true);
    expect(await ch.recv()).toBe(7);
    expect(await ch.recv()).toBeUndefined();
    expect(ch.tryRecv()).toEqual({ kind: 'closed' });
  });

  it('wakes blocked receivers and rejects senders on close', async () => {
    const ch = new BoundedChannel<number>(1);
    const waiting = ch.recv();
    ch.close();
    expect(await waiting).toBeUndefined();
    await expect(ch.send(1)).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it('rejects a sender blocked on a full channel when it closes', async () => {
    const ch = new BoundedChannel<number>(1);
    await ch.send(1);
    const blocked = ch.send(2);
    ch.close();
    await expect(blocked).rejects.toThrow('channel closed');
  });
});
