import { describe, expect, it } from 'vitest';
import { InMemoryMetrics } from '../../src/metrics/memory.ts';
import { EventsProcessor } from '../../src/processor/events/index.ts';
import type { TransactionEvent } from '../../src/stream/types.ts';
import { addr, batch, event, timestampOf, txn } from '../support/builders.ts';
import { FakePg } from '../support/fakePg.ts';

const notJson: TransactionEvent = {
  accountAddress: '0x1',
  creationNumber: '2',
  sequenceNumber: '3',
  typeStr: '0x1::legacy::Broken<u8>',
  data: '{oops',
};

function setup() {
  const db = new FakePg();
  const metrics = new InMemoryMetrics();
  return { db, metrics, processor: new EventsProcessor(db, metrics) };
}

describe('EventsProcessor', () => {
  it('writes one row per event', async () => {
    const { db, processor } = setup();
    const special = [
      txn(101, {
        events: [
          { ...event('0x1::coin::DepositEvent', { amount: '5' }, '0xA'), creationNumber: '2', sequenceNumber: '7' },
          event('0x1::block::NewBlockEvent', { round: '9' }),
        ],
      }),
    ];

    const result = await processor.process(batch(100, 102, 1, special), 1);

    expect(result).toMatchObject({ startVersion: 100, endVersion: 102, lastTransactionTimestamp: timestampOf(102) });
    expect(db.rows('events')).toHaveLength(2);
    expect(db.row('events', [101, 0])).toEqual({
      sequence_number: '7',
      creation_number: '2',
      account_address: addr('a'),
      transaction_version: 101,
      transaction_block_height: 10,
      type: '0x1::coin::DepositEvent',
      data: { amount: '5' },
      event_index: 0,
      indexed_type: '0x1::coin::DepositEvent',
    });
    expect(db.row('events', [101, 1])).toMatchObject({ type: '0x1::block::NewBlockEvent', data: { round: '9' } });
    expect(db.commits).toBe(1);
  });

  it('skips events whose payload is not JSON and counts them', async () => {
    const { db, metrics, processor } = setup();
    const special = [txn(5, { events: [notJson, event('0x1::coin::DepositEvent', { amount: '1' })] })];

    await processor.process(batch(5, 5, 1, special), 1);

    expect(db.rows('events').map((r) => r.event_index)).toEqual([1]);
    expect(metrics.counter('decode_errors_count', { processor: 'events_processor', kind: '0x1::legacy::Broken' })).toBe(1);
  });

  it('keeps rows that are already stored', async () => {
    const { db, processor } = setup();
    const special = [txn(7, { events: [event('0x1::coin::DepositEvent', { amount: '1' })] })];
    db.seed('events', { transaction_version: 7, event_index: 0, type: 'seeded' });

    await processor.process(batch(7, 7, 1, special), 1);

    expect(db.row('events', [7, 0])).toEqual({ transaction_version: 7, event_index: 0, type: 'seeded' });
  });

  it('retries a failed insert once with cleaned rows', async () => {
    const { db, processor } = setup();
    db.failOn(/^INSERT INTO events /, new Error('unsupported Unicode escape sequence'));
    const special = [txn(8, { events: [event('0x1::note::Memo', { text: 'a\u0000b' })] })];

    await processor.process(batch(8, 8, 1, special), 1);

    expect(db.rollbacks).toBe(1);
    expect(db.commits).toBe(1);
    expect(db.released).toBe(2);
    expect(db.row('events', [8, 0])).toMatchObject({ data: { text: 'ab' } });
  });

  it('fails the batch when the retry fails too', async () => {
    const { db, processor } = setup();
    db.failOn(/^INSERT INTO events /, new Error('connection terminated'), 2);
    const special = [txn(8, { events: [event('0x1::note::Memo', { text: 'x' })] })];

    await expect(processor.process(batch(8, 8, 1, special), 1)).rejects.toThrow('connection terminated');
    expect(db.rows('events')).toEqual([]);
    expect(db.rollbacks).toBe(2);
  });

  it('writes nothing for batches without events', async () => {
    const { db, processor } = setup();
    await processor.process(batch(0, 9), 1);
    expect(db.statements).toEqual(['BEGIN', 'COMMIT']);
  });
});
