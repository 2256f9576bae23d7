// src/processor/events/index.ts
import type { SqlClient, SqlPool } from '../../db/pg.ts';
import type { MetricsSink } from '../../metrics/types.ts';
import { MAX_LENGTHS, stripNulChars, truncateColumns } from '../../parsing/truncate.ts';
import type { TransactionBatch } from '../../stream/types.ts';
import { PgProcessor } from '../base.ts';
import { flushEvents } from './flush.ts';
import { eventRowsOf, type EventRow } from './rows.ts';

export const EVENTS_PROCESSOR = 'events_processor';

/**
 * Writes every event of every transaction to the `events` table.
 */
export class EventsProcessor extends PgProcessor<EventRow[]> {
  constructor(pool: SqlPool, metrics: MetricsSink) {
    super(EVENTS_PROCESSOR, pool, metrics);
  }

  protected async extract(batch: TransactionBatch): Promise<EventRow[]> {
    return batch.transactions.flatMap((txn) => eventRowsOf(txn, this.onDecodeError));
  }

  protected async persist(client: SqlClient, rows: EventRow[]): Promise<void> {
    await flushEvents(client, rows);
  }

  protected sanitize(rows: EventRow[]): EventRow[] {
    return truncateColumns(rows, { indexed_type: MAX_LENGTHS.indexedType }).map((r) => ({
      ...r,
      data: stripNulChars(r.data),
    }));
  }
}
