// src/processor/events/flush.ts
import type { SqlClient } from '../../db/pg.ts';
import { execBatchedInsert } from '../../db/batch.ts';
import type { EventRow } from './rows.ts';

export const EVENT_COLUMNS = [
  'sequence_number',
  'creation_number',
  'account_address',
  'transaction_version',
  'transaction_block_height',
  'type',
  'data',
  'event_index',
  'indexed_type',
] as const;

/**
 * Inserts event rows into `events`; rows already present under `(transaction_version, event_index)` are kept.
 */
export async function flushEvents(client: SqlClient, rows: EventRow[]): Promise<void> {
  if (!rows.length) return;
  await client.query(`SET LOCAL statement_timeout = '30s'`);
  await execBatchedInsert(
    client,
    'events',
    EVENT_COLUMNS,
    rows,
    'ON CONFLICT (transaction_version, event_index) DO NOTHING',
    { data: 'jsonb' },
    { maxRows: 10_000, maxParams: 30_000 },
  );
}
