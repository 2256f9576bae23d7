// src/processor/events/rows.ts
import { MAX_LENGTHS, truncateStr } from '../../parsing/truncate.ts';
import { standardizeAddress } from '../../parsing/address.ts';
import { parseJsonPayload } from '../../parsing/events.ts';
import type { DecodeErrorSink } from '../../parsing/objects.ts';
import { DecodeError } from '../../errors.ts';
import type { Transaction } from '../../stream/types.ts';

/**
 * One row of the `events` history table.
 */
export type EventRow = {
  sequence_number: string;
  creation_number: string;
  account_address: string;
  transaction_version: number;
  transaction_block_height: number;
  type: string;
  data: unknown;
  event_index: number;
  indexed_type: string;
};

/**
 * Extracts event rows of a transaction. Events whose payload is not JSON are reported and skipped.
 */
export function eventRowsOf(txn: Transaction, onDecodeError: DecodeErrorSink): EventRow[] {
  const rows: EventRow[] = [];
  txn.events.forEach((e, index) => {
    let data: unknown;
    try {
      data = parseJsonPayload(e.typeStr, e.data, txn.version);
    } catch (err) {
      if (err instanceof DecodeError) {
        onDecodeError(err);
        return;
      }
      throw err;
    }
    rows.push({
      sequence_number: e.sequenceNumber,
      creation_number: e.creationNumber,
      account_address: standardizeAddress(e.accountAddress),
      transaction_version: txn.version,
      transaction_block_height: txn.blockHeight,
      type: e.typeStr,
      data,
      event_index: index,
      indexed_type: truncateStr(e.typeStr, MAX_LENGTHS.indexedType),
    });
  });
  return rows;
}
