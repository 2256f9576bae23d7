// src/processor/tokenV2/index.ts
import type { SqlClient, SqlPool } from '../../db/pg.ts';
import type { MetricsSink } from '../../metrics/types.ts';
import { keepLatest } from '../../parsing/dedup.ts';
import { InMemoryOwnershipLookup, PersistentOwnershipLookup, type OwnershipLookup } from '../../parsing/ownership.ts';
import { MAX_LENGTHS, stripNulChars, stripNulText, truncateColumns } from '../../parsing/truncate.ts';
import type { TransactionBatch } from '../../stream/types.ts';
import { PgProcessor } from '../base.ts';
import {
  flushCurrentTokenDatas,
  flushCurrentTokenOwnerships,
  flushTokenActivities,
  flushTokenOwnerships,
} from './flush.ts';
import {
  currentOwnershipKey,
  emptyTokenV2Rows,
  extractTokenV2Rows,
  type CurrentTokenDataRow,
  type CurrentTokenOwnershipRow,
  type TokenActivityRow,
  type TokenOwnershipRow,
} from './rows.ts';

export const TOKEN_V2_PROCESSOR = 'token_v2_processor';

/** Rows of one batch, current-state rows already coalesced and in key order. */
export type TokenV2Writes = {
  activities: TokenActivityRow[];
  ownerships: TokenOwnershipRow[];
  currentOwnerships: CurrentTokenOwnershipRow[];
  currentDatas: CurrentTokenDataRow[];
};

export type TokenV2ProcessorOptions = {
  /** Fall back to `current_token_ownerships_v2` for owners of burned tokens (default true). */
  databaseOwnershipLookup?: boolean;
};

/**
 * Token v2 (object model) processor: token activities, ownership history and the
 * current ownership and token metadata tables.
 */
export class TokenV2Processor extends PgProcessor<TokenV2Writes> {
  private readonly lookupDatabase: boolean;

  constructor(pool: SqlPool, metrics: MetricsSink, opts: TokenV2ProcessorOptions = {}) {
    super(TOKEN_V2_PROCESSOR, pool, metrics);
    this.lookupDatabase = opts.databaseOwnershipLookup ?? true;
  }

  protected async extract(batch: TransactionBatch): Promise<TokenV2Writes> {
    const memory = new InMemoryOwnershipLookup();
    const tiers: OwnershipLookup[] = this.lookupDatabase ? [memory, new PersistentOwnershipLookup(this.pool)] : [memory];
    const out = emptyTokenV2Rows();
    for (const txn of batch.transactions) {
      await extractTokenV2Rows(txn, out, memory, tiers, this.onDecodeError);
    }
    this.log.debug(
      `[${TOKEN_V2_PROCESSOR}] [${batch.startVersion}, ${batch.endVersion}] activities=${out.activities.length} ownerships=${out.ownerships.length}`,
    );
    return {
      activities: out.activities,
      ownerships: out.ownerships,
      currentOwnerships: keepLatest(
        out.currentOwnerships,
        (r) => currentOwnershipKey(r.row),
        (r) => r.order,
      ).map((r) => r.row),
      currentDatas: keepLatest(
        out.currentDatas,
        (r) => r.row.token_data_id,
        (r) => r.order,
      ).map((r) => r.row),
    };
  }

  protected async persist(client: SqlClient, rows: TokenV2Writes): Promise<void> {
    await client.query(`SET LOCAL statement_timeout = '30s'`);
    await client.query(`SET LOCAL lock_timeout = '5s'`);
    await flushTokenActivities(client, rows.activities);
    await flushTokenOwnerships(client, rows.ownerships);
    await flushCurrentTokenOwnerships(client, rows.currentOwnerships);
    await flushCurrentTokenDatas(client, rows.currentDatas);
  }

  protected sanitize(rows: TokenV2Writes): TokenV2Writes {
    return {
      activities: truncateColumns(rows.activities, { entry_function_id_str: MAX_LENGTHS.entryFunctionId }).map((r) => ({
        ...r,
        before_value: r.before_value === null ? null : stripNulText(r.before_value),
        after_value: r.after_value === null ? null : stripNulText(r.after_value),
      })),
      ownerships: rows.ownerships,
      currentOwnerships: rows.currentOwnerships,
      currentDatas: truncateColumns(rows.currentDatas, {
        token_name: MAX_LENGTHS.tokenName,
        token_uri: MAX_LENGTHS.tokenUri,
      }).map((r) => ({
        ...r,
        token_name: stripNulText(r.token_name),
        token_uri: stripNulText(r.token_uri),
        description: stripNulText(r.description),
        token_properties: stripNulChars(r.token_properties),
      })),
    };
  }
}
