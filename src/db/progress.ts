/**
 * @module progress
 * Reads and updates indexer progress in the database: the chain id of the
 * indexed network, per-processor checkpoints and backfill job status.
 *
 * Checkpoint writes are conditional on monotone advance; a write carrying a
 * lower version than the stored one is a no-op.
 */
import type { SqlClient } from './pg.ts';
import { toCheckpointVersion, toDateOrNull, toVersion } from './values.ts';

export type BackfillStatus = 'in_progress' | 'complete';

export type BackfillCheckpoint = {
  backfillAlias: string;
  status: BackfillStatus;
  backfillStartVersion: number;
  backfillEndVersion: number;
  /** `backfillStartVersion - 1` until the first tick of the job is durable. */
  lastSuccessVersion: number;
  lastTransactionTimestamp: Date | null;
};

export interface ProgressStore {
  readChainId(): Promise<number | null>;
  /** Only called while no chain id is stored; an existing row is left untouched. */
  writeChainId(chainId: number): Promise<void>;
  readLastProcessedVersion(processorName: string): Promise<number | null>;
  writeLastProcessedVersion(processorName: string, version: number, lastTransactionTimestamp: Date | null): Promise<void>;
  readBackfillStatus(backfillAlias: string): Promise<BackfillCheckpoint | null>;
  /**
   * Inserts or advances a backfill row.
   * @param force Skip the monotone guard (used when an operator resets a backfill).
   */
  upsertBackfillStatus(row: BackfillCheckpoint, force?: boolean): Promise<void>;
}

function parseStatus(v: unknown): BackfillStatus {
  if (v === 'in_progress' || v === 'complete') return v;
  throw new Error(`backfill_processor_status.status: unexpected value ${String(v)}`);
}

/**
 * Progress store backed by the `ledger_infos`, `processor_status` and
 * `backfill_processor_status` tables.
 *
 * @param db - Pool (or client) used for each statement.
 */
export function createPgProgressStore(db: SqlClient): ProgressStore {
  return {
    async readChainId() {
      const res = await db.query('SELECT chain_id FROM ledger_infos LIMIT 1');
      const row = res.rows[0];
      return row ? toVersion(row.chain_id, 'chain_id') : null;
    },

    async writeChainId(chainId) {
      await db.query('INSERT INTO ledger_infos (chain_id) VALUES ($1) ON CONFLICT DO NOTHING', [chainId]);
    },

    async readLastProcessedVersion(processorName) {
      const res = await db.query('SELECT last_success_version FROM processor_status WHERE processor = $1', [
        processorName,
      ]);
      const row = res.rows[0];
      return row ? toVersion(row.last_success_version, 'last_success_version') : null;
    },

    async writeLastProcessedVersion(processorName, version, lastTransactionTimestamp) {
      const sql = `
        INSERT INTO processor_status (processor, last_success_version, last_updated, last_transaction_timestamp)
        VALUES ($1, $2, now(), $3)
        ON CONFLICT (processor)
        DO UPDATE SET last_success_version = EXCLUDED.last_success_version,
                      last_updated = EXCLUDED.last_updated,
                      last_transaction_timestamp = EXCLUDED.last_transaction_timestamp
        WHERE processor_status.last_success_version <= EXCLUDED.last_success_version
      `;
      await db.query(sql, [processorName, version, lastTransactionTimestamp]);
    },

    async readBackfillStatus(backfillAlias) {
      const res = await db.query(
        `SELECT backfill_alias, status, backfill_start_version, backfill_end_version,
                last_success_version, last_transaction_timestamp
           FROM backfill_processor_status WHERE backfill_alias = $1`,
        [backfillAlias],
      );
      const row = res.rows[0];
      if (!row) return null;
      return {
        backfillAlias,
        status: parseStatus(row.status),
        backfillStartVersion: toVersion(row.backfill_start_version, 'backfill_start_version'),
        backfillEndVersion: toVersion(row.backfill_end_version, 'backfill_end_version'),
        lastSuccessVersion: toCheckpointVersion(row.last_success_version, 'last_success_version'),
        lastTransactionTimestamp: toDateOrNull(row.last_transaction_timestamp),
      };
    },

    async upsertBackfillStatus(row, force = false) {
      const guard = force
        ? ''
        : 'WHERE backfill_processor_status.last_success_version <= EXCLUDED.last_success_version';
      const sql = `
        INSERT INTO backfill_processor_status
          (backfill_alias, status, last_success_version, last_updated, last_transaction_timestamp,
           backfill_start_version, backfill_end_version)
        VALUES ($1, $2, $3, now(), $4, $5, $6)
        ON CONFLICT (backfill_alias)
        DO UPDATE SET status = EXCLUDED.status,
                      last_success_version = EXCLUDED.last_success_version,
                      last_updated = EXCLUDED.last_updated,
                      last_transaction_timestamp = EXCLUDED.last_transaction_timestamp,
                      backfill_start_version = EXCLUDED.backfill_start_version,
                      backfill_end_version = EXCLUDED.backfill_end_version
        ${guard}
      `;
      await db.query(sql, [
        row.backfillAlias,
        row.status,
        row.lastSuccessVersion,
        row.lastTransactionTimestamp,
        row.backfillStartVersion,
        row.backfillEndVersion,
      ]);
    },
  };
}
