// src/processor/types.ts
import type { SqlPool } from '../db/pg.ts';
import type { TransactionBatch } from '../stream/types.ts';

/**
 * Outcome of one successful {@link Processor.process} call. All rows derived from
 * `[startVersion, endVersion]` are durable once it is returned.
 */
export type ProcessingResult = {
  startVersion: number;
  endVersion: number;
  lastTransactionTimestamp: Date | null;
  processingDurationMs: number;
  dbInsertionDurationMs: number;
};

/**
 * A pluggable transformation of transaction batches into rows.
 *
 * Batches of one processor are handed out in version order but processed concurrently,
 * so every write must be an upsert on a deterministic key, and current-state tables
 * must be gated on `last_transaction_version`.
 */
export interface Processor {
  /** Stable name, used as checkpoint key and log label. */
  name(): string;
  /**
   * Persists everything derived from `batch`, or rejects; partial success is not allowed.
   * @param chainId Chain id recorded in `ledger_infos`.
   */
  process(batch: TransactionBatch, chainId: number): Promise<ProcessingResult>;
  connectionPool(): SqlPool;
}
