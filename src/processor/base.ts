/**
 * Shared skeleton of the PostgreSQL-backed processors: extract rows from a
 * batch, then write them in one transaction, retrying once with oversized text
 * truncated before failing the batch.
 */
// src/processor/base.ts
import type { Logger } from 'winston';
import { withTransaction, type SqlClient, type SqlPool } from '../db/pg.ts';
import { errorMessage } from '../errors.ts';
import type { MetricsSink } from '../metrics/types.ts';
import { decodeErrorReporter } from '../parsing/decodeErrors.ts';
import type { DecodeErrorSink } from '../parsing/objects.ts';
import type { TransactionBatch } from '../stream/types.ts';
import { getLogger } from '../utils/logger.ts';
import type { ProcessingResult, Processor } from './types.ts';

export abstract class PgProcessor<Rows> implements Processor {
  protected readonly log: Logger;
  protected readonly onDecodeError: DecodeErrorSink;

  protected constructor(
    private readonly processorName: string,
    protected readonly pool: SqlPool,
    metrics: MetricsSink,
  ) {
    this.log = getLogger(`processor/${processorName}`);
    this.onDecodeError = decodeErrorReporter(metrics, processorName);
  }

  name(): string {
    return this.processorName;
  }

  connectionPool(): SqlPool {
    return this.pool;
  }

  /** Turns a batch into the rows to persist. May read from the pool. */
  protected abstract extract(batch: TransactionBatch, chainId: number): Promise<Rows>;

  /** Writes all rows using `client`, which is inside a transaction. */
  protected abstract persist(client: SqlClient, rows: Rows): Promise<void>;

  /** Same rows with text cut to its column limits and characters Postgres rejects removed. */
  protected abstract sanitize(rows: Rows): Rows;

  async process(batch: TransactionBatch, chainId: number): Promise<ProcessingResult> {
    const started = performance.now();
    const rows = await this.extract(batch, chainId);

    const dbStarted = performance.now();
    try {
      await withTransaction(this.pool, (client) => this.persist(client, rows));
    } catch (e) {
      this.log.warn(
        `[${this.processorName}] insert of [${batch.startVersion}, ${batch.endVersion}] failed, retrying with truncated text: ${errorMessage(e)}`,
      );
      const cleaned = this.sanitize(rows);
      await withTransaction(this.pool, (client) => this.persist(client, cleaned));
    }
    const finished = performance.now();

    return {
      startVersion: batch.startVersion,
      endVersion: batch.endVersion,
      lastTransactionTimestamp: batch.endTimestamp,
      processingDurationMs: dbStarted - started,
      dbInsertionDurationMs: finished - dbStarted,
    };
  }
}
