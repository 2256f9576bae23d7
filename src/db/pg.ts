/**
 * Utilities for creating and managing a PostgreSQL connection pool.
 * Provides functions to create, retrieve and close the pool, plus the narrow
 * query interfaces the rest of the code depends on.
 */
// src/db/pg.ts
import { Pool } from 'pg';
import type { PgSettings } from '../types.ts';

/** Row as returned by the driver; values are validated where they are read. */
export type SqlRow = Record<string, unknown>;

export type SqlResult = {
  rows: SqlRow[];
  rowCount: number | null;
};

/**
 * Anything that runs a parameterized statement: a pool or a checked-out client.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

/** A client checked out of a pool; must be released. */
export interface SqlPoolClient extends SqlClient {
  release(err?: Error | boolean): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
}

/**
 * Holds configuration options for PostgreSQL connection pool.
 */
export type PgConfig = Partial<PgSettings> & {
  /** Application name for Postgres connections */
  applicationName?: string;
};

let pool: Pool | null = null;

/**
 * Create (if not already created) and return a shared PostgreSQL connection pool.
 * @param cfg Configuration options for the connection pool.
 * @returns A singleton instance of the PostgreSQL connection pool.
 */
export function createPgPool(cfg: PgConfig): Pool {
  if (pool) return pool;
  pool = new Pool({
    connectionString: cfg.connectionString,
    host: cfg.host,
    port: cfg.port,
    user: cfg.user,
    password: cfg.password,
    database: cfg.database,
    ssl: cfg.ssl ? { rejectUnauthorized: false } : undefined,
    application_name: cfg.applicationName ?? 'txn-stream-indexer',
    max: cfg.poolSize ?? 16,
    idleTimeoutMillis: 30_000,
  });
  return pool;
}

/**
 * Close the PostgreSQL connection pool and release all resources.
 */
export async function closePgPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client, rolling back on error.
 */
export async function withTransaction<T>(db: SqlPool, fn: (client: SqlClient) => Promise<T>): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const out = await fn(client);
    await client.query('COMMIT');
    return out;
  } catch (e) {
    await client.query('ROLLBACK');
    throw e;
  } finally {
    client.release();
  }
}
