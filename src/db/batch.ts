// src/db/batch.ts
import { getLogger } from '../utils/logger.ts';
import type { SqlClient, SqlRow } from './pg.ts';

const log = getLogger('db/batch');

/**
 * Builds a multi-row INSERT SQL statement with positional parameters.
 *
 * @param table - The name of the target table to insert into.
 * @param columns - Column names for the insert; each row contributes one value per column.
 * @param rows - Row objects mapping column names to values (missing → NULL).
 * @param conflictClause - SQL clause to handle conflicts (e.g., "ON CONFLICT ...").
 * @param types - Optional record mapping column names to PostgreSQL types (e.g., { col: 'jsonb' }).
 * @returns The parameterized statement and its values, in placeholder order.
 */
export function makeMultiInsert(
  table: string,
  columns: readonly string[],
  rows: readonly SqlRow[],
  conflictClause: string,
  types?: Record<string, string>,
): { text: string; values: unknown[] } {
  const values: unknown[] = [];
  const chunks: string[] = [];
  let p = 1;

  for (const r of rows) {
    const tuple: string[] = [];
    for (const c of columns) {
      values.push(r[c] ?? null);
      const cast = types?.[c] ? `::${types[c]}` : '';
      tuple.push(`$${p++}${cast}`);
    }
    chunks.push(`(${tuple.join(',')})`);
  }

  const text = `INSERT INTO ${table} (${columns.join(',')}) VALUES ${chunks.join(',')} ${conflictClause}`;
  return { text, values };
}

function jsonReplacer(_k: string, val: unknown): unknown {
  if (typeof val === 'bigint') return val.toString();
  if (val instanceof Uint8Array) return Buffer.from(val).toString('base64');
  return val;
}

/**
 * Executes a multi-row INSERT in batches, honoring maximum row and parameter limits,
 * and serializing JSONB values. Postgres caps a statement at 65535 parameters.
 *
 * @param client - Client (usually inside a transaction) used to execute queries.
 * @param table - The name of the target table to insert into.
 * @param columns - Column names for the insert.
 * @param rows - Row objects mapping column names to values.
 * @param conflictClause - SQL clause to handle conflicts (e.g., "ON CONFLICT ...").
 * @param types - Optional record mapping column names to PostgreSQL types (e.g., { col: 'jsonb' }).
 * @param opts - maxRows (default 5000) and maxParams (default 30000) per statement.
 * @returns Number of statements executed.
 */
export async function execBatchedInsert(
  client: SqlClient,
  table: string,
  columns: readonly string[],
  rows: readonly SqlRow[],
  conflictClause: string,
  types?: Record<string, string>,
  opts?: { maxRows?: number; maxParams?: number },
): Promise<number> {
  const maxRows = opts?.maxRows ?? 5_000;
  const maxParams = opts?.maxParams ?? 30_000;

  if (!rows.length) return 0;

  const jsonCols = Object.entries(types ?? {})
    .filter(([, t]) => t === 'jsonb')
    .map(([col]) => col);
  const prepped = !jsonCols.length
    ? rows
    : rows.map((r) => {
        const x: SqlRow = { ...r };
        for (const col of jsonCols) {
          const v = x[col];
          if (v === null || v === undefined) x[col] = null;
          else if (typeof v !== 'string') x[col] = JSON.stringify(v, jsonReplacer);
        }
        return x;
      });

  let statements = 0;
  for (let i = 0; i < prepped.length; ) {
    let count = 0;
    let params = 0;
    while (i + count < prepped.length) {
      const nextParams = params + columns.length;
      if (count >= maxRows || nextParams > maxParams) break;
      params = nextParams;
      count++;
    }
    const slice = prepped.slice(i, i + count);

    const { text, values } = makeMultiInsert(table, columns, slice, conflictClause, types);

    if (values.length !== columns.length * slice.length) {
      throw new Error(
        `values/placeholder mismatch for ${table}: got ${values.length} vs ${columns.length * slice.length}`,
      );
    }

    log.debug('exec batch', { table, slice: slice.length, params });
    await client.query(text, values);
    statements++;
    i += count;
  }
  return statements;
}

/**
 * `ON CONFLICT (pk) DO UPDATE SET col = EXCLUDED.col, … WHERE table.last_transaction_version <= EXCLUDED.last_transaction_version`:
 * the upsert of a current-state table where the newest transaction version wins.
 */
export function latestWinsClause(table: string, pk: readonly string[], updateCols: readonly string[]): string {
  const sets = updateCols.map((c) => `${c} = EXCLUDED.${c}`).join(', ');
  return `ON CONFLICT (${pk.join(', ')}) DO UPDATE SET ${sets} WHERE ${table}.last_transaction_version <= EXCLUDED.last_transaction_version`;
}
