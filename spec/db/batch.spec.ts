import { describe, expect, it } from 'vitest';
import { execBatchedInsert, latestWinsClause, makeMultiInsert } from '../../src/db/batch.ts';
import type { SqlClient, SqlResult } from '../../src/db/pg.ts';

class CapturingClient implements SqlClient {
  readonly calls: Array<{ text: string; values: unknown[] }> = [];

  async query(text: string, values: unknown[] = []): Promise<SqlResult> {
    this.calls.push({ text, values });
    return { rows: [], rowCount: 0 };
  }
}

describe('makeMultiInsert', () => {
  it('numbers placeholders row by row and applies casts', () => {
    const { text, values } = makeMultiInsert(
      'events',
      ['a', 'b'],
      [
        { a: 1, b: '{}' },
        { a: 2, b: null },
      ],
      'ON CONFLICT DO NOTHING',
      { b: 'jsonb' },
    );
    expect(text).toBe('INSERT INTO events (a,b) VALUES ($1,$2::jsonb),($3,$4::jsonb) ON CONFLICT DO NOTHING');
    expect(values).toEqual([1, '{}', 2, null]);
  });

  it('binds missing columns as NULL', () => {
    expect(makeMultiInsert('t', ['a', 'b'], [{ a: 1 }], '').values).toEqual([1, null]);
  });
});

describe('execBatchedInsert', () => {
  it('does nothing without rows', async () => {
    const client = new CapturingClient();
    await expect(execBatchedInsert(client, 't', ['a'], [], '')).resolves.toBe(0);
    expect(client.calls).toEqual([]);
  });

  it('splits by row and parameter limits', async () => {
    const client = new CapturingClient();
    const rows = Array.from({ length: 5 }, (_, i) => ({ a: i, b: i * 10 }));

    await expect(execBatchedInsert(client, 't', ['a', 'b'], rows, '', undefined, { maxRows: 2 })).resolves.toBe(3);
    expect(client.calls.map((c) => c.values.length)).toEqual([4, 4, 2]);

    const byParams = new CapturingClient();
    await expect(execBatchedInsert(byParams, 't', ['a', 'b'], rows, '', undefined, { maxParams: 6 })).resolves.toBe(2);
    expect(byParams.calls.map((c) => c.values)).toEqual([
      [0, 0, 1, 10, 2, 20],
      [3, 30, 4, 40],
    ]);
  });

  it('serializes jsonb values', async () => {
    const client = new CapturingClient();
    await execBatchedInsert(
      client,
      't',
      ['id', 'data'],
      [
        { id: 1, data: { amount: 10n, raw: new Uint8Array([1, 2]) } },
        { id: 2, data: '{"already":"text"}' },
        { id: 3, data: undefined },
      ],
      '',
      { data: 'jsonb' },
    );
    expect(client.calls[0].values).toEqual([1, '{"amount":"10","raw":"AQI="}', 2, '{"already":"text"}', 3, null]);
  });
});

describe('latestWinsClause', () => {
  it('gates the update on the last transaction version', () => {
    expect(latestWinsClause('current_token_datas_v2', ['token_data_id'], ['token_name', 'last_transaction_version'])).toBe(
      'ON CONFLICT (token_data_id) DO UPDATE SET token_name = EXCLUDED.token_name, last_transaction_version = EXCLUDED.last_transaction_version WHERE current_token_datas_v2.last_transaction_version <= EXCLUDED.last_transaction_version',
    );
  });
});
