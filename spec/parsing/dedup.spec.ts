import { describe, expect, it } from 'vitest';
import { keepLatest, sortedByKey, type RowOrder } from '../../src/parsing/dedup.ts';

type Row = { key: string; version: number; index: number; value: string };

const row = (key: string, version: number, index: number, value: string): Row => ({ key, version, index, value });
const orderOf = (r: Row): RowOrder => [r.version, r.index];

describe('keepLatest', () => {
  it('keeps the row with the highest version, then index', () => {
    const out = keepLatest(
      [row('b', 10, 3, 'b-10-3'), row('a', 12, 0, 'a-12'), row('b', 11, 0, 'b-11'), row('a', 12, 4, 'a-12-4'), row('b', 10, 5, 'b-10-5')],
      (r) => r.key,
      orderOf,
    );
    expect(out.map((r) => r.value)).toEqual(['a-12-4', 'b-11']);
  });

  it('lets a later row win a tie', () => {
    const out = keepLatest([row('a', 1, 1, 'first'), row('a', 1, 1, 'second')], (r) => r.key, orderOf);
    expect(out.map((r) => r.value)).toEqual(['second']);
  });
});

describe('sortedByKey', () => {
  it('returns values in key order', () => {
    expect(sortedByKey(new Map([['c', 3], ['a', 1], ['b', 2]]))).toEqual([1, 2, 3]);
  });
});
