import { describe, expect, it } from 'vitest';
import { ZERO_ADDRESS, outerType, standardizeAddress } from '../../src/parsing/address.ts';
import { MAX_LENGTHS, stripNulChars, stripNulText, truncateColumns, truncateStr } from '../../src/parsing/truncate.ts';

describe('standardizeAddress', () => {
  it('pads, lowercases and prefixes', () => {
    expect(standardizeAddress('0x1')).toBe(`0x${'0'.repeat(63)}1`);
    expect(standardizeAddress('ABC')).toBe(`0x${'0'.repeat(61)}abc`);
    expect(standardizeAddress('0X00ff')).toBe(`0x${'0'.repeat(62)}ff`);
  });

  it('maps every spelling of zero to the zero address', () => {
    expect(standardizeAddress('0x0')).toBe(ZERO_ADDRESS);
    expect(standardizeAddress('')).toBe(ZERO_ADDRESS);
  });
});

describe('outerType', () => {
  it('drops type arguments', () => {
    expect(outerType('0x1::coin::CoinStore<0x1::aptos_coin::AptosCoin>')).toBe('0x1::coin::CoinStore');
    expect(outerType('0x4::token::Token')).toBe('0x4::token::Token');
  });
});

describe('truncation', () => {
  it('cuts strings to the limit without splitting a surrogate pair', () => {
    expect(truncateStr('abcdef', 4)).toBe('abcd');
    expect(truncateStr('ab\u{1F600}', 3)).toBe('ab');
    expect(truncateStr('short', 10)).toBe('short');
  });

  it('truncates only the listed string columns', () => {
    const rows = [{ indexed_type: 'x'.repeat(MAX_LENGTHS.indexedType + 5), n: 1, other: 'y'.repeat(400) }];
    const [out] = truncateColumns(rows, { indexed_type: MAX_LENGTHS.indexedType, n: 0 });
    expect(out.indexed_type).toHaveLength(300);
    expect(out.n).toBe(1);
    expect(out.other).toHaveLength(400);
    expect(rows[0].indexed_type).toHaveLength(305);
  });

  it('removes NUL characters', () => {
    expect(stripNulChars({ a: 'x\u0000y', b: ['\u0000'], c: 1 })).toEqual({ a: 'xy', b: [''], c: 1 });
    const clean = { a: 'ok' };
    expect(stripNulChars(clean)).toBe(clean);
    expect(stripNulText('a\u0000b')).toBe('ab');
  });
});
