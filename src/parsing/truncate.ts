// src/parsing/truncate.ts

/** Column limits of the text columns written by the processors. */
export const MAX_LENGTHS = {
  indexedType: 300,
  tokenName: 128,
  tokenUri: 512,
  collectionName: 128,
  entryFunctionId: 1000,
} as const;

/**
 * Truncates `s` to at most `max` UTF-16 code units without splitting a surrogate pair.
 */
export function truncateStr(s: string, max: number): string {
  if (s.length <= max) return s;
  let end = max;
  const code = s.charCodeAt(end - 1);
  if (code >= 0xd800 && code <= 0xdbff) end--;
  return s.slice(0, end);
}

/**
 * Applies {@link truncateStr} to the given string columns of every row.
 * Columns holding something other than a string are left as they are.
 */
export function truncateColumns<T extends Record<string, unknown>>(
  rows: readonly T[],
  limits: Readonly<Record<string, number>>,
): T[] {
  return rows.map((r) => {
    const out: T = { ...r };
    for (const [col, max] of Object.entries(limits)) {
      const v = out[col];
      if (typeof v === 'string' && v.length > max) Object.assign(out, { [col]: truncateStr(v, max) });
    }
    return out;
  });
}

/**
 * JSON value with every `\u0000` removed from its strings; `jsonb` rejects that character.
 */
export function stripNulChars(value: unknown): unknown {
  const text = JSON.stringify(value);
  if (text === undefined || !text.includes('\\u0000')) return value;
  const parsed: unknown = JSON.parse(text.replaceAll('\\u0000', ''));
  return parsed;
}

/** `s` without `\u0000`, which Postgres text columns reject. */
export function stripNulText(s: string): string {
  return s.replaceAll('\u0000', '');
}
