// src/parsing/dedup.ts

/** Position of a row within the stream: transaction version, then write-set change (or event) index. */
export type RowOrder = readonly [version: number, index: number];

function isNewer(a: RowOrder, b: RowOrder): boolean {
  return a[0] !== b[0] ? a[0] > b[0] : a[1] >= b[1];
}

/**
 * Coalesces rows sharing a key, keeping the one with the highest `(version, index)`.
 * The result is ordered by key.
 */
export function keepLatest<T>(rows: Iterable<T>, keyOf: (row: T) => string, orderOf: (row: T) => RowOrder): T[] {
  const latest = new Map<string, { row: T; order: RowOrder }>();
  for (const row of rows) {
    const key = keyOf(row);
    const order = orderOf(row);
    const prev = latest.get(key);
    if (!prev || isNewer(order, prev.order)) latest.set(key, { row, order });
  }
  return sortedByKey(new Map([...latest].map(([k, v]) => [k, v.row])));
}

/**
 * Values of `map` in key order. Concurrent transactions upserting the same current-state keys
 * then take row locks in the same order.
 */
export function sortedByKey<T>(map: ReadonlyMap<string, T>): T[] {
  return [...map.keys()].sort().map((k) => {
    const v = map.get(k);
    if (v === undefined) throw new Error(`key ${k} vanished while sorting`);
    return v;
  });
}
