// src/utils/pruneUndefined.ts

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v) && !(v instanceof Date);
}

function prune(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(prune).filter((x) => x !== undefined);
  if (isRecord(v)) return pruneUndefined(v);
  return v;
}

/**
 * Recursively removes all properties with `undefined` values from objects and arrays.
 * Preserves other values including nulls.
 * @param obj The object to prune.
 * @returns A new object with all `undefined` values removed.
 */
export function pruneUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    const pv = prune(v);
    if (pv !== undefined) out[k] = pv;
  }
  return out;
}
