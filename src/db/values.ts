// src/db/values.ts
// Conversions of driver values (bigint columns arrive as strings).

/**
 * Reads a non-negative integer column (bigint comes back as a string).
 * @throws when the value is not a safe non-negative integer.
 */
export function toVersion(v: unknown, column: string): number {
  const n = typeof v === 'number' ? v : typeof v === 'string' || typeof v === 'bigint' ? Number(v) : NaN;
  if (!Number.isSafeInteger(n) || n < 0) throw new Error(`column ${column}: expected a version, got ${String(v)}`);
  return n;
}

/**
 * Like {@link toVersion}, but also accepts -1: a checkpoint that precedes version 0.
 */
export function toCheckpointVersion(v: unknown, column: string): number {
  if (v === -1 || v === '-1') return -1;
  return toVersion(v, column);
}

export function toDateOrNull(v: unknown): Date | null {
  if (v instanceof Date) return v;
  if (typeof v === 'string' || typeof v === 'number') {
    const d = new Date(v);
    return Number.isNaN(d.getTime()) ? null : d;
  }
  return null;
}
