// src/utils/time.ts
// Timing helpers: delays, promise deadlines and human-friendly durations.

/**
 * Creates a delay for the specified number of milliseconds before resolving.
 *
 * @example
 * await sleep(100); // Waits for 100 ms
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * Raised by {@link withTimeout} when the wrapped promise did not settle in time.
 */
export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly ms: number,
  ) {
    super(`timeout: ${label} after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Wraps a promise with a timeout that rejects with a labeled {@link TimeoutError} if exceeded.
 * @param p The promise to await.
 * @param ms Timeout in milliseconds.
 * @param label Human-readable label for diagnostics (included in the error message).
 */
export function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let t: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    t = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  return Promise.race([p, timeout]).finally(() => clearTimeout(t));
}

/**
 * Formats a duration given in seconds into a human-friendly string, e.g., "1d 2h 3m 4s".
 * Returns "—" for negative or invalid input.
 */
export function formatDuration(totalSeconds: number): string {
  if (!isFinite(totalSeconds) || totalSeconds < 0) return '—';
  const s = Math.floor(totalSeconds);
  const days = Math.floor(s / 86400);
  const hours = Math.floor((s % 86400) / 3600);
  const mins = Math.floor((s % 3600) / 60);
  const secs = s % 60;
  const parts: string[] = [];
  if (days) parts.push(`${days}d`);
  if (hours || parts.length) parts.push(`${hours}h`);
  if (mins || parts.length) parts.push(`${mins}m`);
  parts.push(`${secs}s`);
  return parts.join(' ');
}
