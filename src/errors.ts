// src/errors.ts
/**
 * Error types shared across the stream, dispatcher and processors.
 *
 * `FatalError` marks an invariant violation after which the process must stop:
 * the entry point hands it to `abortWith`. Everything else is recoverable by
 * the caller (reconnect, skip a datum, retry a batch).
 */

/**
 * Invariants and budgets whose violation terminates the process.
 */
export type FatalKind =
  | 'version_gap'
  | 'empty_frame'
  | 'missing_chain_id'
  | 'chain_id_mismatch'
  | 'reconnect_budget_exceeded'
  | 'channel_closed'
  | 'channel_disconnected'
  | 'watchdog_timeout'
  | 'processor_failed';

/** Structured context attached to a fatal event. */
export type FatalFields = Record<string, string | number | boolean | null>;

export class FatalError extends Error {
  constructor(
    readonly kind: FatalKind,
    message: string,
    readonly fields: FatalFields = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FatalError';
  }
}

/**
 * A datum (event, resource, table item) whose payload could not be decoded.
 * Processors log it, count it and skip the datum.
 */
export class DecodeError extends Error {
  constructor(
    readonly typeStr: string,
    readonly version: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`version ${version}: failed to parse ${typeStr}: ${message}`, options);
    this.name = 'DecodeError';
  }
}

/**
 * Renders any thrown value as a single-line message.
 */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
