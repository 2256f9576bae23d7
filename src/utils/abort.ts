// src/utils/abort.ts
import { FatalError, type FatalFields } from '../errors.ts';
import { getLogger } from './logger.ts';

const log = getLogger('abort');

/**
 * Logs one structured `[fatal]` line naming the violated invariant and exits
 * with status 1. External orchestration restarts the process, which resumes
 * from the last durable checkpoint.
 *
 * @param reason Short invariant name, e.g. `version_gap`.
 * @param fields Offending values (versions, chain ids, …).
 */
export function abortWith(reason: string, fields: FatalFields = {}): never {
  log.error(`[fatal] ${reason}`, { reason, ...fields });
  process.exit(1);
}

/**
 * Turns any error escaping the pipeline into an {@link abortWith} call.
 * Invariant violations keep their kind and fields; anything else is reported as `unexpected_error`.
 */
export function abortOnError(e: unknown): never {
  if (e instanceof FatalError) {
    abortWith(e.kind, { message: e.message, ...e.fields });
  }
  const msg = e instanceof Error ? e.stack || e.message : String(e);
  abortWith('unexpected_error', { message: msg });
}
