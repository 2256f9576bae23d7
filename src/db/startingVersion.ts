/**
 * Decides at startup from which version the stream is requested.
 */
// src/db/startingVersion.ts
import { getLogger } from '../utils/logger.ts';
import type { ModeConfig } from '../types.ts';
import { backfillAlias } from './checkpoint.ts';
import type { ProgressStore } from './progress.ts';

const log = getLogger('db/startingVersion');

/** Checkpoint key of one table written by a multi-table processor. */
export function tableCheckpointName(processorName: string, table: string): string {
  return `${processorName}.${table}`;
}

/**
 * Default mode: the later of the configured bootstrap version and the version after the stored checkpoint.
 * An explicit stream starting version wins over both.
 */
export async function resolveDefaultStartingVersion(
  store: ProgressStore,
  processorName: string,
  initialStartingVersion: number,
  override?: number,
): Promise<number> {
  if (override !== undefined) {
    log.info(`[start] ${processorName}: explicit starting_version=${override}`);
    return override;
  }
  const stored = await store.readLastProcessedVersion(processorName);
  const resume = stored === null ? 0 : stored + 1;
  const start = Math.max(initialStartingVersion, resume);
  log.info(
    `[start] ${processorName}: checkpoint=${stored ?? 'none'} initial_starting_version=${initialStartingVersion} → ${start}`,
  );
  return start;
}

/**
 * Backfill mode. A finished job resumes at its end version (nothing left to do);
 * `overwriteCheckpoint` resets the job to `in_progress` with nothing done, so a restart before the
 * first checkpoint starts at the initial version again.
 */
export async function resolveBackfillStartingVersion(
  store: ProgressStore,
  processorName: string,
  job: { backfillId: string; initialStartingVersion: number; endingVersion: number; overwriteCheckpoint: boolean },
): Promise<number> {
  const alias = backfillAlias(processorName, job.backfillId);
  const row = await store.readBackfillStatus(alias);

  if (job.overwriteCheckpoint) {
    await store.upsertBackfillStatus(
      {
        backfillAlias: alias,
        status: 'in_progress',
        backfillStartVersion: job.initialStartingVersion,
        backfillEndVersion: job.endingVersion,
        lastSuccessVersion: job.initialStartingVersion - 1,
        lastTransactionTimestamp: null,
      },
      true,
    );
    log.warn(`[start] backfill ${alias}: checkpoint overwritten, restarting at ${job.initialStartingVersion}`);
    return job.initialStartingVersion;
  }
  if (!row) {
    log.info(`[start] backfill ${alias}: new job from ${job.initialStartingVersion}`);
    return job.initialStartingVersion;
  }
  if (row.status === 'complete') {
    log.info(`[start] backfill ${alias}: already complete at ${row.lastSuccessVersion}`);
    return row.backfillEndVersion;
  }
  log.info(`[start] backfill ${alias}: resuming after ${row.lastSuccessVersion}`);
  return row.lastSuccessVersion + 1;
}

/**
 * A processor writing several tables must not skip versions of the table that lags the most:
 * `max(initial, min over tables of (checkpoint + 1, or 0 without checkpoint))`.
 */
export async function resolveMultiTableStartingVersion(
  store: ProgressStore,
  processorName: string,
  tables: readonly string[],
  initialStartingVersion: number,
): Promise<number> {
  if (tables.length === 0) return initialStartingVersion;
  let lowest = Number.POSITIVE_INFINITY;
  for (const table of tables) {
    const stored = await store.readLastProcessedVersion(tableCheckpointName(processorName, table));
    lowest = Math.min(lowest, stored === null ? 0 : stored + 1);
  }
  return Math.max(initialStartingVersion, lowest);
}

/**
 * Resolves the starting version for the configured run mode.
 *
 * @param streamStartingVersion - `starting-version` of the stream section, if set.
 */
export async function resolveStartingVersion(
  store: ProgressStore,
  processorName: string,
  mode: ModeConfig,
  streamStartingVersion?: number,
): Promise<number> {
  switch (mode.kind) {
    case 'default':
      return resolveDefaultStartingVersion(store, processorName, mode.initialStartingVersion, streamStartingVersion);
    case 'backfill':
      return resolveBackfillStartingVersion(store, processorName, mode);
    case 'testing':
      return mode.overrideStartingVersion;
  }
}
