// src/db/checkpoint.ts
import { getLogger } from '../utils/logger.ts';
import type { ModeConfig } from '../types.ts';
import type { ProgressStore } from './progress.ts';

const log = getLogger('db/checkpoint');

/**
 * Records the highest durable version of a dispatcher tick.
 */
export interface CheckpointSaver {
  save(version: number, lastTransactionTimestamp: Date | null): Promise<void>;
}

/** Name of the `backfill_processor_status` row of a backfill job. */
export function backfillAlias(processorName: string, backfillId: string): string {
  return `${processorName}_${backfillId}`;
}

/**
 * Saver writing `processor_status` under the processor name.
 */
export function defaultCheckpointSaver(store: ProgressStore, processorName: string): CheckpointSaver {
  return {
    save: (version, ts) => store.writeLastProcessedVersion(processorName, version, ts),
  };
}

/**
 * Saver advancing a backfill row; the row turns `complete` once the backfill end version is durable.
 */
export function backfillCheckpointSaver(
  store: ProgressStore,
  processorName: string,
  job: { backfillId: string; initialStartingVersion: number; endingVersion: number },
): CheckpointSaver {
  const alias = backfillAlias(processorName, job.backfillId);
  return {
    async save(version, ts) {
      const status = version >= job.endingVersion ? 'complete' : 'in_progress';
      await store.upsertBackfillStatus({
        backfillAlias: alias,
        status,
        backfillStartVersion: job.initialStartingVersion,
        backfillEndVersion: job.endingVersion,
        lastSuccessVersion: version,
        lastTransactionTimestamp: ts,
      });
      if (status === 'complete') log.info(`[checkpoint] backfill ${alias} complete at version ${version}`);
    },
  };
}

/** Testing mode keeps no progress. */
export function testingCheckpointSaver(): CheckpointSaver {
  return {
    async save(version) {
      log.debug(`[checkpoint] testing mode, not recording version ${version}`);
    },
  };
}

export function createCheckpointSaver(store: ProgressStore, processorName: string, mode: ModeConfig): CheckpointSaver {
  switch (mode.kind) {
    case 'default':
      return defaultCheckpointSaver(store, processorName);
    case 'backfill':
      return backfillCheckpointSaver(store, processorName, mode);
    case 'testing':
      return testingCheckpointSaver();
  }
}
