import { describe, expect, it } from 'vitest';
import { createPgProgressStore } from '../../src/db/progress.ts';
import {
  resolveBackfillStartingVersion,
  resolveDefaultStartingVersion,
  resolveMultiTableStartingVersion,
  resolveStartingVersion,
  tableCheckpointName,
} from '../../src/db/startingVersion.ts';
import { FakePg } from '../support/fakePg.ts';
import { MemoryProgressStore } from '../support/progress.ts';

const job = { backfillId: 'b1', initialStartingVersion: 0, endingVersion: 100, overwriteCheckpoint: false };

function storeWithBackfill(status: 'in_progress' | 'complete', lastSuccessVersion: number): MemoryProgressStore {
  const store = new MemoryProgressStore();
  store.backfills.set('events_processor_b1', {
    backfillAlias: 'events_processor_b1',
    status,
    backfillStartVersion: 0,
    backfillEndVersion: 100,
    lastSuccessVersion,
    lastTransactionTimestamp: null,
  });
  return store;
}

describe('default starting version', () => {
  it('starts at the initial version on a fresh database', async () => {
    expect(await resolveDefaultStartingVersion(new MemoryProgressStore(), 'events_processor', 0)).toBe(0);
    expect(await resolveDefaultStartingVersion(new MemoryProgressStore(), 'events_processor', 500)).toBe(500);
  });

  it('resumes after the checkpoint unless the initial version is later', async () => {
    const store = new MemoryProgressStore();
    await store.writeLastProcessedVersion('events_processor', 199, null);
    expect(await resolveDefaultStartingVersion(store, 'events_processor', 0)).toBe(200);
    expect(await resolveDefaultStartingVersion(store, 'events_processor', 1_000)).toBe(1_000);
  });

  it('lets an explicit starting version win', async () => {
    const store = new MemoryProgressStore();
    await store.writeLastProcessedVersion('events_processor', 199, null);
    expect(await resolveDefaultStartingVersion(store, 'events_processor', 0, 50)).toBe(50);
  });
});

describe('backfill starting version', () => {
  it('starts a new job at the initial version', async () => {
    expect(await resolveBackfillStartingVersion(new MemoryProgressStore(), 'events_processor', job)).toBe(0);
  });

  it('resumes an unfinished job after its last success', async () => {
    expect(await resolveBackfillStartingVersion(storeWithBackfill('in_progress', 42), 'events_processor', job)).toBe(43);
  });

  it('stays at the end of a complete job', async () => {
    expect(await resolveBackfillStartingVersion(storeWithBackfill('complete', 100), 'events_processor', job)).toBe(100);
  });

  it('resets the job when asked to overwrite the checkpoint', async () => {
    const store = storeWithBackfill('complete', 100);
    const start = await resolveBackfillStartingVersion(store, 'events_processor', {
      ...job,
      initialStartingVersion: 10,
      overwriteCheckpoint: true,
    });
    expect(start).toBe(10);
    expect(store.backfills.get('events_processor_b1')).toEqual({
      backfillAlias: 'events_processor_b1',
      status: 'in_progress',
      backfillStartVersion: 10,
      backfillEndVersion: 100,
      lastSuccessVersion: 9,
      lastTransactionTimestamp: null,
    });
  });

  it('restarts at the initial version when stopped right after an overwrite', async () => {
    const store = storeWithBackfill('in_progress', 60);
    const overwrite = { ...job, initialStartingVersion: 10, overwriteCheckpoint: true };
    expect(await resolveBackfillStartingVersion(store, 'events_processor', overwrite)).toBe(10);
    expect(await resolveBackfillStartingVersion(store, 'events_processor', { ...overwrite, overwriteCheckpoint: false })).toBe(10);
  });

  it('restarts at version 0 through the pg store after an overwrite', async () => {
    const store = createPgProgressStore(new FakePg());
    const overwrite = { ...job, overwriteCheckpoint: true };
    expect(await resolveBackfillStartingVersion(store, 'events_processor', overwrite)).toBe(0);
    expect(await store.readBackfillStatus('events_processor_b1')).toMatchObject({ lastSuccessVersion: -1 });
    expect(await resolveBackfillStartingVersion(store, 'events_processor', job)).toBe(0);
  });
});

describe('multi-table starting version', () => {
  it('follows the table that lags the most', async () => {
    const store = new MemoryProgressStore();
    await store.writeLastProcessedVersion(tableCheckpointName('token_v2_processor', 'token_activities_v2'), 300, null);
    await store.writeLastProcessedVersion(tableCheckpointName('token_v2_processor', 'current_token_datas_v2'), 120, null);
    const tables = ['token_activities_v2', 'current_token_datas_v2'];

    expect(await resolveMultiTableStartingVersion(store, 'token_v2_processor', tables, 0)).toBe(121);
    expect(await resolveMultiTableStartingVersion(store, 'token_v2_processor', tables, 500)).toBe(500);
  });

  it('starts from zero when one table has no checkpoint', async () => {
    const store = new MemoryProgressStore();
    await store.writeLastProcessedVersion('token_v2_processor.token_activities_v2', 300, null);
    expect(
      await resolveMultiTableStartingVersion(store, 'token_v2_processor', ['token_activities_v2', 'token_ownerships_v2'], 0),
    ).toBe(0);
  });

  it('falls back to the initial version without tables', async () => {
    expect(await resolveMultiTableStartingVersion(new MemoryProgressStore(), 'p', [], 7)).toBe(7);
  });
});

describe('resolveStartingVersion', () => {
  it('dispatches on the run mode', async () => {
    const store = storeWithBackfill('in_progress', 42);
    await store.writeLastProcessedVersion('events_processor', 9, null);

    expect(await resolveStartingVersion(store, 'events_processor', { kind: 'default', initialStartingVersion: 0 })).toBe(10);
    expect(await resolveStartingVersion(store, 'events_processor', { kind: 'backfill', ...job })).toBe(43);
    expect(
      await resolveStartingVersion(store, 'events_processor', { kind: 'testing', overrideStartingVersion: 3, endingVersion: 5 }),
    ).toBe(3);
    expect(await resolveStartingVersion(store, 'events_processor', { kind: 'default', initialStartingVersion: 0 }, 77)).toBe(77);
  });
});
