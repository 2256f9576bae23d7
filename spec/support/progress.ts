import type { BackfillCheckpoint, ProgressStore } from '../../src/db/progress.ts';

/**
 * ProgressStore kept in maps, with the same monotone-advance rule as the SQL one.
 */
export class MemoryProgressStore implements ProgressStore {
  chainId: number | null = null;
  readonly checkpoints = new Map<string, { version: number; timestamp: Date | null }>();
  readonly backfills = new Map<string, BackfillCheckpoint>();

  async readChainId(): Promise<number | null> {
    return this.chainId;
  }

  async writeChainId(chainId: number): Promise<void> {
    if (this.chainId === null) this.chainId = chainId;
  }

  async readLastProcessedVersion(processorName: string): Promise<number | null> {
    return this.checkpoints.get(processorName)?.version ?? null;
  }

  async writeLastProcessedVersion(processorName: string, version: number, timestamp: Date | null): Promise<void> {
    const prev = this.checkpoints.get(processorName);
    if (!prev || prev.version <= version) this.checkpoints.set(processorName, { version, timestamp });
  }

  async readBackfillStatus(alias: string): Promise<BackfillCheckpoint | null> {
    return this.backfills.get(alias) ?? null;
  }

  async upsertBackfillStatus(row: BackfillCheckpoint, force = false): Promise<void> {
    const prev = this.backfills.get(row.backfillAlias);
    if (force || !prev || prev.lastSuccessVersion <= row.lastSuccessVersion) this.backfills.set(row.backfillAlias, { ...row });
  }
}
