/**
 * Consumer side of the pipeline.
 *
 * Each tick takes up to `concurrentTasks` batches off the channel, checks the
 * chain id and version contiguity, processes the batches in parallel and, once
 * all of them are durable, records the highest end version as checkpoint.
 */
// src/runner/dispatcher.ts
import type { CheckpointSaver } from '../db/checkpoint.ts';
import type { ProgressStore } from '../db/progress.ts';
import { FatalError, errorMessage } from '../errors.ts';
import { recordStep, type MetricsSink } from '../metrics/types.ts';
import type { ProcessingResult, Processor } from '../processor/types.ts';
import type { TransactionBatch } from '../stream/types.ts';
import type { BoundedChannel } from '../utils/channel.ts';
import { getLogger } from '../utils/logger.ts';
import { MovingAverage } from '../utils/movingAverage.ts';
import { TimeoutError, withTimeout } from '../utils/time.ts';

const log = getLogger('runner/dispatcher');

/** Longest wait for a batch before the process is considered stuck. */
export const CONSUMER_TIMEOUT_MS = 300_000;
const PROCESSING_MA_WINDOW_MS = 10_000;

export type DispatcherState = 'init' | 'running' | 'aborted' | 'drained' | 'done';

export type DispatcherOptions = {
  processor: Processor;
  channel: BoundedChannel<TransactionBatch>;
  progress: ProgressStore;
  checkpoint: CheckpointSaver;
  /** Maximum batches processed in parallel per tick. */
  concurrentTasks: number;
  startingVersion: number;
  /** Inclusive; `run` returns once the checkpoint reaches it, at once when `startingVersion` is past it. */
  endingVersion?: number;
  consumerTimeoutMs?: number;
  metrics: MetricsSink;
  verbose?: boolean;
};

export type DispatcherSummary = {
  lastCheckpoint: number | null;
  ticks: number;
  batches: number;
};

export class Dispatcher {
  private _state: DispatcherState = 'init';
  private chainId: number | null = null;
  private lastFetchedVersion: number;
  private lastCheckpoint: number | null = null;
  private ticks = 0;
  private batches = 0;
  private readonly processingMa = new MovingAverage(PROCESSING_MA_WINDOW_MS);
  private readonly consumerTimeoutMs: number;
  private readonly processorName: string;

  constructor(private readonly opts: DispatcherOptions) {
    if (!Number.isInteger(opts.concurrentTasks) || opts.concurrentTasks < 1) {
      throw new Error(`concurrentTasks must be a positive integer, got ${opts.concurrentTasks}`);
    }
    this.lastFetchedVersion = opts.startingVersion - 1;
    this.consumerTimeoutMs = opts.consumerTimeoutMs ?? CONSUMER_TIMEOUT_MS;
    this.processorName = opts.processor.name();
  }

  get state(): DispatcherState {
    return this._state;
  }

  /**
   * Runs ticks until the ending version is durable, or forever without one.
   *
   * @throws {FatalError} `watchdog_timeout`, `channel_disconnected`, `chain_id_mismatch`,
   *   `version_gap` or `processor_failed`.
   */
  async run(): Promise<DispatcherSummary> {
    try {
      for (;;) {
        const { endingVersion, startingVersion } = this.opts;
        const durable = this.lastCheckpoint ?? startingVersion - 1;
        if (endingVersion !== undefined && durable >= endingVersion) {
          log.info(`[dispatcher] ${this.processorName}: reached ending_version=${endingVersion}`);
          this._state = 'done';
          return { lastCheckpoint: this.lastCheckpoint, ticks: this.ticks, batches: this.batches };
        }
        await this.tick();
      }
    } catch (e) {
      this._state = 'aborted';
      throw e;
    }
  }

  private async receive(): Promise<TransactionBatch[]> {
    const { channel, concurrentTasks } = this.opts;
    let first: TransactionBatch | undefined;
    try {
      first = await withTimeout(channel.recv(), this.consumerTimeoutMs, 'batch channel receive');
    } catch (e) {
      if (e instanceof TimeoutError) {
        throw new FatalError(
          'watchdog_timeout',
          `[dispatcher] no batch received within ${this.consumerTimeoutMs} ms`,
          { processor: this.processorName, lastFetchedVersion: this.lastFetchedVersion },
          { cause: e },
        );
      }
      throw e;
    }
    if (first === undefined) {
      throw new FatalError('channel_disconnected', '[dispatcher] batch channel closed by the fetcher', {
        processor: this.processorName,
        lastFetchedVersion: this.lastFetchedVersion,
      });
    }

    const batches = [first];
    // a closed channel only stops the drain; the next blocking receive reports it
    while (batches.length < concurrentTasks) {
      const next = channel.tryRecv();
      if (next.kind !== 'item') break;
      batches.push(next.value);
    }
    return batches;
  }

  private async verifyChainId(batch: TransactionBatch): Promise<number> {
    if (this.chainId !== null) {
      if (batch.chainId !== this.chainId) this.chainMismatch(this.chainId, batch);
      return this.chainId;
    }
    const { progress } = this.opts;
    const stored = await progress.readChainId();
    if (stored === null) {
      await progress.writeChainId(batch.chainId);
      log.info(`[dispatcher] recorded chain_id=${batch.chainId}`);
    } else if (stored !== batch.chainId) {
      this.chainMismatch(stored, batch);
    }
    this.chainId = batch.chainId;
    this._state = 'running';
    return batch.chainId;
  }

  private chainMismatch(expected: number, batch: TransactionBatch): never {
    throw new FatalError(
      'chain_id_mismatch',
      `[dispatcher] chain id mismatch: stored=${expected} received=${batch.chainId}`,
      {
        storedChainId: expected,
        receivedChainId: batch.chainId,
        startVersion: batch.startVersion,
        endVersion: batch.endVersion,
      },
    );
  }

  private async runWorker(batch: TransactionBatch, chainId: number): Promise<ProcessingResult> {
    try {
      return await this.opts.processor.process(batch, chainId);
    } catch (e) {
      throw new FatalError(
        'processor_failed',
        `[dispatcher] ${this.processorName} failed on [${batch.startVersion}, ${batch.endVersion}]: ${errorMessage(e)}`,
        { processor: this.processorName, startVersion: batch.startVersion, endVersion: batch.endVersion },
        { cause: e },
      );
    }
  }

  private async tick(): Promise<void> {
    const { checkpoint, metrics } = this.opts;
    const batches = await this.receive();
    const tickStarted = performance.now();

    let chainId = -1;
    for (const b of batches) {
      chainId = await this.verifyChainId(b);
      if (b.startVersion !== this.lastFetchedVersion + 1) {
        throw new FatalError(
          'version_gap',
          `[dispatcher] gap in batches: last_fetched_version=${this.lastFetchedVersion} current_fetched_version=${b.startVersion}`,
          { lastFetchedVersion: this.lastFetchedVersion, currentFetchedVersion: b.startVersion },
        );
      }
      this.lastFetchedVersion = b.endVersion;
    }
    // last batch received, its checkpoint still pending
    const { endingVersion } = this.opts;
    if (endingVersion !== undefined && this.lastFetchedVersion >= endingVersion) this._state = 'drained';

    const workerChainId = chainId;
    const results = await Promise.all(batches.map((b) => this.runWorker(b, workerChainId)));

    results.sort((a, b) => a.startVersion - b.startVersion);
    for (let i = 1; i < results.length; i++) {
      if (results[i].startVersion !== results[i - 1].endVersion + 1) {
        throw new FatalError(
          'version_gap',
          `[dispatcher] processed batches are not contiguous: ${results[i - 1].endVersion} then ${results[i].startVersion}`,
          { lastFetchedVersion: results[i - 1].endVersion, currentFetchedVersion: results[i].startVersion },
        );
      }
    }

    const last = results[results.length - 1];
    await checkpoint.save(last.endVersion, last.lastTransactionTimestamp);
    this.lastCheckpoint = last.endVersion;
    this.ticks++;
    this.batches += batches.length;

    const processor = this.processorName;
    let bytes = 0;
    let txns = 0;
    for (const b of batches) {
      const r = results.find((x) => x.startVersion === b.startVersion);
      recordStep(metrics, {
        processor,
        step: 'ProcessedBatch',
        lastVersion: b.endVersion,
        lastTimestamp: b.endTimestamp,
        sizeInBytes: b.sizeInBytes,
        numTransactions: b.transactions.length,
      });
      if (r) {
        metrics.observe('processing_duration_seconds', { processor, step: 'ProcessedBatch' }, r.processingDurationMs / 1000);
        metrics.observe('db_insertion_duration_seconds', { processor, step: 'ProcessedBatch' }, r.dbInsertionDurationMs / 1000);
      }
      bytes += b.sizeInBytes;
      txns += b.transactions.length;
    }
    recordStep(metrics, {
      processor,
      step: 'ProcessedMultipleBatches',
      lastVersion: last.endVersion,
      lastTimestamp: last.lastTransactionTimestamp,
      sizeInBytes: bytes,
      numTransactions: txns,
    });
    metrics.observe(
      'processing_duration_seconds',
      { processor, step: 'ProcessedMultipleBatches' },
      (performance.now() - tickStarted) / 1000,
    );

    const tps = this.processingMa.tickNow(txns);
    const message = `[dispatcher] ${processor}: processed [${results[0].startVersion}, ${last.endVersion}] batches=${batches.length} txns=${txns} tps=${tps.toFixed(1)}`;
    if (this.opts.verbose) log.info(message);
    else log.debug(message);
  }
}
