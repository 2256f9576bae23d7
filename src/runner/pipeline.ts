// src/runner/pipeline.ts
/**
 * Runs the fetcher and the dispatcher as two concurrent tasks linked by a
 * bounded channel. When either task fails the channel is closed so that the
 * other one stops as well (the dispatcher still finishes the tick it is in),
 * and the first failure is rethrown once both have settled.
 */
import type { CheckpointSaver } from '../db/checkpoint.ts';
import type { ProgressStore } from '../db/progress.ts';
import type { MetricsSink } from '../metrics/types.ts';
import type { Processor } from '../processor/types.ts';
import type { StreamOpener } from '../stream/client.ts';
import { runFetcher, type FetcherSummary } from '../stream/fetcher.ts';
import type { TransactionBatch } from '../stream/types.ts';
import { BoundedChannel } from '../utils/channel.ts';
import { getLogger } from '../utils/logger.ts';
import { formatDuration } from '../utils/time.ts';
import { Dispatcher, type DispatcherSummary } from './dispatcher.ts';

const log = getLogger('runner/pipeline');

export type PipelineOptions = {
  processor: Processor;
  open: StreamOpener;
  progress: ProgressStore;
  checkpoint: CheckpointSaver;
  metrics: MetricsSink;
  startingVersion: number;
  endingVersion?: number;
  concurrentTasks: number;
  channelBufferSize: number;
  responseItemTimeoutMs: number;
  consumerTimeoutMs?: number;
  maxReconnectRetries?: number;
  verbose?: boolean;
};

export type PipelineSummary = {
  fetcher: FetcherSummary;
  dispatcher: DispatcherSummary;
};

/**
 * Streams `[startingVersion, endingVersion]` (open-ended without an ending version) through the processor.
 *
 * @returns once the ending version is durable, at once when the range is empty.
 * @throws the first error raised by either task, usually a {@link FatalError}.
 */
export async function runPipeline(opts: PipelineOptions): Promise<PipelineSummary> {
  const { startingVersion, endingVersion } = opts;
  if (endingVersion !== undefined && startingVersion > endingVersion) {
    log.info(
      `[pipeline] ${opts.processor.name()}: starting_version=${startingVersion} already past ending_version=${endingVersion}, nothing to stream`,
    );
    return {
      fetcher: { lastFetchedVersion: startingVersion - 1, batches: 0, reconnects: 0 },
      dispatcher: { lastCheckpoint: null, ticks: 0, batches: 0 },
    };
  }

  const started = Date.now();
  const channel = new BoundedChannel<TransactionBatch>(opts.channelBufferSize);
  const failures: unknown[] = [];

  const guard = async <T>(task: string, p: Promise<T>): Promise<T | null> => {
    try {
      return await p;
    } catch (e) {
      failures.push(e);
      log.debug(`[pipeline] ${task} stopped, closing batch channel`);
      channel.close();
      return null;
    }
  };

  const dispatcher = new Dispatcher({
    processor: opts.processor,
    channel,
    progress: opts.progress,
    checkpoint: opts.checkpoint,
    concurrentTasks: opts.concurrentTasks,
    startingVersion: opts.startingVersion,
    endingVersion: opts.endingVersion,
    consumerTimeoutMs: opts.consumerTimeoutMs,
    metrics: opts.metrics,
    verbose: opts.verbose,
  });

  log.info(
    `[pipeline] ${opts.processor.name()}: streaming from ${opts.startingVersion} to ${opts.endingVersion ?? 'tip'} with ${opts.concurrentTasks} tasks`,
  );
  const [fetcher, dispatched] = await Promise.all([
    guard(
      'fetcher',
      runFetcher({
        processorName: opts.processor.name(),
        open: opts.open,
        channel,
        startingVersion: opts.startingVersion,
        endingVersion: opts.endingVersion,
        responseItemTimeoutMs: opts.responseItemTimeoutMs,
        metrics: opts.metrics,
        maxReconnectRetries: opts.maxReconnectRetries,
      }),
    ),
    guard('dispatcher', dispatcher.run()),
  ]);

  if (failures.length > 0) throw failures[0];
  if (!fetcher || !dispatched) throw new Error('pipeline task ended without result');

  log.info(
    `[pipeline] done: checkpoint=${dispatched.lastCheckpoint ?? 'none'} batches=${dispatched.batches} reconnects=${fetcher.reconnects} in ${formatDuration((Date.now() - started) / 1000)}`,
  );
  return { fetcher, dispatcher: dispatched };
}
