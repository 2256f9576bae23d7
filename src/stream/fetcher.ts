// src/stream/fetcher.ts
/**
 * Single task reading frames off the transaction stream, validating
 * contiguity and publishing {@link TransactionBatch}es onto the bounded
 * channel. Transient stream failures lead to a reconnect at the next
 * unfetched version; invariant violations are fatal.
 */
import { ChannelClosedError, type BoundedChannel } from '../utils/channel.ts';
import { MovingAverage } from '../utils/movingAverage.ts';
import { sleep, withTimeout } from '../utils/time.ts';
import { getLogger } from '../utils/logger.ts';
import { FatalError, errorMessage } from '../errors.ts';
import { recordStep, type MetricsSink } from '../metrics/types.ts';
import { RECONNECTION_MAX_RETRIES, type OpenedStream, type StreamOpener } from './client.ts';
import type { StreamFrame, TransactionBatch } from './types.ts';

const log = getLogger('stream/fetcher');

/** Fixed pause before each reconnect attempt. */
export const RECONNECT_DELAY_MS = 100;
/** Poll interval while waiting for the channel to drain at the end of the range. */
export const DRAIN_POLL_MS = 100;
const FETCH_MA_WINDOW_MS = 10_000;

export type FetcherOptions = {
  processorName: string;
  open: StreamOpener;
  channel: BoundedChannel<TransactionBatch>;
  startingVersion: number;
  /** Inclusive; the fetcher drains the channel and returns once it has been fetched. */
  endingVersion?: number;
  responseItemTimeoutMs: number;
  metrics: MetricsSink;
  /** Consecutive failed reconnects tolerated before giving up. */
  maxReconnectRetries?: number;
};

export type FetcherSummary = {
  lastFetchedVersion: number;
  batches: number;
  reconnects: number;
};

/**
 * Runs the fetch loop until the ending version has been published (and consumed) or a fatal error occurs.
 *
 * @throws {FatalError} `version_gap`, `empty_frame`, `missing_chain_id`, `reconnect_budget_exceeded`, `channel_closed`.
 */
export async function runFetcher(opts: FetcherOptions): Promise<FetcherSummary> {
  const { processorName, open, channel, endingVersion, responseItemTimeoutMs, metrics } = opts;
  const maxRetries = opts.maxReconnectRetries ?? RECONNECTION_MAX_RETRIES;

  let nextVersionToFetch = opts.startingVersion;
  let lastFetchedVersion = opts.startingVersion - 1;
  let reconnectionRetries = 0;
  let connectionId = 'none';
  let batches = 0;
  let reconnects = 0;
  const fetchMa = new MovingAverage(FETCH_MA_WINDOW_MS);

  const setRetries = (n: number) => {
    if (n === reconnectionRetries) return;
    reconnectionRetries = n;
    metrics.setGauge('grpc_reconnection_retries', { processor: processorName }, n);
  };

  const consumerGone = () =>
    new FatalError('channel_closed', '[fetcher] batch channel closed by the consumer', {
      nextVersionToFetch,
      connectionId,
    });

  async function reconnect(): Promise<OpenedStream> {
    for (;;) {
      await sleep(RECONNECT_DELAY_MS);
      if (channel.isClosed) throw consumerGone();
      if (reconnectionRetries >= maxRetries) {
        throw new FatalError(
          'reconnect_budget_exceeded',
          `[fetcher] reconnected ${reconnectionRetries} times without receiving a frame, giving up`,
          { reconnectionRetries, nextVersionToFetch, connectionId },
        );
      }
      setRetries(reconnectionRetries + 1);
      reconnects++;
      log.info(
        `[fetcher] reconnecting (${reconnectionRetries}/${maxRetries}) next_version_to_fetch=${nextVersionToFetch}`,
      );
      try {
        const s = await open(nextVersionToFetch, endingVersion);
        connectionId = s.connectionId;
        return s;
      } catch (e) {
        log.warn(`[fetcher] reconnect failed: ${errorMessage(e)}`);
      }
    }
  }

  async function publish(frame: StreamFrame): Promise<void> {
    const txns = frame.transactions;
    if (txns.length === 0) {
      throw new FatalError('empty_frame', '[fetcher] received a frame without transactions', {
        lastFetchedVersion,
        connectionId,
      });
    }
    if (frame.chainId === null) {
      throw new FatalError('missing_chain_id', '[fetcher] received a frame without chain id', {
        lastFetchedVersion,
        connectionId,
      });
    }
    const first = txns[0];
    const last = txns[txns.length - 1];
    if (first.version !== lastFetchedVersion + 1) {
      throw new FatalError(
        'version_gap',
        `[fetcher] gap in transaction stream: last_fetched_version=${lastFetchedVersion} current_fetched_version=${first.version}`,
        { lastFetchedVersion, currentFetchedVersion: first.version, connectionId },
      );
    }
    lastFetchedVersion = last.version;
    nextVersionToFetch = last.version + 1;
    setRetries(0);

    const batch: TransactionBatch = {
      chainId: frame.chainId,
      transactions: txns,
      startVersion: first.version,
      endVersion: last.version,
      startTimestamp: first.timestamp,
      endTimestamp: last.timestamp,
      sizeInBytes: frame.sizeInBytes,
    };
    recordStep(metrics, {
      processor: processorName,
      step: 'ReceivedTxnsFromGrpc',
      lastVersion: batch.endVersion,
      lastTimestamp: batch.endTimestamp,
      sizeInBytes: batch.sizeInBytes,
      numTransactions: txns.length,
    });
    const tps = fetchMa.tickNow(txns.length);
    metrics.setGauge('fetcher_tps', { processor: processorName }, tps);
    log.debug(
      `[fetcher] received batch start_version=${batch.startVersion} end_version=${batch.endVersion} bytes=${batch.sizeInBytes} tps=${tps.toFixed(1)} channel=${channel.size}/${channel.capacity}`,
    );

    try {
      await channel.send(batch);
    } catch (e) {
      if (e instanceof ChannelClosedError) throw consumerGone();
      throw e;
    }
    batches++;
  }

  const pastEnd = () => endingVersion !== undefined && nextVersionToFetch > endingVersion;

  let stream: OpenedStream | null = null;
  try {
    if (!pastEnd()) {
      try {
        stream = await open(nextVersionToFetch, endingVersion);
        connectionId = stream.connectionId;
      } catch (e) {
        log.warn(`[fetcher] initial open failed: ${errorMessage(e)}`);
      }
    }

    for (;;) {
      if (pastEnd()) {
        log.info(`[fetcher] reached ending_version=${endingVersion}, draining channel`);
        while (channel.size > 0 && !channel.isClosed) await sleep(DRAIN_POLL_MS);
        channel.close();
        return { lastFetchedVersion, batches, reconnects };
      }

      if (channel.isClosed) throw consumerGone();

      if (!stream) {
        stream = await reconnect();
        continue;
      }

      let failure: string | null = null;
      let frame: StreamFrame | null = null;
      try {
        const next = await withTimeout(stream.frames.next(), responseItemTimeoutMs, 'next frame');
        if (next.done) failure = 'stream ended';
        else frame = next.value;
      } catch (e) {
        failure = errorMessage(e);
      }

      if (frame) {
        await publish(frame);
        continue;
      }

      log.warn(
        `[fetcher] stream interrupted (${failure ?? 'unknown'}) connection_id=${connectionId} next_version_to_fetch=${nextVersionToFetch}`,
      );
      stream.cancel();
      stream = null;
    }
  } finally {
    stream?.cancel();
  }
}
