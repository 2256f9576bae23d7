// src/metrics/types.ts
/**
 * Metric capability injected into the stream client, fetcher and dispatcher.
 * Production wires {@link PromMetricsSink}; tests use {@link InMemoryMetrics}.
 */

/** Pipeline stage a set of step metrics is reported for. */
export type ProcessingStep = 'ReceivedTxnsFromGrpc' | 'ProcessedBatch' | 'ProcessedMultipleBatches';

export type CounterName = 'processed_bytes_count' | 'num_transactions_processed_count' | 'decode_errors_count';
export type GaugeName = 'latest_processed_version' | 'transaction_unix_timestamp' | 'grpc_reconnection_retries' | 'fetcher_tps';
export type HistogramName = 'processing_duration_seconds' | 'db_insertion_duration_seconds';
export type MetricName = CounterName | GaugeName | HistogramName;

export const LABEL_NAMES = ['processor', 'step', 'kind'] as const;
export type LabelName = (typeof LABEL_NAMES)[number];
export type Labels = Partial<Record<LabelName, string>>;

export interface MetricsSink {
  incCounter(name: CounterName, labels: Labels, by?: number): void;
  setGauge(name: GaugeName, labels: Labels, value: number): void;
  observe(name: HistogramName, labels: Labels, value: number): void;
}

/**
 * Values reported for one pipeline step.
 */
export type StepReport = {
  processor: string;
  step: ProcessingStep;
  /** Highest version covered by the step. */
  lastVersion: number;
  /** Timestamp of that version, if known. */
  lastTimestamp: Date | null;
  sizeInBytes: number;
  numTransactions: number;
};

/**
 * Emits the four per-step metrics: latest version, transaction unix timestamp,
 * processed bytes and processed transaction count.
 */
export function recordStep(metrics: MetricsSink, r: StepReport): void {
  const labels: Labels = { processor: r.processor, step: r.step };
  metrics.setGauge('latest_processed_version', labels, r.lastVersion);
  if (r.lastTimestamp) metrics.setGauge('transaction_unix_timestamp', labels, r.lastTimestamp.getTime() / 1000);
  metrics.incCounter('processed_bytes_count', labels, r.sizeInBytes);
  metrics.incCounter('num_transactions_processed_count', labels, r.numTransactions);
}
