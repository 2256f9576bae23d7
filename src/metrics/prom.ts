// src/metrics/prom.ts
import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { CounterName, GaugeName, HistogramName, LabelName, Labels, MetricsSink } from './types.ts';

type Def = { help: string; labelNames: LabelName[] };

const COUNTERS: Record<CounterName, Def> = {
  processed_bytes_count: { help: 'Bytes of transaction data handled per step', labelNames: ['processor', 'step'] },
  num_transactions_processed_count: { help: 'Transactions handled per step', labelNames: ['processor', 'step'] },
  decode_errors_count: { help: 'Skipped data that failed to decode', labelNames: ['processor', 'kind'] },
};

const GAUGES: Record<GaugeName, Def> = {
  latest_processed_version: { help: 'Latest version handled per step', labelNames: ['processor', 'step'] },
  transaction_unix_timestamp: { help: 'Unix timestamp of the latest version per step', labelNames: ['processor', 'step'] },
  grpc_reconnection_retries: { help: 'Consecutive failed stream reconnects', labelNames: ['processor'] },
  fetcher_tps: { help: 'Moving-average transactions per second received', labelNames: ['processor'] },
};

const HISTOGRAMS: Record<HistogramName, Def> = {
  processing_duration_seconds: { help: 'Processing wall time per batch or per tick', labelNames: ['processor', 'step'] },
  db_insertion_duration_seconds: { help: 'Database write time per batch', labelNames: ['processor', 'step'] },
};

/**
 * prom-client backed sink. Metrics live in their own registry; exposing it
 * over HTTP is left to the embedding process.
 */
export class PromMetricsSink implements MetricsSink {
  readonly register = new Registry();
  private readonly counters = new Map<CounterName, Counter<LabelName>>();
  private readonly gauges = new Map<GaugeName, Gauge<LabelName>>();
  private readonly histograms = new Map<HistogramName, Histogram<LabelName>>();

  constructor(defaultLabels: Record<string, string> = {}) {
    this.register.setDefaultLabels(defaultLabels);
  }

  incCounter(name: CounterName, labels: Labels, by = 1): void {
    let c = this.counters.get(name);
    if (!c) {
      c = new Counter({ name: `indexer_${name}`, ...COUNTERS[name], registers: [this.register] });
      this.counters.set(name, c);
    }
    c.inc(labels, by);
  }

  setGauge(name: GaugeName, labels: Labels, value: number): void {
    let g = this.gauges.get(name);
    if (!g) {
      g = new Gauge({ name: `indexer_${name}`, ...GAUGES[name], registers: [this.register] });
      this.gauges.set(name, g);
    }
    g.set(labels, value);
  }

  observe(name: HistogramName, labels: Labels, value: number): void {
    let h = this.histograms.get(name);
    if (!h) {
      h = new Histogram({
        name: `indexer_${name}`,
        ...HISTOGRAMS[name],
        buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
        registers: [this.register],
      });
      this.histograms.set(name, h);
    }
    h.observe(labels, value);
  }
}
