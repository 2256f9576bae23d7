// src/metrics/memory.ts
import { LABEL_NAMES } from './types.ts';
import type { CounterName, GaugeName, HistogramName, Labels, MetricName, MetricsSink } from './types.ts';

export type RecordedMetric = {
  type: 'counter' | 'gauge' | 'histogram';
  name: MetricName;
  labels: Labels;
  value: number;
};

function matches(labels: Labels, filter: Labels): boolean {
  return LABEL_NAMES.every((k) => filter[k] === undefined || labels[k] === filter[k]);
}

/**
 * Recorder that keeps every emitted sample in memory, for assertions.
 */
export class InMemoryMetrics implements MetricsSink {
  readonly samples: RecordedMetric[] = [];

  incCounter(name: CounterName, labels: Labels, by = 1): void {
    this.samples.push({ type: 'counter', name, labels: { ...labels }, value: by });
  }

  setGauge(name: GaugeName, labels: Labels, value: number): void {
    this.samples.push({ type: 'gauge', name, labels: { ...labels }, value });
  }

  observe(name: HistogramName, labels: Labels, value: number): void {
    this.samples.push({ type: 'histogram', name, labels: { ...labels }, value });
  }

  /** Samples of `name` whose labels include every pair of `filter`. */
  select(name: MetricName, filter: Labels = {}): RecordedMetric[] {
    return this.samples.filter((s) => s.name === name && matches(s.labels, filter));
  }

  /** Number of times `name` was incremented. */
  increments(name: CounterName, filter: Labels = {}): number {
    return this.select(name, filter).length;
  }

  /** Sum of all increments of `name`. */
  counter(name: CounterName, filter: Labels = {}): number {
    return this.select(name, filter).reduce((acc, s) => acc + s.value, 0);
  }

  /** Every value `name` was set to, oldest first. */
  gaugeHistory(name: GaugeName, filter: Labels = {}): number[] {
    return this.select(name, filter).map((s) => s.value);
  }
}
