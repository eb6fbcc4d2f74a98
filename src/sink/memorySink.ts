import type { LabelSet, MetricDescriptor, MetricKind, MetricsSink } from '../metrics/types';

export interface SinkEvent {
  kind: MetricKind;
  name: string;
  labels: LabelSet;
  value: number;
}

type LabelQuery = Readonly<Record<string, string>>;

const isLabelSet = (labels: LabelSet | LabelQuery): labels is LabelSet => Array.isArray(labels);

const seriesKey = (name: string, labels: LabelSet | LabelQuery): string => {
  const entries: Array<readonly [string, string]> = isLabelSet(labels) ? [...labels] : Object.entries(labels);
  const body = entries
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .sort()
    .join(',');
  return `${name}{${body}}`;
};

/**
 * In-process sink that keeps every event plus running gauge and counter values.
 * Rejects label sets whose keys differ from the described label names, in order.
 */
export class MemorySink implements MetricsSink {
  public readonly descriptors = new Map<string, MetricDescriptor>();
  public readonly events: SinkEvent[] = [];
  private readonly values = new Map<string, number>();

  describe(descriptor: MetricDescriptor): void {
    this.descriptors.set(descriptor.name, descriptor);
  }

  incrementGauge(name: string, labels: LabelSet): void {
    this.record('gauge', name, labels, 1);
  }

  decrementGauge(name: string, labels: LabelSet): void {
    this.record('gauge', name, labels, -1);
  }

  observeHistogram(name: string, labels: LabelSet, value: number): void {
    this.record('histogram', name, labels, value);
  }

  incrementCounter(name: string, labels: LabelSet, value = 1): void {
    this.record('counter', name, labels, value);
  }

  /** Current value of a gauge or counter series; 0 when never touched. */
  value(name: string, labels: LabelQuery = {}): number {
    return this.values.get(seriesKey(name, labels)) ?? 0;
  }

  /** Histogram observations recorded for a metric, oldest first. */
  observations(name: string): SinkEvent[] {
    return this.events.filter((event) => event.kind === 'histogram' && event.name === name);
  }

  reset(): void {
    this.events.length = 0;
    this.values.clear();
  }

  private record(kind: MetricKind, name: string, labels: LabelSet, value: number): void {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) throw new Error(`Metric "${name}" has not been described`);
    if (descriptor.kind !== kind) throw new Error(`Metric "${name}" is a ${descriptor.kind}, not a ${kind}`);

    const keys = labels.map(([key]) => key);
    if (keys.join(',') !== descriptor.labelNames.join(',')) {
      throw new Error(`Metric "${name}" expects labels [${descriptor.labelNames.join(', ')}], got [${keys.join(', ')}]`);
    }

    this.events.push({ kind, name, labels, value });
    if (kind !== 'histogram') {
      const key = seriesKey(name, labels);
      this.values.set(key, (this.values.get(key) ?? 0) + value);
    }
  }
}
