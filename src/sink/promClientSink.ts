import { Counter, Gauge, Histogram, Registry, exponentialBuckets } from 'prom-client';
import type { LabelValues } from 'prom-client';
import type { LabelSet, MetricDescriptor, MetricsSink } from '../metrics/types';

export interface PromClientSinkOptions {
  registry?: Registry;
  /** Buckets for histograms measured in seconds. prom-client defaults when omitted. */
  durationBuckets?: number[];
  /** Buckets for histograms measured in bytes. */
  sizeBuckets?: number[];
}

// 64 B .. 16 MiB
const DEFAULT_SIZE_BUCKETS = exponentialBuckets(64, 4, 10);

const toLabelValues = (labels: LabelSet): LabelValues<string> => Object.fromEntries(labels);

/** Default sink: registers one prom-client metric per descriptor on a registry. */
export class PromClientSink implements MetricsSink {
  public readonly registry: Registry;
  private readonly durationBuckets?: number[];
  private readonly sizeBuckets: number[];
  private readonly counters = new Map<string, Counter<string>>();
  private readonly gauges = new Map<string, Gauge<string>>();
  private readonly histograms = new Map<string, Histogram<string>>();

  constructor(options: PromClientSinkOptions = {}) {
    this.registry = options.registry ?? new Registry();
    this.durationBuckets = options.durationBuckets;
    this.sizeBuckets = options.sizeBuckets ?? DEFAULT_SIZE_BUCKETS;
  }

  describe({ kind, name, help, unit, labelNames }: MetricDescriptor): void {
    // A second middleware on the same registry reuses the metric already registered under that name.
    const existing = this.registry.getSingleMetric(name);

    switch (kind) {
      case 'counter':
        this.counters.set(name, existing instanceof Counter
          ? existing
          : new Counter({ name, help, labelNames: [...labelNames], registers: [this.registry] }));
        break;
      case 'gauge':
        this.gauges.set(name, existing instanceof Gauge
          ? existing
          : new Gauge({ name, help, labelNames: [...labelNames], registers: [this.registry] }));
        break;
      case 'histogram': {
        const buckets = unit === 'bytes' ? this.sizeBuckets : this.durationBuckets;
        this.histograms.set(name, existing instanceof Histogram
          ? existing
          : new Histogram({ name, help, labelNames: [...labelNames], registers: [this.registry], ...(buckets && { buckets }) }));
        break;
      }
    }
  }

  incrementGauge(name: string, labels: LabelSet): void {
    this.lookup(this.gauges, name).inc(toLabelValues(labels));
  }

  decrementGauge(name: string, labels: LabelSet): void {
    this.lookup(this.gauges, name).dec(toLabelValues(labels));
  }

  observeHistogram(name: string, labels: LabelSet, value: number): void {
    this.lookup(this.histograms, name).observe(toLabelValues(labels), value);
  }

  incrementCounter(name: string, labels: LabelSet, value = 1): void {
    this.lookup(this.counters, name).inc(toLabelValues(labels), value);
  }

  private lookup<T>(metrics: Map<string, T>, name: string): T {
    const metric = metrics.get(name);
    if (!metric) throw new Error(`Metric "${name}" has not been described`);
    return metric;
  }
}
