import type { Logger } from 'pino';
import type { LabelSet, MetricDescriptor, MetricsSink } from '../metrics/types';

/**
 * Keeps sink failures off the request path: observation errors are logged and dropped.
 * `describe` still throws, since it only runs while the middleware is being built.
 */
export class GuardedSink implements MetricsSink {
  constructor(
    private readonly inner: MetricsSink,
    private readonly log: Logger,
  ) {}

  describe(descriptor: MetricDescriptor): void {
    this.inner.describe(descriptor);
  }

  incrementGauge(name: string, labels: LabelSet): void {
    this.guard('incrementGauge', name, () => this.inner.incrementGauge(name, labels));
  }

  decrementGauge(name: string, labels: LabelSet): void {
    this.guard('decrementGauge', name, () => this.inner.decrementGauge(name, labels));
  }

  observeHistogram(name: string, labels: LabelSet, value: number): void {
    this.guard('observeHistogram', name, () => this.inner.observeHistogram(name, labels, value));
  }

  incrementCounter(name: string, labels: LabelSet, value?: number): void {
    this.guard('incrementCounter', name, () => this.inner.incrementCounter(name, labels, value));
  }

  private guard(operation: string, metric: string, call: () => void): void {
    try {
      call();
    } catch (err) {
      this.log.warn({ err, operation, metric }, 'metrics sink call failed');
    }
  }
}
