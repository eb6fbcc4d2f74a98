export { GuardedSink } from './guardedSink';
export { MemorySink } from './memorySink';
export type { SinkEvent } from './memorySink';
export { PromClientSink } from './promClientSink';
export type { PromClientSinkOptions } from './promClientSink';
export type { LabelSet, MetricDescriptor, MetricKind, MetricUnit, MetricsSink } from '../metrics/types';
