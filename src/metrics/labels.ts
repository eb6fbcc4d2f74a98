import type { HttpMetricsConfig } from './config';
import type { LabelSet } from './types';

export interface LabelNameTable {
  readonly endpoint: string;
  readonly method: string;
  readonly status: string;
  readonly protocol: string;
  readonly version: string | null;
  readonly scheme: string | null;
}

/**
 * Every metric and label name the middleware emits, resolved once at construction
 * and shared read-only by all requests.
 */
export interface MetricNameTable {
  readonly requestDuration: string;
  readonly requestBodySize: string;
  readonly responseBodySize: string;
  readonly activeRequests: string;
  readonly requestsTotal: string | null;
  readonly labels: LabelNameTable;
  readonly constLabels: LabelSet;
}

export interface RequestLabelValues {
  endpoint: string;
  method: string;
  status: number;
  httpVersion: string;
  scheme: string;
}

export interface ActiveLabelValues {
  method: string;
  scheme: string;
}

const HTTP_VERSIONS: Readonly<Record<string, string>> = {
  '0.9': '0.9',
  '1.0': '1.0',
  '1.1': '1.1',
  '2.0': '2',
  '3.0': '3',
};

export const httpVersionLabel = (httpVersion: string): string => HTTP_VERSIONS[httpVersion] ?? '<unrecognized>';

export const buildNameTable = (config: HttpMetricsConfig): MetricNameTable => {
  const prefix = config.namespace ? `${config.namespace}_` : '';
  const { metrics } = config;

  const constLabels = Object.entries(config.constLabels)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => Object.freeze([key, value] as const));

  return Object.freeze({
    requestDuration: `${prefix}${metrics.requestDuration}`,
    requestBodySize: `${prefix}${metrics.requestBodySize}`,
    responseBodySize: `${prefix}${metrics.responseBodySize}`,
    activeRequests: `${prefix}${metrics.activeRequests}`,
    requestsTotal: metrics.requestsTotal === null ? null : `${prefix}${metrics.requestsTotal}`,
    labels: Object.freeze({ ...config.labels }),
    constLabels: Object.freeze(constLabels),
  });
};

export const requestLabelNames = (table: MetricNameTable): string[] => {
  const { labels } = table;
  const names = [labels.endpoint, labels.method, labels.status, labels.protocol];
  if (labels.version !== null) names.push(labels.version);
  if (labels.scheme !== null) names.push(labels.scheme);
  return [...names, ...table.constLabels.map(([key]) => key)];
};

export const activeLabelNames = (table: MetricNameTable): string[] => {
  const { labels } = table;
  const names = [labels.method];
  if (labels.scheme !== null) names.push(labels.scheme);
  return [...names, ...table.constLabels.map(([key]) => key)];
};

export const buildRequestLabels = (table: MetricNameTable, values: RequestLabelValues): LabelSet => {
  const { labels } = table;
  const set: Array<readonly [string, string]> = [
    [labels.endpoint, values.endpoint],
    [labels.method, values.method],
    [labels.status, String(values.status)],
    [labels.protocol, 'http'],
  ];
  if (labels.version !== null) set.push([labels.version, httpVersionLabel(values.httpVersion)]);
  if (labels.scheme !== null) set.push([labels.scheme, values.scheme]);
  return [...set, ...table.constLabels];
};

export const buildActiveLabels = (table: MetricNameTable, values: ActiveLabelValues): LabelSet => {
  const { labels } = table;
  const set: Array<readonly [string, string]> = [[labels.method, values.method]];
  if (labels.scheme !== null) set.push([labels.scheme, values.scheme]);
  return [...set, ...table.constLabels];
};
