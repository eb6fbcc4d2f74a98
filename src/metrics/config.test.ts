import { describe, it, expect } from 'vitest';
import { parseMetricsConfig } from './config';
import { MetricsConfigError } from './errors';

const issuesOf = (run: () => unknown): readonly string[] => {
  try {
    run();
  } catch (err) {
    if (err instanceof MetricsConfigError) return err.issues;
    throw err;
  }
  throw new Error('expected a MetricsConfigError');
};

describe('parseMetricsConfig', () => {
  it('fills in defaults', () => {
    const config = parseMetricsConfig();

    expect(config.namespace).toBeUndefined();
    expect(config.constLabels).toEqual({});
    expect(config.exclude).toEqual([]);
    expect(config.excludeRegex).toEqual([]);
    expect(config.excludeStatus).toEqual([]);
    expect(config.unmatchedMask).toBe('UNKNOWN');
    expect(config.labels).toEqual({
      endpoint: 'endpoint',
      method: 'method',
      status: 'status',
      protocol: 'protocol',
      version: null,
      scheme: 'scheme',
    });
  });

  it('keeps a disabled mask', () => {
    expect(parseMetricsConfig({ unmatchedMask: null }).unmatchedMask).toBeNull();
  });

  it('rejects metric names Prometheus cannot store', () => {
    expect(issuesOf(() => parseMetricsConfig({ metrics: { requestDuration: 'http.server.duration' } }))).toEqual([
      'metrics.requestDuration: must be a valid Prometheus metric name',
    ]);
  });

  it('rejects reserved label names', () => {
    expect(issuesOf(() => parseMetricsConfig({ labels: { endpoint: '__name' } }))).toEqual([
      'labels.endpoint: label names starting with "__" are reserved',
    ]);
  });

  it('rejects a label name used twice', () => {
    expect(issuesOf(() => parseMetricsConfig({ labels: { status: 'method' } }))).toEqual([
      'labels: label name "method" is used twice',
    ]);
  });

  it('rejects constant labels colliding with standard labels', () => {
    expect(issuesOf(() => parseMetricsConfig({ constLabels: { method: 'GET' } }))).toEqual([
      'constLabels.method: constant label "method" collides with a standard label',
    ]);
  });

  it('allows a constant label named like a disabled standard label', () => {
    expect(parseMetricsConfig({ constLabels: { version: '2024' } }).constLabels).toEqual({ version: '2024' });
  });

  it('rejects exclusion patterns that do not compile', () => {
    const issues = issuesOf(() => parseMetricsConfig({ excludeRegex: ['^/ok$', '('] }));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^excludeRegex\.1: Invalid regular expression/);
  });

  it('rejects statuses outside 100-599', () => {
    const issues = issuesOf(() => parseMetricsConfig({ excludeStatus: [42] }));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^excludeStatus\.0: /);
  });

  it('names every issue in the error message', () => {
    expect(() => parseMetricsConfig({ constLabels: { method: 'GET' } })).toThrow(
      'Invalid HTTP metrics configuration: constLabels.method: constant label "method" collides with a standard label',
    );
  });
});
