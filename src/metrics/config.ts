import { z } from 'zod';
import { MetricsConfigError } from './errors';

const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

const metricName = z.string().regex(METRIC_NAME, 'must be a valid Prometheus metric name');
const labelName = z
  .string()
  .regex(LABEL_NAME, 'must be a valid Prometheus label name')
  .refine((name) => !name.startsWith('__'), 'label names starting with "__" are reserved');

const metricNamesSchema = z.object({
  requestDuration: metricName.default('http_server_request_duration_seconds'),
  requestBodySize: metricName.default('http_server_request_body_size_bytes'),
  responseBodySize: metricName.default('http_server_response_body_size_bytes'),
  activeRequests: metricName.default('http_server_active_requests'),
  requestsTotal: metricName.nullable().default('http_server_requests_total'),
}).default({});

// `version` and `scheme` are optional labels; null leaves them out.
const labelNamesSchema = z.object({
  endpoint: labelName.default('endpoint'),
  method: labelName.default('method'),
  status: labelName.default('status'),
  protocol: labelName.default('protocol'),
  version: labelName.nullable().default(null),
  scheme: labelName.nullable().default('scheme'),
}).default({});

export const httpMetricsConfigSchema = z.object({
  namespace: z.string().regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/, 'must be a valid metric name prefix').optional(),
  constLabels: z.record(labelName, z.string()).default({}),
  exclude: z.array(z.string()).default([]),
  excludeRegex: z.array(z.string()).default([]),
  excludeStatus: z.array(z.number().int().min(100).max(599)).default([]),
  unmatchedMask: z.string().nullable().default('UNKNOWN'),
  metrics: metricNamesSchema,
  labels: labelNamesSchema,
}).superRefine((config, ctx) => {
  const { labels } = config;
  const standard = [labels.endpoint, labels.method, labels.status, labels.protocol, labels.version, labels.scheme]
    .filter((name): name is string => name !== null);

  const seen = new Set<string>();
  for (const name of standard) {
    if (seen.has(name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['labels'], message: `label name "${name}" is used twice` });
    }
    seen.add(name);
  }

  for (const key of Object.keys(config.constLabels)) {
    if (seen.has(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['constLabels', key],
        message: `constant label "${key}" collides with a standard label`,
      });
    }
  }

  config.excludeRegex.forEach((pattern, index) => {
    try {
      new RegExp(pattern);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['excludeRegex', index],
        message: err instanceof Error ? err.message : `invalid pattern "${pattern}"`,
      });
    }
  });
});

export type HttpMetricsConfigInput = z.input<typeof httpMetricsConfigSchema>;
export type HttpMetricsConfig = z.output<typeof httpMetricsConfigSchema>;

export const parseMetricsConfig = (input: HttpMetricsConfigInput = {}): HttpMetricsConfig => {
  const result = httpMetricsConfigSchema.safeParse(input);
  if (!result.success) {
    throw new MetricsConfigError(
      result.error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)),
    );
  }
  return result.data;
};
