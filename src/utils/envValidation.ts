import type { HttpMetricsConfigInput } from '../metrics/config';
import { logger } from './logger';

export interface MetricsEnvResult {
  valid: boolean;
  errors: string[];
  options: HttpMetricsConfigInput;
}

const splitList = (value: string): string[] =>
  value.split(',').map((item) => item.trim()).filter(Boolean);

/**
 * Reads middleware options from the environment:
 *
 *   METRICS_NAMESPACE               prefix for every metric name
 *   METRICS_CONST_LABELS            k=v,k2=v2
 *   METRICS_EXCLUDE                 comma separated route labels
 *   METRICS_EXCLUDE_REGEX           comma separated patterns
 *   METRICS_EXCLUDE_STATUS          comma separated status codes
 *   METRICS_UNMATCHED_MASK          label for requests that matched no route
 *   METRICS_DISABLE_UNMATCHED_MASK  "true" keeps raw paths for unmatched requests
 *   METRICS_HTTP_VERSION_LABEL      label name for the HTTP version (off when unset)
 */
export const loadMetricsOptionsFromEnv = (env: NodeJS.ProcessEnv = process.env): MetricsEnvResult => {
  const errors: string[] = [];
  const options: HttpMetricsConfigInput = {};

  if (env.METRICS_NAMESPACE) options.namespace = env.METRICS_NAMESPACE;

  if (env.METRICS_CONST_LABELS) {
    const constLabels: Record<string, string> = {};
    for (const pair of splitList(env.METRICS_CONST_LABELS)) {
      const separator = pair.indexOf('=');
      if (separator <= 0) {
        errors.push(`Invalid value for METRICS_CONST_LABELS: "${pair}" is not key=value`);
        continue;
      }
      constLabels[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
    }
    options.constLabels = constLabels;
  }

  if (env.METRICS_EXCLUDE) options.exclude = splitList(env.METRICS_EXCLUDE);
  if (env.METRICS_EXCLUDE_REGEX) options.excludeRegex = splitList(env.METRICS_EXCLUDE_REGEX);

  if (env.METRICS_EXCLUDE_STATUS) {
    const statuses: number[] = [];
    for (const item of splitList(env.METRICS_EXCLUDE_STATUS)) {
      const status = Number(item);
      if (!Number.isInteger(status) || status < 100 || status > 599) {
        errors.push(`Invalid value for METRICS_EXCLUDE_STATUS: ${item}`);
        continue;
      }
      statuses.push(status);
    }
    options.excludeStatus = statuses;
  }

  if (env.METRICS_DISABLE_UNMATCHED_MASK === 'true') {
    options.unmatchedMask = null;
  } else if (env.METRICS_UNMATCHED_MASK) {
    options.unmatchedMask = env.METRICS_UNMATCHED_MASK;
  }

  if (env.METRICS_HTTP_VERSION_LABEL) options.labels = { version: env.METRICS_HTTP_VERSION_LABEL };

  if (errors.length > 0) {
    errors.forEach((e) => logger.error(e));
  } else {
    logger.debug('Metrics environment validation passed');
  }

  return { valid: errors.length === 0, errors, options };
};
