export { HttpMetrics, createHttpMetrics } from './middleware/metrics';
export type { HttpMetricsOptions } from './middleware/metrics';
export { expressRouteMatch, keepParamCardinality } from './middleware/routeCardinality';
export type { RouteMatcher } from './middleware/routeCardinality';
export { countResponseBody } from './middleware/bodyCounter';
export type { BodyCounterHooks } from './middleware/bodyCounter';
export { httpMetricsConfigSchema, parseMetricsConfig } from './metrics/config';
export type { HttpMetricsConfig, HttpMetricsConfigInput } from './metrics/config';
export { LabelTemplateError, MetricsConfigError } from './metrics/errors';
export { ExclusionRules } from './metrics/exclusion';
export type { ExclusionConfig } from './metrics/exclusion';
export { buildMixedLabel, finalizeRouteLabel, resolveCandidateLabels, resolveRouteLabel } from './metrics/routeLabel';
export type { CandidateLabels, RouteLabelInput } from './metrics/routeLabel';
export { RequestTracker, parseContentLength } from './metrics/tracker';
export type { CompletedRequest, RequestInfo, TrackerState } from './metrics/tracker';
export type { Clock, RouteCardinalityOverride, RouteMatch } from './metrics/types';
export * from './sink';
export { loadMetricsOptionsFromEnv } from './utils/envValidation';
