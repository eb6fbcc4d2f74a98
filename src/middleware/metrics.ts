import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import type { Logger } from 'pino';
import { parseMetricsConfig } from '../metrics/config';
import type { HttpMetricsConfigInput } from '../metrics/config';
import { ExclusionRules } from '../metrics/exclusion';
import {
  activeLabelNames,
  buildActiveLabels,
  buildNameTable,
  buildRequestLabels,
  requestLabelNames,
} from '../metrics/labels';
import type { MetricNameTable } from '../metrics/labels';
import { finalizeRouteLabel, resolveCandidateLabels } from '../metrics/routeLabel';
import { RequestTracker, parseContentLength } from '../metrics/tracker';
import type { CompletedRequest, RequestInfo, ResponseSnapshot } from '../metrics/tracker';
import type { Clock, LabelSet, MetricsSink, RouteMatch } from '../metrics/types';
import { GuardedSink } from '../sink/guardedSink';
import { PromClientSink } from '../sink/promClientSink';
import { createChildLogger } from '../utils/logger';
import { countResponseBody } from './bodyCounter';
import { expressRouteMatch } from './routeCardinality';
import type { RouteMatcher } from './routeCardinality';

export interface HttpMetricsOptions extends HttpMetricsConfigInput {
  /** Defaults to a PromClientSink on its own registry. */
  sink?: MetricsSink;
  logger?: Logger;
  clock?: Clock;
  routeMatcher?: RouteMatcher;
}

const defaultClock: Clock = () => performance.now();

/**
 * Express instrumentation: counts in-flight requests and records duration,
 * request size and response size per route with bounded label cardinality.
 *
 * Mount `middleware` before the routes and `errorMiddleware` after them:
 *
 *   app.use(metrics.middleware);
 *   app.get('/posts/:language/:slug', keepParamCardinality('language'), handler);
 *   app.use(metrics.errorMiddleware);
 */
export class HttpMetrics {
  public readonly sink: MetricsSink;
  public readonly names: MetricNameTable;
  private readonly exclusions: ExclusionRules;
  private readonly unmatchedMask: string | null;
  private readonly log: Logger;
  private readonly clock: Clock;
  private readonly matchRoute: RouteMatcher;
  private readonly errorMatches = new WeakMap<Request, RouteMatch | undefined>();

  constructor(options: HttpMetricsOptions = {}) {
    const { sink, logger, clock, routeMatcher, ...configInput } = options;
    const config = parseMetricsConfig(configInput);

    this.log = logger ?? createChildLogger('http-metrics');
    this.sink = new GuardedSink(sink ?? new PromClientSink(), this.log);
    this.names = buildNameTable(config);
    this.exclusions = new ExclusionRules(config);
    this.unmatchedMask = config.unmatchedMask;
    this.clock = clock ?? defaultClock;
    this.matchRoute = routeMatcher ?? expressRouteMatch;

    this.describeMetrics();
  }

  readonly middleware: RequestHandler = (req, res, next) => {
    const info: RequestInfo = {
      method: req.method,
      httpVersion: req.httpVersion,
      scheme: req.protocol,
      path: `${req.baseUrl}${req.path}`,
      requestSize: parseContentLength(req.headers['content-length']),
    };
    const activeLabels = buildActiveLabels(this.names, info);
    const tracker = new RequestTracker(info, this.clock);

    this.sink.incrementGauge(this.names.activeRequests, activeLabels);
    tracker.start();

    const settle = () => {
      const completed = tracker.complete();
      if (completed) this.record(completed, activeLabels);
    };
    res.once('finish', settle);
    res.once('close', settle);

    countResponseBody(
      res,
      {
        onResponse: () => {
          tracker.respond(() => this.snapshot(req, res, info));
        },
        onChunk: (bytes) => tracker.addBytes(bytes),
      },
      req.method !== 'HEAD',
    );

    next();
  };

  /**
   * Pins the route match where an error surfaced, so the error response rendered
   * further down the stack is labelled with the route that failed. Mount it after
   * the routes, and inside sub-routers when a custom `routeMatcher` reads `req.baseUrl`.
   */
  readonly errorMiddleware: ErrorRequestHandler = (err, req, _res, next) => {
    if (!this.errorMatches.has(req)) this.errorMatches.set(req, this.matchRoute(req));
    next(err);
  };

  private describeMetrics(): void {
    const { names } = this;
    const requestLabels = requestLabelNames(names);

    this.sink.describe({
      kind: 'gauge',
      name: names.activeRequests,
      help: 'Number of HTTP requests currently being processed',
      labelNames: activeLabelNames(names),
    });
    this.sink.describe({
      kind: 'histogram',
      name: names.requestDuration,
      help: 'HTTP request duration in seconds for all requests',
      unit: 'seconds',
      labelNames: requestLabels,
    });
    this.sink.describe({
      kind: 'histogram',
      name: names.requestBodySize,
      help: 'HTTP request size in bytes for all requests',
      unit: 'bytes',
      labelNames: requestLabels,
    });
    this.sink.describe({
      kind: 'histogram',
      name: names.responseBodySize,
      help: 'HTTP response size in bytes for all requests',
      unit: 'bytes',
      labelNames: requestLabels,
    });
    if (names.requestsTotal !== null) {
      this.sink.describe({
        kind: 'counter',
        name: names.requestsTotal,
        help: 'Total number of HTTP requests',
        labelNames: requestLabels,
      });
    }

    this.log.debug({ metrics: [names.activeRequests, names.requestDuration, names.requestBodySize, names.responseBodySize] }, 'http metrics registered');
  }

  private snapshot(req: Request, res: Response, info: RequestInfo): ResponseSnapshot {
    const candidates = resolveCandidateLabels({
      path: info.path,
      match: this.errorMatches.has(req) ? this.errorMatches.get(req) : this.matchRoute(req),
      keepParams: req.metricsCardinality?.keepParams,
    });

    if (candidates.templateError) {
      this.log.warn(
        { err: candidates.templateError, pattern: candidates.fallback },
        'cannot build mixed cardinality route label, using the route template',
      );
    }

    return { status: res.statusCode, candidates };
  }

  private record(completed: CompletedRequest, activeLabels: LabelSet): void {
    const { names } = this;
    this.sink.decrementGauge(names.activeRequests, activeLabels);

    const { response, info } = completed;
    if (!response) return;

    const endpoint = finalizeRouteLabel(response.candidates, response.status, this.unmatchedMask);
    if (!this.exclusions.shouldRecord(endpoint, response.status)) return;

    const labels = buildRequestLabels(names, {
      endpoint,
      method: info.method,
      status: response.status,
      httpVersion: info.httpVersion,
      scheme: info.scheme,
    });

    this.sink.observeHistogram(names.requestDuration, labels, completed.durationSeconds);
    this.sink.observeHistogram(names.requestBodySize, labels, info.requestSize);
    this.sink.observeHistogram(names.responseBodySize, labels, response.responseSize);
    if (names.requestsTotal !== null) this.sink.incrementCounter(names.requestsTotal, labels);
  }
}

export const createHttpMetrics = (options?: HttpMetricsOptions): HttpMetrics => new HttpMetrics(options);
