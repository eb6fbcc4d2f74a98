/** Ordered label pairs. Standard labels come first, constant labels follow sorted by key. */
export type LabelSet = ReadonlyArray<readonly [string, string]>;

export type MetricKind = 'counter' | 'gauge' | 'histogram';

export type MetricUnit = 'seconds' | 'bytes';

export interface MetricDescriptor {
  kind: MetricKind;
  name: string;
  help: string;
  unit?: MetricUnit;
  labelNames: readonly string[];
}

/**
 * Destination for the observations produced by the middleware.
 * Calls are fire-and-forget: nothing on the request path awaits them.
 */
export interface MetricsSink {
  describe(descriptor: MetricDescriptor): void;
  incrementGauge(name: string, labels: LabelSet): void;
  decrementGauge(name: string, labels: LabelSet): void;
  observeHistogram(name: string, labels: LabelSet, value: number): void;
  incrementCounter(name: string, labels: LabelSet, value?: number): void;
}

/** What the router bound for a request: the route template and its parameters. */
export interface RouteMatch {
  pattern: string;
  params: Readonly<Record<string, string | undefined>>;
  /** The pattern is plain text with no placeholders, e.g. a stringified RegExp route. */
  literal?: boolean;
}

/** Parameters of a single route whose literal values are kept in the route label. */
export interface RouteCardinalityOverride {
  readonly keepParams: ReadonlySet<string>;
}

/** Monotonic milliseconds. */
export type Clock = () => number;
