export interface ExclusionConfig {
  exclude?: readonly string[];
  excludeRegex?: readonly string[];
  excludeStatus?: readonly number[];
}

/** Decides, from the final route label and status, whether a request's observations are dropped. */
export class ExclusionRules {
  private readonly paths: ReadonlySet<string>;
  private readonly patterns: readonly RegExp[];
  private readonly statuses: ReadonlySet<number>;

  constructor({ exclude = [], excludeRegex = [], excludeStatus = [] }: ExclusionConfig = {}) {
    this.paths = new Set(exclude);
    this.patterns = excludeRegex.map((pattern) => new RegExp(pattern));
    this.statuses = new Set(excludeStatus);
  }

  shouldRecord(routeLabel: string, status: number): boolean {
    if (this.paths.has(routeLabel)) return false;
    if (this.patterns.some((pattern) => pattern.test(routeLabel))) return false;
    return !this.statuses.has(status);
  }
}
