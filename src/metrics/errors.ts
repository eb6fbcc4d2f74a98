export class MetricsConfigError extends Error {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid HTTP metrics configuration: ${issues.join('; ')}`);
    this.name = 'MetricsConfigError';
    this.issues = issues;
  }
}

export class LabelTemplateError extends Error {
  public readonly template: string;

  constructor(message: string, template: string) {
    super(`${message} in route template "${template}"`);
    this.name = 'LabelTemplateError';
    this.template = template;
  }
}
