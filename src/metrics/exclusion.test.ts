import { describe, it, expect } from 'vitest';
import { ExclusionRules } from './exclusion';

describe('ExclusionRules', () => {
  it('records everything without rules', () => {
    const rules = new ExclusionRules();

    expect(rules.shouldRecord('/health_check', 200)).toBe(true);
    expect(rules.shouldRecord('UNKNOWN', 404)).toBe(true);
  });

  it('drops exact route labels', () => {
    const rules = new ExclusionRules({ exclude: ['/ping'] });

    expect(rules.shouldRecord('/ping', 200)).toBe(false);
    expect(rules.shouldRecord('/ping/', 200)).toBe(true);
  });

  it('drops labels matching a pattern anywhere in the label', () => {
    const rules = new ExclusionRules({ excludeRegex: ['/readyz/.*', '^/internal'] });

    expect(rules.shouldRecord('/readyz/:subsystem', 200)).toBe(false);
    expect(rules.shouldRecord('/api/readyz/db', 200)).toBe(false);
    expect(rules.shouldRecord('/internal/stats', 200)).toBe(false);
    expect(rules.shouldRecord('/api/internal', 200)).toBe(true);
  });

  it('drops excluded statuses for any label', () => {
    const rules = new ExclusionRules({ excludeStatus: [404] });

    expect(rules.shouldRecord('UNKNOWN', 404)).toBe(false);
    expect(rules.shouldRecord('/posts/:language/:slug', 404)).toBe(false);
    expect(rules.shouldRecord('/posts/:language/:slug', 500)).toBe(true);
  });

  it('checks every rule kind together', () => {
    const rules = new ExclusionRules({ exclude: ['/ping'], excludeRegex: ['^/metrics'], excludeStatus: [404, 405] });

    expect(rules.shouldRecord('/ping', 500)).toBe(false);
    expect(rules.shouldRecord('/metrics', 200)).toBe(false);
    expect(rules.shouldRecord('/users/:id', 405)).toBe(false);
    expect(rules.shouldRecord('/users/:id', 200)).toBe(true);
  });
});
