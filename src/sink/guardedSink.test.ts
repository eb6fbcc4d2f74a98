import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { GuardedSink } from './guardedSink';
import { MemorySink } from './memorySink';

class BrokenSink extends MemorySink {
  observeHistogram(): void {
    throw new Error('sink down');
  }
}

const captureLogger = () => {
  const lines: string[] = [];
  const log = pino({ level: 'warn' }, { write: (line: string) => { lines.push(line); } });
  return { log, lines };
};

describe('GuardedSink', () => {
  it('passes calls through to the wrapped sink', () => {
    const inner = new MemorySink();
    const { log, lines } = captureLogger();
    const sink = new GuardedSink(inner, log);

    sink.describe({ kind: 'gauge', name: 'active', help: 'in flight', labelNames: [] });
    sink.incrementGauge('active', []);

    expect(inner.value('active')).toBe(1);
    expect(lines).toHaveLength(0);
  });

  it('logs and drops failing observations', () => {
    const { log, lines } = captureLogger();
    const sink = new GuardedSink(new BrokenSink(), log);
    sink.describe({ kind: 'histogram', name: 'duration', help: 'duration', labelNames: [] });

    expect(() => sink.observeHistogram('duration', [], 0.1)).not.toThrow();
    expect(lines).toHaveLength(1);

    const entry = JSON.parse(lines[0]);
    expect(entry.msg).toBe('metrics sink call failed');
    expect(entry.operation).toBe('observeHistogram');
    expect(entry.metric).toBe('duration');
    expect(entry.err.message).toBe('sink down');
  });

  it('drops calls for undescribed metrics', () => {
    const { log, lines } = captureLogger();
    const sink = new GuardedSink(new MemorySink(), log);

    expect(() => sink.incrementCounter('missing', [])).not.toThrow();
    expect(JSON.parse(lines[0]).err.message).toBe('Metric "missing" has not been described');
  });
});
