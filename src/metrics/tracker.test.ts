import { describe, it, expect, vi } from 'vitest';
import { RequestTracker, parseContentLength } from './tracker';
import type { RequestInfo, ResponseSnapshot } from './tracker';

const info: RequestInfo = { method: 'GET', httpVersion: '1.1', scheme: 'http', path: '/health_check', requestSize: 0 };

const snapshot: ResponseSnapshot = {
  status: 200,
  candidates: { mixed: '/health_check', fallback: '/health_check', matched: true },
};

const fakeClock = (start = 1000) => {
  let now = start;
  return {
    clock: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
};

describe('parseContentLength', () => {
  it('parses unsigned integers', () => {
    expect(parseContentLength('42')).toBe(42);
    expect(parseContentLength(' 7 ')).toBe(7);
    expect(parseContentLength('0')).toBe(0);
    expect(parseContentLength(['12', '13'])).toBe(12);
  });

  it('counts missing or malformed values as zero', () => {
    expect(parseContentLength(undefined)).toBe(0);
    expect(parseContentLength('')).toBe(0);
    expect(parseContentLength('abc')).toBe(0);
    expect(parseContentLength('-5')).toBe(0);
    expect(parseContentLength('1e3')).toBe(0);
    expect(parseContentLength('3.5')).toBe(0);
    expect(parseContentLength('99999999999999999999')).toBe(0);
  });
});

describe('RequestTracker', () => {
  it('walks idle -> active -> streaming -> completed', () => {
    const { clock, advance } = fakeClock();
    const tracker = new RequestTracker(info, clock);

    expect(tracker.currentState).toBe('idle');
    tracker.start();
    expect(tracker.currentState).toBe('active');

    advance(250);
    expect(tracker.respond(() => snapshot)).toBe(true);
    expect(tracker.currentState).toBe('streaming');

    tracker.addBytes(5);
    tracker.addBytes(7);
    advance(250);

    const completed = tracker.complete();
    expect(tracker.currentState).toBe('completed');
    expect(completed).toEqual({
      info,
      durationSeconds: 0.5,
      response: { ...snapshot, responseSize: 12 },
    });
  });

  it('completes only once', () => {
    const tracker = new RequestTracker(info, fakeClock().clock);
    tracker.start();
    tracker.respond(() => snapshot);

    expect(tracker.complete()).toBeDefined();
    expect(tracker.complete()).toBeUndefined();
  });

  it('takes the response snapshot once', () => {
    const tracker = new RequestTracker(info, fakeClock().clock);
    const takeSnapshot = vi.fn(() => snapshot);
    tracker.start();

    tracker.respond(takeSnapshot);
    expect(tracker.respond(takeSnapshot)).toBe(false);
    expect(takeSnapshot).toHaveBeenCalledTimes(1);
  });

  it('ignores bytes outside of streaming', () => {
    const tracker = new RequestTracker(info, fakeClock().clock);
    tracker.start();
    tracker.addBytes(10);
    tracker.respond(() => snapshot);
    tracker.addBytes(0);
    tracker.addBytes(-3);
    tracker.addBytes(4);
    tracker.complete();
    tracker.addBytes(100);

    expect(tracker.responseSize).toBe(4);
  });

  it('completes without a response when abandoned before responding', () => {
    const { clock, advance } = fakeClock();
    const tracker = new RequestTracker(info, clock);
    tracker.start();
    advance(30);

    const completed = tracker.complete();
    expect(completed?.response).toBeUndefined();
    expect(completed?.durationSeconds).toBe(0.03);
    expect(tracker.respond(() => snapshot)).toBe(false);
  });

  it('never reports a negative duration', () => {
    let now = 500;
    const tracker = new RequestTracker(info, () => now);
    tracker.start();
    now = 100;

    expect(tracker.complete()?.durationSeconds).toBe(0);
  });
});
