import type { CandidateLabels } from './routeLabel';
import type { Clock } from './types';

export type TrackerState = 'idle' | 'active' | 'streaming' | 'completed';

export interface RequestInfo {
  method: string;
  httpVersion: string;
  scheme: string;
  path: string;
  requestSize: number;
}

export interface ResponseSnapshot {
  status: number;
  candidates: CandidateLabels;
}

export interface CompletedResponse extends ResponseSnapshot {
  responseSize: number;
}

export interface CompletedRequest {
  info: RequestInfo;
  durationSeconds: number;
  /** Absent when the client went away or the handler never answered. */
  response?: CompletedResponse;
}

const CONTENT_LENGTH = /^\d+$/;

/** Parses a content-length header value; anything that is not an unsigned integer counts as 0. */
export const parseContentLength = (value: string | string[] | undefined): number => {
  const raw = Array.isArray(value) ? value[0] : value;
  if (raw === undefined) return 0;
  const trimmed = raw.trim();
  if (!CONTENT_LENGTH.test(trimmed)) return 0;
  const size = Number(trimmed);
  return Number.isSafeInteger(size) ? size : 0;
};

/**
 * Per-request state: idle -> active -> streaming -> completed.
 * `complete()` is the single terminal transition and only succeeds once.
 */
export class RequestTracker {
  private state: TrackerState = 'idle';
  private startedAt = 0;
  private responseBytes = 0;
  private snapshot: ResponseSnapshot | undefined;

  constructor(
    public readonly info: RequestInfo,
    private readonly clock: Clock,
  ) {}

  get currentState(): TrackerState {
    return this.state;
  }

  get responseSize(): number {
    return this.responseBytes;
  }

  start(): void {
    if (this.state !== 'idle') return;
    this.startedAt = this.clock();
    this.state = 'active';
  }

  /** Records the response snapshot the first time the handler produces a response. */
  respond(takeSnapshot: () => ResponseSnapshot): boolean {
    if (this.state !== 'active') return false;
    this.snapshot = takeSnapshot();
    this.state = 'streaming';
    return true;
  }

  addBytes(bytes: number): void {
    if (this.state !== 'streaming' || bytes <= 0) return;
    this.responseBytes += bytes;
  }

  complete(): CompletedRequest | undefined {
    if (this.state === 'completed') return undefined;
    const snapshot = this.state === 'streaming' ? this.snapshot : undefined;
    this.state = 'completed';

    const durationSeconds = Math.max(0, this.clock() - this.startedAt) / 1000;
    return {
      info: this.info,
      durationSeconds,
      response: snapshot && { ...snapshot, responseSize: this.responseBytes },
    };
  }
}
