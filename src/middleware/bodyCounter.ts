import type { ServerResponse } from 'http';

type WriteCallback = (error: Error | null | undefined) => void;

// Loose method shapes the original overloaded methods are stored under.
interface ResponseMethods {
  writeHead(...args: unknown[]): unknown;
  write(chunk: unknown, encoding?: BufferEncoding | WriteCallback, callback?: WriteCallback): boolean;
  end(chunk?: unknown, encoding?: BufferEncoding | (() => void), callback?: () => void): unknown;
}

export interface BodyCounterHooks {
  /** The handler produced a response (headers or body). */
  onResponse(): void;
  onChunk(bytes: number): void;
}

export const chunkByteLength = (chunk: unknown, encoding?: BufferEncoding): number => {
  if (typeof chunk === 'string') return Buffer.byteLength(chunk, encoding ?? 'utf8');
  if (chunk instanceof Uint8Array) return chunk.byteLength;
  return 0;
};

const encodingOf = (value: unknown): BufferEncoding | undefined =>
  typeof value === 'string' && Buffer.isEncoding(value) ? value : undefined;

/**
 * Wraps `res.writeHead`, `res.write` and `res.end` so every body chunk is counted
 * on its way out. Arguments, return values and callbacks pass through untouched.
 * With `countBody` false (HEAD requests) only the response hook fires.
 */
export const countResponseBody = <T extends ServerResponse>(res: T, hooks: BodyCounterHooks, countBody = true): void => {
  const originalWriteHead: ResponseMethods['writeHead'] = res.writeHead;
  const originalWrite: ResponseMethods['write'] = res.write;
  const originalEnd: ResponseMethods['end'] = res.end;

  res.writeHead = (...args: unknown[]): T => {
    originalWriteHead.apply(res, args);
    hooks.onResponse();
    return res;
  };

  res.write = (chunk: unknown, encoding?: BufferEncoding | WriteCallback, callback?: WriteCallback): boolean => {
    hooks.onResponse();
    const ended = res.writableEnded;
    const result = originalWrite.call(res, chunk, encoding, callback);
    if (countBody && !ended) hooks.onChunk(chunkByteLength(chunk, encodingOf(encoding)));
    return result;
  };

  res.end = (chunk?: unknown, encoding?: BufferEncoding | (() => void), callback?: () => void): T => {
    hooks.onResponse();
    const ended = res.writableEnded;
    originalEnd.call(res, chunk, encoding, callback);
    if (countBody && !ended && typeof chunk !== 'function') {
      hooks.onChunk(chunkByteLength(chunk, encodingOf(encoding)));
    }
    return res;
  };
};
