import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { MetricsConfigError } from '../metrics/errors';
import { errorHandler, sanitizeError } from './errorHandler';

class NotFoundError extends Error {
  public readonly statusCode = 404;
}

describe('sanitizeError', () => {
  it('hides internal details', () => {
    expect(sanitizeError(new Error('db password rejected'))).toBe('An unexpected error occurred');
    expect(sanitizeError(new MetricsConfigError(['labels: label name "method" is used twice']))).toBe('Service misconfigured');
  });
});

describe('errorHandler', () => {
  const appFailingWith = (error: Error) => {
    const app = express();
    app.get('/', () => {
      throw error;
    });
    app.use(errorHandler);
    return app;
  };

  it('answers 500 with a sanitized message', async () => {
    const response = await request(appFailingWith(new Error('secret detail'))).get('/').expect(500);

    expect(response.body).toEqual({ error: 'An unexpected error occurred' });
  });

  it('uses the status code carried by the error', async () => {
    const response = await request(appFailingWith(new NotFoundError('missing'))).get('/').expect(404);

    expect(response.body).toEqual({ error: 'An unexpected error occurred' });
  });
});
