import type { NextFunction, Request, Response } from 'express';
import { logger } from '../utils/logger';

// Sanitize error messages for production
export const sanitizeError = (error: Error): string => {
  if (error.name === 'ValidationError' || error.name === 'ZodError') {
    return 'Invalid request data';
  }
  if (error.name === 'MetricsConfigError') {
    return 'Service misconfigured';
  }
  return 'An unexpected error occurred';
};

const statusOf = (err: Error): number => {
  const status = 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status <= 599 ? status : 500;
};

// Global error handler middleware
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  logger.error({ err, method: req.method, path: req.path }, 'request failed');

  const isDev = process.env.NODE_ENV === 'development';

  res.status(statusOf(err)).json({
    error: isDev ? err.message : sanitizeError(err),
    ...(isDev && { stack: err.stack }),
  });
};
