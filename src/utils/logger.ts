import pino from 'pino';
import type { Logger } from 'pino';

const isDev = process.env.NODE_ENV === 'development';
const isTest = process.env.NODE_ENV === 'test';

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  transport: isDev ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  base: { service: process.env.SERVICE_NAME || 'route-metrics' },
});

export const createChildLogger = (component: string): Logger => logger.child({ component });
