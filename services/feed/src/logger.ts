import pino from 'pino';
import type { BaseLogger, Bindings } from 'pino';
import { config } from './config';

/** The slice of a pino logger the feed code needs; Fastify's `app.log` fits it too. */
export interface FeedLogger extends BaseLogger {
  child(bindings: Bindings): FeedLogger;
}

export const logger = pino({
  level: config.logLevel,
  base: { service: 'sorted-feed' },
});

export function childLogger(component: string): FeedLogger {
  return logger.child({ component });
}
