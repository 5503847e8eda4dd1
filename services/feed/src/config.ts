import 'dotenv/config';
import { z } from 'zod';

const optionalInt = z
  .preprocess((v) => (v === undefined || v === '' ? undefined : Number(v)), z.number().int().nonnegative())
  .optional();

const envSchema = z.object({
  PORT: optionalInt,
  HOST: z.string().min(1).optional(),
  REDIS_URL: z.string().min(1).optional(),
  FEED_STORE: z.enum(['redis', 'memory']).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  FEED_RETRY_MAX_ATTEMPTS: optionalInt,
  FEED_RETRY_BASE_DELAY_MS: optionalInt,
  FEED_RETRY_MAX_DELAY_MS: optionalInt,
});

const parsed = envSchema.safeParse(process.env);
if (!parsed.success) {
  throw new Error(`Invalid environment: ${JSON.stringify(parsed.error.flatten().fieldErrors)}`);
}
const env = parsed.data;

export const config = {
  port: env.PORT ?? 8080,
  host: env.HOST ?? '0.0.0.0',
  redisUrl: env.REDIS_URL ?? 'redis://localhost:6379',
  store: env.FEED_STORE ?? 'redis',
  logLevel: env.LOG_LEVEL ?? 'info',
  retry: {
    // 0 means no cap: keep retrying until the write lands or the precondition fails
    maxAttempts: env.FEED_RETRY_MAX_ATTEMPTS ?? 0,
    baseDelayMs: env.FEED_RETRY_BASE_DELAY_MS ?? 1,
    maxDelayMs: env.FEED_RETRY_MAX_DELAY_MS ?? 50,
  },
};
