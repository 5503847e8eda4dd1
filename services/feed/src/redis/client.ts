import Redis, { type RedisOptions } from 'ioredis';
import { config } from '../config';

// A finite maxRetriesPerRequest flushes queued commands with an error while Redis is
// unreachable. The offline queue stays on: fresh `duplicate()` connections send WATCH
// before their connect completes. `duplicate()` copies these options.
export const redisOptions: RedisOptions = {
  lazyConnect: false,
  maxRetriesPerRequest: 1,
  enableReadyCheck: true,
};

let client: Redis | null = null;

export function getRedis(): Redis {
  if (!client) {
    client = new Redis(config.redisUrl, redisOptions);
  }
  return client;
}

export async function closeRedis(): Promise<void> {
  if (!client) return;
  const c = client;
  client = null;
  await c.quit();
}
