import { config } from './config';
import type { FeedStore } from './contracts/feedStore';
import type { NotificationSink } from './contracts/notificationSink';
import { logger } from './logger';
import { FanoutSink, LocalEventSink } from './notifications/localEventSink';
import { RedisChannelSink } from './notifications/redisChannelSink';
import { closeRedis, getRedis } from './redis/client';
import { buildApp } from './server';
import { InMemoryFeedStore } from './storage/memoryFeedStore';
import { RedisFeedStore } from './storage/redisFeedStore';

/**
 * Main entrypoint for the sorted feed service.
 * Wires the configured store and sinks, registers routes, and listens on configured host/port.
 */
async function main() {
  const local = new LocalEventSink();
  local.on('publish', (event) => logger.debug({ event }, 'feed publish'));
  local.on('retract', (event) => logger.debug({ event }, 'feed retract'));

  let store: FeedStore;
  const sinks: NotificationSink[] = [local];
  let shutdown = async () => {};

  if (config.store === 'redis') {
    const redisStore = new RedisFeedStore(getRedis());
    store = redisStore;
    sinks.unshift(new RedisChannelSink(getRedis()));
    shutdown = async () => {
      await redisStore.close();
      await closeRedis();
    };
  } else {
    store = new InMemoryFeedStore();
  }
  const sink = new FanoutSink(sinks);

  const app = await buildApp({ store, sink, retry: config.retry, logger });
  app.addHook('onClose', async () => {
    await shutdown();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.close().then(
        () => process.exit(0),
        (err) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Sorted feed server listening on http://${config.host}:${config.port} (store: ${config.store})`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  logger.fatal({ err }, 'Fatal error starting sorted feed service');
  process.exit(1);
});
