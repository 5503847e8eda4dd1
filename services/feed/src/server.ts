import Fastify, { type FastifyBaseLogger } from 'fastify';
import type { FeedStore } from './contracts/feedStore';
import type { NotificationSink } from './contracts/notificationSink';
import type { RetryPolicy } from './feed/retry';
import { registerFeedRoutes } from './routes/feed';

export interface BuildAppOptions {
  store: FeedStore;
  sink?: NotificationSink;
  retry?: Partial<RetryPolicy>;
  logger?: FastifyBaseLogger;
}

export async function buildApp(opts: BuildAppOptions) {
  const app = Fastify({ logger: opts.logger ?? false });

  app.get('/health', async () => {
    try {
      await opts.store.ping();
      return { status: 'ok', store: 'ok' };
    } catch (err) {
      app.log.error({ err }, 'Feed store health check failed');
      return { status: 'degraded', store: 'error' };
    }
  });

  await registerFeedRoutes(app, { store: opts.store, sink: opts.sink, retry: opts.retry });
  return app;
}
