import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { FeedStore } from '../contracts/feedStore';
import type { NotificationSink } from '../contracts/notificationSink';
import { SortedFeed } from '../feed/sortedFeed';
import type { RetryPolicy } from '../feed/retry';
import type { EditOutcome, PublishOutcome, RetractOutcome } from '../types';

export interface FeedRouteDeps {
  store: FeedStore;
  sink?: NotificationSink;
  retry?: Partial<RetryPolicy>;
}

// ---------- Schemas ----------
const feedParams = z.object({
  feed: z.string().min(1, 'feed required'),
});

const feedId = z.preprocess(
  (v) => (typeof v === 'string' && /^\d+$/.test(v) ? Number(v) : v),
  z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
);

const itemParams = feedParams.extend({ id: feedId });

const publishSchema = z.object({
  item: z.string(),
});

const insertSchema = z.object({
  anchor_id: feedId,
  item: z.string(),
});

// ---------- Helpers ----------
function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: error.flatten() });
}

function sendOutcome(reply: FastifyReply, outcome: PublishOutcome | EditOutcome | RetractOutcome) {
  switch (outcome.status) {
    case 'published':
      return reply.send({ id: outcome.id });
    case 'edited':
    case 'retracted':
      return reply.send({ ok: true });
    case 'not_found':
      return reply.code(404).send({ error: 'not_found', id: outcome.id });
    case 'contention_exhausted':
      return reply.code(409).send({ error: 'contention_exhausted', attempts: outcome.attempts });
  }
}

// ---------- Routes ----------
export async function registerFeedRoutes(app: FastifyInstance, deps: FeedRouteDeps) {
  const feedFor = (name: string) =>
    new SortedFeed(deps.store, name, { sink: deps.sink, retry: deps.retry, logger: app.log });

  app.post('/feeds/:feed/publish', async (req, reply) => {
    const params = feedParams.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const body = publishSchema.safeParse(req.body);
    if (!body.success) return badRequest(reply, body.error);

    const id = await feedFor(params.data.feed).publish(body.data.item);
    return reply.send({ id });
  });

  app.post('/feeds/:feed/prepend', async (req, reply) => {
    const params = feedParams.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const body = publishSchema.safeParse(req.body);
    if (!body.success) return badRequest(reply, body.error);

    const id = await feedFor(params.data.feed).prepend(body.data.item);
    return reply.send({ id });
  });

  app.post('/feeds/:feed/publish_before', async (req, reply) => {
    const params = feedParams.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const body = insertSchema.safeParse(req.body);
    if (!body.success) return badRequest(reply, body.error);

    const outcome = await feedFor(params.data.feed).publishBefore(body.data.anchor_id, body.data.item);
    return sendOutcome(reply, outcome);
  });

  app.post('/feeds/:feed/publish_after', async (req, reply) => {
    const params = feedParams.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const body = insertSchema.safeParse(req.body);
    if (!body.success) return badRequest(reply, body.error);

    const outcome = await feedFor(params.data.feed).publishAfter(body.data.anchor_id, body.data.item);
    return sendOutcome(reply, outcome);
  });

  // Edit in place
  app.put('/feeds/:feed/items/:id', async (req, reply) => {
    const params = itemParams.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const body = publishSchema.safeParse(req.body);
    if (!body.success) return badRequest(reply, body.error);

    const outcome = await feedFor(params.data.feed).edit(params.data.id, body.data.item);
    return sendOutcome(reply, outcome);
  });

  // Retract
  app.delete('/feeds/:feed/items/:id', async (req, reply) => {
    const params = itemParams.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);

    const outcome = await feedFor(params.data.feed).retract(params.data.id);
    return sendOutcome(reply, outcome);
  });

  app.get('/feeds/:feed/ids', async (req, reply) => {
    const params = feedParams.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);

    const ids = await feedFor(params.data.feed).getIds();
    return reply.send({ ids });
  });

  app.get('/feeds/:feed/items/:id', async (req, reply) => {
    const params = itemParams.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);

    const item = await feedFor(params.data.feed).getItem(params.data.id);
    if (item === null) return reply.code(404).send({ error: 'not_found', id: params.data.id });
    return reply.send({ id: params.data.id, item });
  });

  app.get('/feeds/:feed/items', async (req, reply) => {
    const params = feedParams.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);

    const items = await feedFor(params.data.feed).getItems();
    return reply.send({ items: Object.fromEntries(items) });
  });
}
