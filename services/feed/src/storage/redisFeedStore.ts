import type Redis from 'ioredis';
import type { ChainableCommander } from 'ioredis';
import { feedKeys, type FeedKeys } from '../redis/keys';
import { FeedStoreError } from '../contracts/feedStore';
import type { AttemptResult, FeedOp, FeedStore } from '../contracts/feedStore';
import type { FeedId, FeedName } from '../types';

const DEFAULT_POOL_SIZE = 4;

function queueOp(multi: ChainableCommander, keys: FeedKeys, op: FeedOp): void {
  switch (op.op) {
    case 'push_tail':
      multi.rpush(keys.ids, String(op.id));
      return;
    case 'push_head':
      multi.lpush(keys.ids, String(op.id));
      return;
    case 'insert_relative':
      // LINSERT anchors on the first occurrence of the pivot
      if (op.position === 'BEFORE') {
        multi.linsert(keys.ids, 'BEFORE', String(op.anchorId), String(op.id));
      } else {
        multi.linsert(keys.ids, 'AFTER', String(op.anchorId), String(op.id));
      }
      return;
    case 'remove_id':
      multi.lrem(keys.ids, 1, String(op.id));
      return;
    case 'put_item':
      multi.hset(keys.items, String(op.id), op.content);
      return;
    case 'delete_item':
      multi.hdel(keys.items, String(op.id));
      return;
    case 'incr_publishes':
      multi.incr(keys.publishes);
      return;
  }
}

function assertReplies(replies: [Error | null, unknown][], ops: FeedOp[]): void {
  replies.forEach(([err], idx) => {
    if (err) {
      const command = ops[idx]?.op ?? 'unknown';
      throw new FeedStoreError(`feed transaction failed at ${command}: ${err.message}`, command);
    }
  });
}

/**
 * Implements `FeedStore` on Redis.
 * Conditional commits use WATCH/MULTI/EXEC, which is connection-scoped, so each attempt
 * runs on a dedicated connection leased from a small pool of duplicates.
 */
export class RedisFeedStore implements FeedStore {
  private readonly idle: Redis[] = [];

  constructor(
    private readonly redis: Redis,
    private readonly poolSize = DEFAULT_POOL_SIZE,
  ) {}

  async nextId(feed: FeedName): Promise<FeedId> {
    return this.redis.incr(feedKeys(feed).idIncr);
  }

  async commit(feed: FeedName, ops: FeedOp[]): Promise<void> {
    const keys = feedKeys(feed);
    const multi = this.redis.multi();
    for (const op of ops) queueOp(multi, keys, op);
    const replies = await multi.exec();
    if (!replies) {
      throw new FeedStoreError('feed transaction was discarded');
    }
    assertReplies(replies, ops);
  }

  async commitIfExists(feed: FeedName, watchedId: FeedId, ops: FeedOp[]): Promise<AttemptResult> {
    const keys = feedKeys(feed);
    const conn = this.acquire();
    let reusable = false;
    try {
      await conn.watch(keys.items);
      const exists = await conn.hexists(keys.items, String(watchedId));
      if (!exists) {
        await conn.unwatch();
        reusable = true;
        return 'missing';
      }

      const multi = conn.multi();
      for (const op of ops) queueOp(multi, keys, op);
      const replies = await multi.exec();
      // EXEC clears the watch whether or not it ran
      reusable = true;
      if (replies === null) return 'conflict';
      assertReplies(replies, ops);
      return 'committed';
    } finally {
      await this.release(conn, reusable);
    }
  }

  async getIds(feed: FeedName): Promise<FeedId[]> {
    const ids = await this.redis.lrange(feedKeys(feed).ids, 0, -1);
    return ids.map(Number);
  }

  async getItem(feed: FeedName, id: FeedId): Promise<string | null> {
    return this.redis.hget(feedKeys(feed).items, String(id));
  }

  async getItems(feed: FeedName): Promise<Map<FeedId, string>> {
    const hash = await this.redis.hgetall(feedKeys(feed).items);
    return new Map(Object.entries(hash).map(([id, content]) => [Number(id), content]));
  }

  async getPublishCount(feed: FeedName): Promise<number> {
    const raw = await this.redis.get(feedKeys(feed).publishes);
    return raw ? Number(raw) : 0;
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  /** Closes pooled transaction connections. The shared client stays with its owner. */
  async close(): Promise<void> {
    const conns = this.idle.splice(0);
    await Promise.all(conns.map((c) => c.quit()));
  }

  private acquire(): Redis {
    return this.idle.pop() ?? this.redis.duplicate();
  }

  private async release(conn: Redis, reusable: boolean): Promise<void> {
    if (!reusable) {
      // a connection that failed mid-attempt may still hold a WATCH
      conn.disconnect();
      return;
    }
    if (this.idle.length < this.poolSize) {
      this.idle.push(conn);
      return;
    }
    await conn.quit();
  }
}
