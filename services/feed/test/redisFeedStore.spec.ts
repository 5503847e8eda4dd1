import type Redis from 'ioredis';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import pino from 'pino';
import { FeedStoreError } from '../src/contracts/feedStore';
import { SortedFeed } from '../src/feed/sortedFeed';
import { redisOptions } from '../src/redis/client';
import { RedisFeedStore } from '../src/storage/redisFeedStore';

type Reply = [Error | null, unknown];
type ExecFn = (commands: unknown[][]) => Reply[] | null;

const allOk: ExecFn = (commands) => commands.map((): Reply => [null, 1]);

// Records queued commands the way an ioredis MULTI would.
class FakeMulti {
  readonly commands: unknown[][] = [];

  constructor(private readonly onExec: ExecFn) {}

  private queue(...cmd: unknown[]) {
    this.commands.push(cmd);
    return this;
  }

  rpush(...args: unknown[]) { return this.queue('rpush', ...args); }
  lpush(...args: unknown[]) { return this.queue('lpush', ...args); }
  linsert(...args: unknown[]) { return this.queue('linsert', ...args); }
  lrem(...args: unknown[]) { return this.queue('lrem', ...args); }
  hset(...args: unknown[]) { return this.queue('hset', ...args); }
  hdel(...args: unknown[]) { return this.queue('hdel', ...args); }
  incr(...args: unknown[]) { return this.queue('incr', ...args); }

  async exec() {
    return this.onExec(this.commands);
  }
}

class FakeConnection {
  exists = 1;
  onExec: ExecFn = allOk;
  readonly multis: FakeMulti[] = [];
  watch = vi.fn(async (..._keys: string[]) => 'OK');
  unwatch = vi.fn(async () => 'OK');
  hexists = vi.fn(async (_key: string, _field: string) => this.exists);
  quit = vi.fn(async () => 'OK');
  disconnect = vi.fn();

  multi() {
    const m = new FakeMulti(this.onExec);
    this.multis.push(m);
    return m;
  }
}

class FakeRedis extends FakeConnection {
  readonly duplicates: FakeConnection[] = [];
  nextDuplicate?: FakeConnection;
  incrValue = 0;
  incr = vi.fn(async (_key: string) => ++this.incrValue);
  lrange = vi.fn(async () => ['3', '1', '2']);
  hget = vi.fn(async (_key: string, field: string) => (field === '1' ? 'a' : null));
  hgetall = vi.fn(async () => ({ '1': 'a', '2': 'b' }));
  get = vi.fn(async (): Promise<string | null> => null);
  ping = vi.fn(async () => 'PONG');

  duplicate() {
    const conn = this.nextDuplicate ?? new FakeConnection();
    this.nextDuplicate = undefined;
    this.duplicates.push(conn);
    return conn;
  }
}

describe('RedisFeedStore', () => {
  let redis: FakeRedis;
  let store: RedisFeedStore;

  beforeEach(() => {
    redis = new FakeRedis();
    store = new RedisFeedStore(redis as unknown as Redis, 1);
  });

  it('allocates ids from the feed id counter', async () => {
    expect(await store.nextId('news')).toBe(1);
    expect(await store.nextId('news')).toBe(2);
    expect(redis.incr).toHaveBeenCalledWith('feed.idincr:news');
  });

  it('queues an unconditional write as one MULTI', async () => {
    await store.commit('news', [
      { op: 'push_head', id: 4 },
      { op: 'incr_publishes' },
      { op: 'put_item', id: 4, content: 'hello' },
    ]);

    expect(redis.multis).toHaveLength(1);
    expect(redis.multis[0]?.commands).toEqual([
      ['lpush', 'feed.ids:news', '4'],
      ['incr', 'feed.publishes:news'],
      ['hset', 'feed.items:news', '4', 'hello'],
    ]);
  });

  it('raises a FeedStoreError naming the command that failed inside EXEC', async () => {
    redis.onExec = (commands) => commands.map((_, i): Reply => (i === 1 ? [new Error('WRONGTYPE'), null] : [null, 1]));

    const err = await store
      .commit('news', [
        { op: 'push_tail', id: 1 },
        { op: 'put_item', id: 1, content: 'x' },
      ])
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FeedStoreError);
    if (!(err instanceof FeedStoreError)) return;
    expect(err.command).toBe('put_item');
    expect(err.message).toBe('feed transaction failed at put_item: WRONGTYPE');
  });

  it('watches the item hash and commits the relative insert on a dedicated connection', async () => {
    const result = await store.commitIfExists('news', 1, [
      { op: 'insert_relative', id: 2, anchorId: 1, position: 'AFTER' },
      { op: 'put_item', id: 2, content: 'b' },
    ]);

    const conn = redis.duplicates[0];
    expect(result).toBe('committed');
    expect(conn?.watch).toHaveBeenCalledWith('feed.items:news');
    expect(conn?.hexists).toHaveBeenCalledWith('feed.items:news', '1');
    expect(conn?.multis[0]?.commands).toEqual([
      ['linsert', 'feed.ids:news', 'AFTER', '1', '2'],
      ['hset', 'feed.items:news', '2', 'b'],
    ]);
    expect(redis.multis).toHaveLength(0);
  });

  it('maps retract ops to LREM and HDEL', async () => {
    await store.commitIfExists('news', 3, [
      { op: 'remove_id', id: 3 },
      { op: 'delete_item', id: 3 },
    ]);

    expect(redis.duplicates[0]?.multis[0]?.commands).toEqual([
      ['lrem', 'feed.ids:news', 1, '3'],
      ['hdel', 'feed.items:news', '3'],
    ]);
  });

  it('unwatches and skips the transaction when the watched id is missing', async () => {
    const conn = new FakeConnection();
    conn.exists = 0;
    redis.nextDuplicate = conn;

    const result = await store.commitIfExists('news', 9, [{ op: 'incr_publishes' }]);

    expect(result).toBe('missing');
    expect(conn.unwatch).toHaveBeenCalledTimes(1);
    expect(conn.multis).toHaveLength(0);
  });

  it('reports a conflict when EXEC is aborted by the watch', async () => {
    const conn = new FakeConnection();
    conn.onExec = () => null;
    redis.nextDuplicate = conn;

    expect(await store.commitIfExists('news', 1, [{ op: 'incr_publishes' }])).toBe('conflict');
  });

  it('reuses pooled connections between attempts', async () => {
    await store.commitIfExists('news', 1, [{ op: 'incr_publishes' }]);
    await store.commitIfExists('news', 1, [{ op: 'incr_publishes' }]);

    expect(redis.duplicates).toHaveLength(1);

    await store.close();
    expect(redis.duplicates[0]?.quit).toHaveBeenCalledTimes(1);
  });

  it('drops a connection that failed mid-attempt and propagates the error', async () => {
    const conn = new FakeConnection();
    conn.hexists.mockRejectedValueOnce(new Error('socket closed'));
    redis.nextDuplicate = conn;

    await expect(store.commitIfExists('news', 1, [{ op: 'incr_publishes' }])).rejects.toThrow('socket closed');
    expect(conn.disconnect).toHaveBeenCalledTimes(1);

    await store.commitIfExists('news', 1, [{ op: 'incr_publishes' }]);
    expect(redis.duplicates).toHaveLength(2);
  });

  it('reads ids, items and counters', async () => {
    redis.get.mockResolvedValueOnce('7');

    expect(await store.getIds('news')).toEqual([3, 1, 2]);
    expect(await store.getItem('news', 1)).toBe('a');
    expect(await store.getItem('news', 5)).toBeNull();
    expect(await store.getItems('news')).toEqual(
      new Map([
        [1, 'a'],
        [2, 'b'],
      ]),
    );
    expect(await store.getPublishCount('news')).toBe(7);
    expect(await store.getPublishCount('news')).toBe(0);
    expect(redis.lrange).toHaveBeenCalledWith('feed.ids:news', 0, -1);
  });
});

describe('redis client options', () => {
  it('bounds per-command retries so an unreachable server rejects commands', () => {
    expect(redisOptions.maxRetriesPerRequest).toBe(1);
    expect(redisOptions.enableOfflineQueue).not.toBe(false);
  });
});

describe('RedisFeedStore when Redis is unreachable', () => {
  const offline = () =>
    new Error('Reached the max retries per request limit (which is 1). Refer to "maxRetriesPerRequest" option for details.');
  let redis: FakeRedis;
  let feed: SortedFeed;

  beforeEach(() => {
    redis = new FakeRedis();
    const store = new RedisFeedStore(redis as unknown as Redis, 1);
    feed = new SortedFeed(store, 'news', { retry: { baseDelayMs: 0 }, logger: pino({ level: 'silent' }) });
  });

  it('rejects publish when the id counter cannot be reached', async () => {
    redis.incr.mockRejectedValueOnce(offline());

    await expect(feed.publish('a')).rejects.toThrow('Reached the max retries per request limit');
    expect(redis.multis).toHaveLength(0);
  });

  it('rejects edit when WATCH fails and drops the leased connection', async () => {
    const conn = new FakeConnection();
    conn.watch.mockRejectedValueOnce(offline());
    redis.nextDuplicate = conn;

    await expect(feed.edit(1, 'A')).rejects.toThrow('Reached the max retries per request limit');
    expect(conn.disconnect).toHaveBeenCalledTimes(1);
    expect(conn.multis).toHaveLength(0);
  });

  it('rejects reads', async () => {
    redis.lrange.mockRejectedValueOnce(offline());

    await expect(feed.getIds()).rejects.toThrow('Reached the max retries per request limit');
  });
});
