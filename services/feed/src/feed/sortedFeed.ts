import type { FeedOp, FeedStore } from '../contracts/feedStore';
import type { NotificationSink } from '../contracts/notificationSink';
import { childLogger, type FeedLogger } from '../logger';
import { getSchemas } from '../redis/keys';
import type {
  EditOutcome,
  FeedEvent,
  FeedId,
  FeedName,
  InsertPosition,
  PublishOutcome,
  RetractOutcome,
} from '../types';
import { compareAndSwap, resolveRetryPolicy, type RetryPolicy } from './retry';

export interface SortedFeedOptions {
  sink?: NotificationSink;
  retry?: Partial<RetryPolicy>;
  logger?: FeedLogger;
}

/**
 * A manually ordered feed: items keep the position they were given
 * (tail, head, or next to an existing item) rather than a sort key.
 *
 * Several handles may point at the same feed, in this process or others;
 * all coordination goes through the store's conditional commit.
 * Creating a handle does not create anything in the store.
 */
export class SortedFeed {
  private readonly sink?: NotificationSink;
  private readonly retry: RetryPolicy;
  private readonly log: FeedLogger;

  constructor(
    private readonly store: FeedStore,
    readonly name: FeedName,
    options: SortedFeedOptions = {},
  ) {
    this.sink = options.sink;
    this.retry = resolveRetryPolicy(options.retry);
    this.log = (options.logger ?? childLogger('sorted-feed')).child({ feed: name });
  }

  /** Adds an item to the end of the feed. */
  async publish(content: string): Promise<FeedId> {
    return this.publishAt('push_tail', content);
  }

  /** Same as `publish`. */
  async append(content: string): Promise<FeedId> {
    return this.publish(content);
  }

  /** Adds an item to the beginning of the feed. */
  async prepend(content: string): Promise<FeedId> {
    return this.publishAt('push_head', content);
  }

  async publishBefore(anchorId: FeedId, content: string): Promise<PublishOutcome> {
    return this.insert(anchorId, 'BEFORE', content);
  }

  async publishAfter(anchorId: FeedId, content: string): Promise<PublishOutcome> {
    return this.insert(anchorId, 'AFTER', content);
  }

  /** Replaces an existing item's content in place. Subscribers see it as a publish of the same id. */
  async edit(id: FeedId, content: string): Promise<EditOutcome> {
    const loop = await compareAndSwap(
      this.retry,
      () =>
        this.store.commitIfExists(this.name, id, [
          { op: 'put_item', id, content },
          { op: 'incr_publishes' },
        ]),
      (attempts, delayMs) => this.log.debug({ id, attempts, delayMs }, 'edit conflicted, retrying'),
    );

    switch (loop.result) {
      case 'committed':
        await this.notify({ type: 'publish', feed: this.name, id, content });
        return { status: 'edited', id };
      case 'missing':
        return { status: 'not_found', id };
      case 'exhausted':
        this.log.warn({ id, attempts: loop.attempts }, 'edit gave up under contention');
        return { status: 'contention_exhausted', attempts: loop.attempts };
    }
  }

  async retract(id: FeedId): Promise<RetractOutcome> {
    const loop = await compareAndSwap(
      this.retry,
      () =>
        this.store.commitIfExists(this.name, id, [
          { op: 'remove_id', id },
          { op: 'delete_item', id },
        ]),
      (attempts, delayMs) => this.log.debug({ id, attempts, delayMs }, 'retract conflicted, retrying'),
    );

    switch (loop.result) {
      case 'committed':
        await this.notify({ type: 'retract', feed: this.name, id });
        return { status: 'retracted', id };
      case 'missing':
        return { status: 'not_found', id };
      case 'exhausted':
        this.log.warn({ id, attempts: loop.attempts }, 'retract gave up under contention');
        return { status: 'contention_exhausted', attempts: loop.attempts };
    }
  }

  /** Point-in-time order; not consistent with a later `getItem`. */
  async getIds(): Promise<FeedId[]> {
    return this.store.getIds(this.name);
  }

  async getItem(id: FeedId): Promise<string | null> {
    return this.store.getItem(this.name, id);
  }

  async getItems(): Promise<Map<FeedId, string>> {
    return this.store.getItems(this.name);
  }

  async getPublishCount(): Promise<number> {
    return this.store.getPublishCount(this.name);
  }

  getSchemas(): Set<string> {
    return getSchemas(this.name);
  }

  private async publishAt(op: 'push_tail' | 'push_head', content: string): Promise<FeedId> {
    const id = await this.store.nextId(this.name);
    const ops: FeedOp[] = [{ op, id }, { op: 'incr_publishes' }, { op: 'put_item', id, content }];
    await this.store.commit(this.name, ops);
    await this.notify({ type: 'publish', feed: this.name, id, content });
    return id;
  }

  private async insert(anchorId: FeedId, position: InsertPosition, content: string): Promise<PublishOutcome> {
    // Allocated before the anchor check: a failed insert leaves a gap, the counter never goes back.
    const id = await this.store.nextId(this.name);

    const loop = await compareAndSwap(
      this.retry,
      () =>
        this.store.commitIfExists(this.name, anchorId, [
          { op: 'insert_relative', id, anchorId, position },
          { op: 'put_item', id, content },
        ]),
      (attempts, delayMs) =>
        this.log.debug({ id, anchorId, position, attempts, delayMs }, 'insert conflicted, retrying'),
    );

    switch (loop.result) {
      case 'committed':
        await this.notify({ type: 'publish', feed: this.name, id, content });
        return { status: 'published', id };
      case 'missing':
        this.log.debug({ anchorId, discardedId: id }, 'anchor not found, id discarded');
        return { status: 'not_found', id: anchorId, discardedId: id };
      case 'exhausted':
        this.log.warn({ id, anchorId, attempts: loop.attempts }, 'insert gave up under contention');
        return { status: 'contention_exhausted', attempts: loop.attempts };
    }
  }

  // The mutation is already committed; a failed broadcast is logged, not rolled back.
  private async notify(event: FeedEvent): Promise<void> {
    if (!this.sink) return;
    try {
      await this.sink.emit(event);
    } catch (err) {
      this.log.error({ err, event }, 'failed to emit feed event');
    }
  }
}
