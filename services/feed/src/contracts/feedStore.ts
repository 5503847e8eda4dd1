import type { FeedId, FeedName, InsertPosition } from '../types';

/**
 * One write queued inside a feed transaction.
 * Order ops touch the id sequence, item ops the id -> content map.
 */
export type FeedOp =
  | { op: 'push_tail'; id: FeedId }
  | { op: 'push_head'; id: FeedId }
  | { op: 'insert_relative'; id: FeedId; anchorId: FeedId; position: InsertPosition }
  | { op: 'remove_id'; id: FeedId }
  | { op: 'put_item'; id: FeedId; content: string }
  | { op: 'delete_item'; id: FeedId }
  | { op: 'incr_publishes' };

/** Result of a single conditional commit attempt. */
export type AttemptResult = 'committed' | 'missing' | 'conflict';

/**
 * Storage backend behind a sorted feed.
 *
 * `commit` applies the ops as one all-or-nothing transaction.
 * `commitIfExists` watches the feed's item map, checks that `watchedId` is present,
 * and applies the ops only if no other writer touched the item map since the watch began.
 * It never retries: the caller owns the compare-and-swap loop.
 */
export interface FeedStore {
  nextId(feed: FeedName): Promise<FeedId>;
  commit(feed: FeedName, ops: FeedOp[]): Promise<void>;
  commitIfExists(feed: FeedName, watchedId: FeedId, ops: FeedOp[]): Promise<AttemptResult>;
  getIds(feed: FeedName): Promise<FeedId[]>;
  getItem(feed: FeedName, id: FeedId): Promise<string | null>;
  getItems(feed: FeedName): Promise<Map<FeedId, string>>;
  getPublishCount(feed: FeedName): Promise<number>;
  ping(): Promise<void>;
}

export class FeedStoreError extends Error {
  constructor(message: string, readonly command?: string) {
    super(message);
    this.name = 'FeedStoreError';
  }
}
