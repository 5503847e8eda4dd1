import type { AttemptResult, FeedOp, FeedStore } from '../contracts/feedStore';
import type { FeedId, FeedName } from '../types';

interface FeedState {
  ids: FeedId[];
  items: Map<FeedId, string>;
  publishes: number;
  idIncr: number;
  // bumped on every write to `items`; plays the role of a WATCHed key
  itemsVersion: number;
}

// Every store call yields once, like a round trip to a server would.
const roundTrip = () => Promise.resolve();

/**
 * In-process `FeedStore` with the same compare-and-swap contract as the Redis backend.
 * A conditional commit is rejected when the item map changed between watch and commit.
 */
export class InMemoryFeedStore implements FeedStore {
  private readonly feeds = new Map<FeedName, FeedState>();

  async nextId(feed: FeedName): Promise<FeedId> {
    await roundTrip();
    const state = this.state(feed);
    state.idIncr += 1;
    return state.idIncr;
  }

  async commit(feed: FeedName, ops: FeedOp[]): Promise<void> {
    await roundTrip();
    this.apply(this.state(feed), ops);
  }

  async commitIfExists(feed: FeedName, watchedId: FeedId, ops: FeedOp[]): Promise<AttemptResult> {
    const state = this.state(feed);
    const watched = state.itemsVersion;

    await roundTrip();
    if (!state.items.has(watchedId)) return 'missing';

    await roundTrip();
    if (state.itemsVersion !== watched) return 'conflict';
    this.apply(state, ops);
    return 'committed';
  }

  async getIds(feed: FeedName): Promise<FeedId[]> {
    await roundTrip();
    return [...this.state(feed).ids];
  }

  async getItem(feed: FeedName, id: FeedId): Promise<string | null> {
    await roundTrip();
    return this.state(feed).items.get(id) ?? null;
  }

  async getItems(feed: FeedName): Promise<Map<FeedId, string>> {
    await roundTrip();
    return new Map(this.state(feed).items);
  }

  async getPublishCount(feed: FeedName): Promise<number> {
    await roundTrip();
    return this.state(feed).publishes;
  }

  async ping(): Promise<void> {
    await roundTrip();
  }

  private state(feed: FeedName): FeedState {
    let state = this.feeds.get(feed);
    if (!state) {
      state = { ids: [], items: new Map(), publishes: 0, idIncr: 0, itemsVersion: 0 };
      this.feeds.set(feed, state);
    }
    return state;
  }

  private apply(state: FeedState, ops: FeedOp[]): void {
    for (const op of ops) {
      switch (op.op) {
        case 'push_tail':
          state.ids.push(op.id);
          break;
        case 'push_head':
          state.ids.unshift(op.id);
          break;
        case 'insert_relative': {
          const at = state.ids.indexOf(op.anchorId);
          if (at === -1) break; // same as LINSERT with a missing pivot
          state.ids.splice(op.position === 'BEFORE' ? at : at + 1, 0, op.id);
          break;
        }
        case 'remove_id': {
          const at = state.ids.indexOf(op.id);
          if (at !== -1) state.ids.splice(at, 1);
          break;
        }
        case 'put_item':
          state.items.set(op.id, op.content);
          state.itemsVersion += 1;
          break;
        case 'delete_item':
          if (state.items.delete(op.id)) state.itemsVersion += 1;
          break;
        case 'incr_publishes':
          state.publishes += 1;
          break;
      }
    }
  }
}
