import type { FeedName } from '../types';

export interface FeedKeys {
  ids: string;        // list: the feed's order
  items: string;      // hash: id -> content
  publishes: string;  // counter of publish-class events
  idIncr: string;     // id allocator
  publishChannel: string;
  retractChannel: string;
}

export function feedKeys(feed: FeedName): FeedKeys {
  return {
    ids: `feed.ids:${feed}`,
    items: `feed.items:${feed}`,
    publishes: `feed.publishes:${feed}`,
    idIncr: `feed.idincr:${feed}`,
    publishChannel: `feed.publish:${feed}`,
    retractChannel: `feed.retract:${feed}`,
  };
}

/** Every key and channel a sorted feed owns. */
export function getSchemas(feed: FeedName): Set<string> {
  return new Set(Object.values(feedKeys(feed)));
}
