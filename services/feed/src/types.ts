export type FeedName = string;
export type FeedId = number;   // allocated from the feed's id counter, never reused

export type InsertPosition = 'BEFORE' | 'AFTER';

/**
 * Change events broadcast after a committed mutation.
 * Edits are reported as `publish` with the existing id; the shape is the same as a fresh publish.
 */
export type FeedEvent =
  | { type: 'publish'; feed: FeedName; id: FeedId; content: string }
  | { type: 'retract'; feed: FeedName; id: FeedId };

export type PublishOutcome =
  | { status: 'published'; id: FeedId }
  | { status: 'not_found'; id: FeedId; discardedId: FeedId }
  | { status: 'contention_exhausted'; attempts: number };

export type EditOutcome =
  | { status: 'edited'; id: FeedId }
  | { status: 'not_found'; id: FeedId }
  | { status: 'contention_exhausted'; attempts: number };

export type RetractOutcome =
  | { status: 'retracted'; id: FeedId }
  | { status: 'not_found'; id: FeedId }
  | { status: 'contention_exhausted'; attempts: number };
