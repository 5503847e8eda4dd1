import type { FeedEvent } from '../types';

/** Transport for change events. Called once per committed mutation, never for aborted attempts. */
export interface NotificationSink {
  emit(event: FeedEvent): Promise<void>;
}
