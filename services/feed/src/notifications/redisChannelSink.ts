import type Redis from 'ioredis';
import type { NotificationSink } from '../contracts/notificationSink';
import { feedKeys } from '../redis/keys';
import type { FeedEvent } from '../types';
import { encodePublishMessage, encodeRetractMessage } from './codec';

/**
 * Broadcasts on the feed's pub/sub channels. Subscribers that are not connected miss the event.
 *
 * PUBLISH goes out on the shared client after the commit, and conditional commits run on
 * pooled connections, so two writers racing on the same id may be heard in the opposite
 * order to their commits. A subscriber that needs the latest content re-reads the item.
 */
export class RedisChannelSink implements NotificationSink {
  constructor(private readonly redis: Redis) {}

  async emit(event: FeedEvent): Promise<void> {
    const keys = feedKeys(event.feed);
    if (event.type === 'publish') {
      await this.redis.publish(keys.publishChannel, encodePublishMessage(event.id, event.content));
    } else {
      await this.redis.publish(keys.retractChannel, encodeRetractMessage(event.id));
    }
  }
}
