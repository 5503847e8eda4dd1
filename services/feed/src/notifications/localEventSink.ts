import { EventEmitter } from 'node:events';
import type { NotificationSink } from '../contracts/notificationSink';
import type { FeedEvent } from '../types';

type Listener = (event: FeedEvent) => void;

/** In-process fan-out, e.g. for tests or a single-node deployment. */
export class LocalEventSink implements NotificationSink {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  async emit(event: FeedEvent): Promise<void> {
    this.emitter.emit(event.type, event);
  }

  /** Returns an unsubscribe function. */
  on(type: FeedEvent['type'], listener: Listener): () => void {
    this.emitter.on(type, listener);
    return () => {
      this.emitter.off(type, listener);
    };
  }
}

/** Forwards every event to each sink in order; the first failure rejects. */
export class FanoutSink implements NotificationSink {
  constructor(private readonly sinks: NotificationSink[]) {}

  async emit(event: FeedEvent): Promise<void> {
    for (const sink of this.sinks) {
      await sink.emit(event);
    }
  }
}
