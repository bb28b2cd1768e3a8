import type { Order } from '../orders/order';
import { logger } from '../utils/logger';
import { formatError } from '../utils/formatError';

export const Events = {
  ORDER_COMPLETED: 'order_completed',
  ORDER_CANCELLED: 'order_cancelled',
  START_BOT: 'start_bot',
  STOP_BOT: 'stop_bot',
} as const;

export type EventType = (typeof Events)[keyof typeof Events];

export interface EventPayloads {
  order_completed: Order;
  order_cancelled: Order;
  start_bot: string;
  stop_bot: string;
}

export type SyncCallback<E extends EventType> = (data: EventPayloads[E]) => void;
export type AsyncCallback<E extends EventType> = (data: EventPayloads[E]) => Promise<void>;

export type EventHandler<E extends EventType> =
  | { kind: 'sync'; callback: SyncCallback<E> }
  | { kind: 'async'; callback: AsyncCallback<E> };

export function syncHandler<E extends EventType>(callback: SyncCallback<E>): EventHandler<E> {
  return { kind: 'sync', callback };
}

export function asyncHandler<E extends EventType>(callback: AsyncCallback<E>): EventHandler<E> {
  return { kind: 'async', callback };
}

type SubscriberMap = { readonly [E in EventType]: EventHandler<E>[] };

function emptySubscribers(): SubscriberMap {
  return { order_completed: [], order_cancelled: [], start_bot: [], stop_bot: [] };
}

/**
 * In-process pub/sub for order and bot lifecycle events. A failing subscriber is
 * logged and never affects the publisher or the other subscribers.
 */
export class EventBus {
  // one list per event, mutated in place
  private readonly subscribers: SubscriberMap = emptySubscribers();
  private readonly scheduled = new Set<Promise<void>>();

  subscribe<E extends EventType>(eventType: E, handler: EventHandler<E>): void {
    const list: EventHandler<E>[] = this.subscribers[eventType];
    list.push(handler);
    logger.debug('event_bus_subscribed', { event: 'event_bus_subscribed', eventType, kind: handler.kind });
  }

  unsubscribe<E extends EventType>(eventType: E, callback: SyncCallback<E> | AsyncCallback<E>): void {
    const list: EventHandler<E>[] = this.subscribers[eventType];
    const index = list.findIndex((handler) => handler.callback === callback);
    if (index === -1) {
      logger.warn('event_bus_unsubscribe_missing', { event: 'event_bus_unsubscribe_missing', eventType });
      return;
    }
    list.splice(index, 1);
    logger.debug('event_bus_unsubscribed', { event: 'event_bus_unsubscribed', eventType });
  }

  clear(eventType?: EventType): void {
    if (eventType) {
      this.subscribers[eventType].length = 0;
      return;
    }
    for (const list of Object.values(this.subscribers)) {
      list.length = 0;
    }
  }

  subscriberCount(eventType: EventType): number {
    return this.subscribers[eventType].length;
  }

  /** Resolves once every subscriber has finished. */
  async publish<E extends EventType>(eventType: E, data: EventPayloads[E]): Promise<void> {
    const handlers = this.getSubscribers(eventType);
    if (handlers.length === 0) return;
    logger.debug('event_bus_publish', { event: 'event_bus_publish', eventType, subscribers: handlers.length });
    await Promise.all(
      handlers.map((handler) =>
        handler.kind === 'async'
          ? this.invokeAsync(eventType, handler.callback, data)
          : this.invokeDeferred(eventType, handler.callback, data)
      )
    );
  }

  /**
   * For callers that cannot await: sync subscribers run inline, async ones are
   * scheduled and tracked until `drain()`.
   */
  publishSync<E extends EventType>(eventType: E, data: EventPayloads[E]): void {
    const handlers = this.getSubscribers(eventType);
    if (handlers.length === 0) return;
    logger.debug('event_bus_publish_sync', { event: 'event_bus_publish_sync', eventType, subscribers: handlers.length });
    for (const handler of handlers) {
      if (handler.kind === 'sync') {
        this.invokeSync(eventType, handler.callback, data);
        continue;
      }
      const task = this.invokeAsync(eventType, handler.callback, data);
      this.scheduled.add(task);
      void task.finally(() => this.scheduled.delete(task));
    }
  }

  get pendingCount(): number {
    return this.scheduled.size;
  }

  /** Waits for every async subscriber scheduled by `publishSync`, including ones scheduled meanwhile. */
  async drain(): Promise<void> {
    while (this.scheduled.size > 0) {
      await Promise.all([...this.scheduled]);
    }
  }

  private getSubscribers<E extends EventType>(eventType: E): EventHandler<E>[] {
    const list: EventHandler<E>[] = this.subscribers[eventType];
    return [...list];
  }

  private async invokeAsync<E extends EventType>(eventType: E, callback: AsyncCallback<E>, data: EventPayloads[E]) {
    try {
      await callback(data);
    } catch (error) {
      logger.error('event_subscriber_failed', {
        event: 'event_subscriber_failed',
        eventType,
        kind: 'async',
        error: formatError(error),
      });
    }
  }

  private invokeSync<E extends EventType>(eventType: E, callback: SyncCallback<E>, data: EventPayloads[E]) {
    try {
      callback(data);
    } catch (error) {
      logger.error('event_subscriber_failed', {
        event: 'event_subscriber_failed',
        eventType,
        kind: 'sync',
        error: formatError(error),
      });
    }
  }

  private invokeDeferred<E extends EventType>(eventType: E, callback: SyncCallback<E>, data: EventPayloads[E]) {
    return new Promise<void>((resolve) => {
      setImmediate(() => {
        this.invokeSync(eventType, callback, data);
        resolve();
      });
    });
  }
}
