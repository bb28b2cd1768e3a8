import { setTimeout as sleep } from 'timers/promises';
import { EventBus, Events } from '../events/eventBus';
import { apiErrorCounter, orderPollLatency } from '../telemetry/metrics';
import { formatError } from '../utils/formatError';
import { logger } from '../utils/logger';
import { InvalidOrderStatusError } from './errors';
import type { OrderExecutionStrategy } from './execution/types';
import { describeOrder, type Order } from './order';
import type { OrderBook } from './orderBook';

export interface OrderStatusTrackerOptions {
  pair: string;
  pollingIntervalMs?: number;
}

export const DEFAULT_POLLING_INTERVAL_MS = 15_000;

/**
 * Polls the exchange for every locally open order and turns remote status changes
 * into ORDER_COMPLETED / ORDER_CANCELLED events.
 */
export class OrderStatusTracker {
  readonly pollingIntervalMs: number;
  private readonly pair: string;
  private loop: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(
    private readonly orderBook: OrderBook,
    private readonly executionStrategy: OrderExecutionStrategy,
    private readonly eventBus: EventBus,
    options: OrderStatusTrackerOptions
  ) {
    this.pair = options.pair;
    this.pollingIntervalMs = options.pollingIntervalMs ?? DEFAULT_POLLING_INTERVAL_MS;
  }

  get isTracking() {
    return this.loop !== null;
  }

  startTracking() {
    if (this.loop) {
      logger.warn('order_tracking_already_running', { event: 'order_tracking_already_running' });
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.trackOpenOrders(controller.signal);
    logger.info('order_tracking_started', { event: 'order_tracking_started', pollingIntervalMs: this.pollingIntervalMs });
  }

  /** Cancels the loop and waits for it and any per-order query still running. */
  async stopTracking() {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort();
    await loop;
    await Promise.allSettled([...this.inFlight]);
    this.loop = null;
    this.controller = null;
    logger.info('order_tracking_stopped', { event: 'order_tracking_stopped' });
  }

  /** One reconciliation pass: remote queries run concurrently, results apply in order. */
  async processOpenOrders() {
    const openOrders = this.orderBook.getOpenOrders();
    if (openOrders.length === 0) return;
    const started = Date.now();

    const queries = openOrders.map((order) => this.track(this.executionStrategy.getOrder(order.identifier, this.pair)));
    const results = await Promise.allSettled(queries);

    results.forEach((result, index) => {
      const local = openOrders[index];
      if (result.status === 'rejected') {
        apiErrorCounter.labels('fetch_order').inc();
        logger.error('order_status_query_failed', {
          event: 'order_status_query_failed',
          orderId: local.identifier,
          error: formatError(result.reason),
        });
        return;
      }
      try {
        this.handleStatusChange(local, result.value);
      } catch (error) {
        logger.error('order_status_invalid', {
          event: 'order_status_invalid',
          orderId: local.identifier,
          error: formatError(error),
        });
      }
    });
    orderPollLatency.observe(Date.now() - started);
  }

  private async trackOpenOrders(signal: AbortSignal) {
    while (!signal.aborted) {
      try {
        await this.processOpenOrders();
      } catch (error) {
        logger.error('order_tracking_cycle_failed', { event: 'order_tracking_cycle_failed', error: formatError(error) });
      }
      try {
        await sleep(this.pollingIntervalMs, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) throw error;
      }
    }
  }

  private track<T>(query: Promise<T>): Promise<T> {
    this.inFlight.add(query);
    void query.then(
      () => this.inFlight.delete(query),
      () => this.inFlight.delete(query)
    );
    return query;
  }

  private handleStatusChange(local: Order, remote: Order) {
    switch (remote.status) {
      case 'unknown':
        throw new InvalidOrderStatusError(`Missing order status for ${local.identifier}`, {
          orderId: local.identifier,
          remote: remote.info,
        });
      case 'closed': {
        const updated = this.orderBook.updateOrderStatus(local.identifier, this.toUpdate(remote));
        if (!updated) return;
        logger.info('order_filled', { event: 'order_filled', order: describeOrder(updated) });
        this.eventBus.publishSync(Events.ORDER_COMPLETED, updated);
        return;
      }
      case 'canceled': {
        const updated = this.orderBook.updateOrderStatus(local.identifier, this.toUpdate(remote));
        if (!updated) return;
        logger.warn('order_cancelled', { event: 'order_cancelled', order: describeOrder(updated) });
        this.eventBus.publishSync(Events.ORDER_CANCELLED, updated);
        return;
      }
      case 'open':
        if (remote.filled > 0) {
          logger.info('order_partially_filled', {
            event: 'order_partially_filled',
            orderId: local.identifier,
            filled: remote.filled,
            remaining: remote.remaining,
          });
        } else {
          logger.debug('order_still_open', { event: 'order_still_open', orderId: local.identifier });
        }
        return;
      default:
        logger.warn('order_status_unhandled', {
          event: 'order_status_unhandled',
          orderId: local.identifier,
          status: remote.status,
        });
    }
  }

  private toUpdate(remote: Order) {
    return {
      status: remote.status,
      filled: remote.filled,
      remaining: remote.remaining,
      average: remote.average,
      price: remote.price,
      fee: remote.fee,
      lastTradeTimestamp: remote.lastTradeTimestamp,
    };
  }
}
