import { asyncHandler, EventBus, Events } from '../events/eventBus';
import { describeOrder, type Order } from '../orders/order';
import { isLiveLike, type TradingMode } from '../strategies/types';
import { formatError } from '../utils/formatError';
import { logger } from '../utils/logger';
import { WorkerPool } from '../utils/workerPool';
import { renderNotification, type NotificationFields, type NotificationKind } from './notificationTypes';
import type { NotificationChannel } from './telegram';

export interface NotificationHandlerOptions {
  channels: NotificationChannel[];
  tradingMode: TradingMode;
  pool: WorkerPool;
  timeoutMs: number;
}

/**
 * Fire-and-forget delivery of operator notifications. Only active for paper and
 * live trading with at least one channel; delivery runs on the injected pool.
 */
export class NotificationHandler {
  readonly enabled: boolean;
  private readonly channels: NotificationChannel[];
  private readonly pool: WorkerPool;
  private readonly timeoutMs: number;

  constructor(eventBus: EventBus, options: NotificationHandlerOptions) {
    this.channels = options.channels;
    this.pool = options.pool;
    this.timeoutMs = options.timeoutMs;
    this.enabled = this.channels.length > 0 && isLiveLike(options.tradingMode);
    if (this.enabled) {
      eventBus.subscribe(Events.ORDER_COMPLETED, asyncHandler((order) => this.onOrderCompleted(order)));
    }
  }

  async sendNotification(kind: NotificationKind, fields: NotificationFields = {}): Promise<void> {
    if (!this.enabled) return;
    const { title, message, missing } = renderNotification(kind, fields);
    if (missing.length > 0) {
      logger.warn('notification_placeholders_missing', {
        event: 'notification_placeholders_missing',
        kind,
        missing,
      });
    }
    await Promise.all(this.channels.map((channel) => channel.send(title, message)));
  }

  /** Never rejects; failures and timeouts are logged. */
  async asyncSendNotification(kind: NotificationKind, fields: NotificationFields = {}): Promise<void> {
    if (!this.enabled) return;
    try {
      await this.pool.runWithTimeout(() => this.sendNotification(kind, fields), this.timeoutMs);
    } catch (error) {
      logger.error('notification_failed', {
        event: 'notification_failed',
        kind,
        error: formatError(error),
      });
    }
  }

  private async onOrderCompleted(order: Order) {
    await this.asyncSendNotification('ORDER_COMPLETED', { order_details: describeOrder(order) });
  }
}
