import { setTimeout as sleep } from 'timers/promises';
import { DataFetchError, OrderCancellationError } from '../../exchanges/errors';
import type { ExchangeService } from '../../exchanges/types';
import { apiErrorCounter } from '../../telemetry/metrics';
import { errorMessage, formatError } from '../../utils/formatError';
import { logger } from '../../utils/logger';
import { retry } from '../../utils/retry';
import { OrderExecutionFailedError } from '../errors';
import { describeOrder, executionPrice, parseExchangeOrder, type Order, type OrderParseDefaults, type OrderSide } from '../order';
import type { OrderExecutionStrategy } from './types';

export interface LiveExecutionOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  /** Total price tolerance reached on the last retry, as a fraction (0.01 = 1%). */
  maxSlippage?: number;
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 1000;
const DEFAULT_MAX_SLIPPAGE = 0.01;

export class LiveOrderExecutionStrategy implements OrderExecutionStrategy {
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly maxSlippage: number;

  constructor(private readonly exchange: ExchangeService, options: LiveExecutionOptions = {}) {
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
    this.maxSlippage = options.maxSlippage ?? DEFAULT_MAX_SLIPPAGE;
  }

  /**
   * Places a market order, re-placing whatever stayed unfilled at a progressively
   * wider price until the exchange reports it closed or the attempts run out.
   * The returned order covers every attempt: `filled` is the total quantity and
   * `average` the volume-weighted price. When attempts run out after partial
   * fills, it comes back `canceled` with what did fill.
   */
  async executeMarketOrder(side: OrderSide, pair: string, quantity: number, price: number): Promise<Order> {
    const fills: ExecutionFills = { filled: 0, cost: 0 };
    let remaining = quantity;
    let attemptPrice = price;
    let lastPartial: Order | null = null;

    for (let attempt = 0; attempt < this.maxRetries; attempt += 1) {
      if (attempt > 0) {
        attemptPrice = this.adjustPrice(side, price, attempt);
      }
      try {
        const raw = await this.exchange.placeOrder(pair, 'market', side, remaining, attemptPrice);
        const order = await this.resolvePlacedOrder(raw, side, pair);

        if (order.status === 'closed') {
          recordFill(fills, order, order.filled > 0 ? order.filled : remaining);
          logger.info('market_order_filled', {
            event: 'market_order_filled',
            attempt: attempt + 1,
            order: describeOrder(order),
          });
          return combineFills(order, quantity, fills, 'closed');
        }

        if (order.status === 'open') {
          logger.warn('market_order_partially_filled', {
            event: 'market_order_partially_filled',
            attempt: attempt + 1,
            order: describeOrder(order),
          });
          const cancelled = await this.cancelPartialOrder(order, pair);
          const partial = cancelled && cancelled.filled > order.filled ? cancelled : order;
          recordFill(fills, partial, partial.filled);
          lastPartial = partial;
          remaining = Math.max(quantity - fills.filled, 0);
          if (remaining <= 0) {
            return combineFills(partial, quantity, fills, 'closed');
          }
        } else {
          logger.warn('market_order_unexpected_status', {
            event: 'market_order_unexpected_status',
            attempt: attempt + 1,
            order: describeOrder(order),
          });
        }
      } catch (error) {
        apiErrorCounter.labels('place_market_order').inc();
        logger.warn('market_order_attempt_failed', {
          event: 'market_order_attempt_failed',
          pair,
          side,
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          error: errorMessage(error),
        });
      }

      if (attempt + 1 < this.maxRetries && this.retryDelayMs > 0) {
        await sleep(this.retryDelayMs);
      }
    }

    if (lastPartial && fills.filled > 0) {
      const order = combineFills(lastPartial, quantity, fills, 'canceled');
      logger.warn('market_order_partially_executed', {
        event: 'market_order_partially_executed',
        attempts: this.maxRetries,
        order: describeOrder(order),
      });
      return order;
    }

    throw new OrderExecutionFailedError(
      `Failed to execute market order after ${this.maxRetries} retries.`,
      side,
      'market',
      pair,
      remaining,
      attemptPrice
    );
  }

  async executeLimitOrder(side: OrderSide, pair: string, quantity: number, price: number): Promise<Order> {
    try {
      const raw = await this.exchange.placeOrder(pair, 'limit', side, quantity, price);
      return parseExchangeOrder(raw, { side, orderType: 'limit', symbol: pair });
    } catch (error) {
      apiErrorCounter.labels('place_limit_order').inc();
      if (error instanceof DataFetchError) {
        logger.error('limit_order_data_fetch_failed', {
          event: 'limit_order_data_fetch_failed',
          pair,
          side,
          error: formatError(error),
        });
        throw error;
      }
      logger.error('limit_order_failed', {
        event: 'limit_order_failed',
        pair,
        side,
        quantity,
        price,
        error: formatError(error),
      });
      throw new OrderExecutionFailedError(
        `Failed to execute limit order: ${errorMessage(error)}`,
        side,
        'limit',
        pair,
        quantity,
        price
      );
    }
  }

  async getOrder(orderId: string, pair: string): Promise<Order> {
    try {
      const raw = await this.exchange.fetchOrder(orderId, pair);
      return parseExchangeOrder(raw, { symbol: pair });
    } catch (error) {
      apiErrorCounter.labels('fetch_order').inc();
      if (error instanceof DataFetchError) {
        throw error;
      }
      throw new DataFetchError(`Unexpected error fetching order ${orderId}: ${errorMessage(error)}`, error);
    }
  }

  /** Some exchanges acknowledge a placement with little more than an id; ask once for the full order. */
  private async resolvePlacedOrder(raw: unknown, side: OrderSide, pair: string): Promise<Order> {
    const defaults: OrderParseDefaults = { side, orderType: 'market', symbol: pair };
    const order = parseExchangeOrder(raw, defaults);
    if (order.status !== 'unknown' || !order.identifier) return order;
    return parseExchangeOrder(await this.exchange.fetchOrder(order.identifier, pair), defaults);
  }

  /** Retry `n` (1-based) widens the base price by `maxSlippage / maxRetries × n`. */
  private adjustPrice(side: OrderSide, basePrice: number, retryIndex: number) {
    const step = (this.maxSlippage / this.maxRetries) * retryIndex;
    return side === 'buy' ? basePrice * (1 + step) : basePrice * (1 - step);
  }

  /** Cancels and waits for the exchange to report `canceled`. Returns the confirmed order, or null. */
  private async cancelPartialOrder(order: Order, pair: string): Promise<Order | null> {
    const defaults: OrderParseDefaults = { side: order.side, orderType: order.orderType, symbol: pair };
    try {
      const confirmed = await retry(
        async () => {
          let reply = parseExchangeOrder(await this.exchange.cancelOrder(order.identifier, pair), defaults);
          if (reply.status === 'unknown') {
            reply = parseExchangeOrder(await this.exchange.fetchOrder(order.identifier, pair), defaults);
          }
          if (reply.status !== 'canceled') {
            throw new OrderCancellationError(`Order ${order.identifier} is still ${reply.status} after cancel`);
          }
          return reply;
        },
        {
          attempts: this.maxRetries,
          delayMs: this.retryDelayMs,
          backoffFactor: 1,
          onRetry: (error, attempt) => {
            apiErrorCounter.labels('cancel_order').inc();
            logger.warn('cancel_order_retry', {
              event: 'cancel_order_retry',
              orderId: order.identifier,
              pair,
              attempt,
              error: errorMessage(error),
            });
          },
        }
      );
      logger.info('partial_order_cancelled', { event: 'partial_order_cancelled', orderId: order.identifier, pair });
      return confirmed;
    } catch (error) {
      apiErrorCounter.labels('cancel_order').inc();
      logger.error('partial_fill_unresolved', {
        event: 'partial_fill_unresolved',
        order: describeOrder(order),
        error: formatError(error),
      });
      return null;
    }
  }
}

interface ExecutionFills {
  filled: number;
  cost: number;
}

function recordFill(fills: ExecutionFills, order: Order, filled: number) {
  if (!(filled > 0)) return;
  fills.filled += filled;
  fills.cost += filled * executionPrice(order);
}

function combineFills(last: Order, quantity: number, fills: ExecutionFills, status: 'closed' | 'canceled'): Order {
  if (fills.filled === last.filled && status === last.status) return last;
  const average = fills.filled > 0 ? fills.cost / fills.filled : last.average;
  return {
    ...last,
    status,
    amount: quantity,
    filled: fills.filled,
    remaining: Math.max(quantity - fills.filled, 0),
    average,
    cost: fills.cost,
  };
}
