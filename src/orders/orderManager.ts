import type { NotificationFields, NotificationKind } from '../alerts/notificationTypes';
import { EventBus, Events, syncHandler } from '../events/eventBus';
import type { GridLevel } from '../grid/gridLevel';
import type { GridManager } from '../grid/gridManager';
import type { ExitTrigger } from '../strategies/types';
import { fillCounter, orderCancelCounter, ordersFailedCounter, ordersPlacedCounter } from '../telemetry/metrics';
import { errorMessage, formatError } from '../utils/formatError';
import { logger } from '../utils/logger';
import { Mutex } from '../utils/mutex';
import type { BalanceTracker } from './balanceTracker';
import {
  GridLevelNotReadyError,
  InsufficientBalanceError,
  InsufficientCryptoBalanceError,
  InvalidOrderQuantityError,
  OrderExecutionFailedError,
} from './errors';
import type { OrderExecutionStrategy } from './execution/types';
import type { FeeCalculator } from './feeCalculator';
import { describeOrder, isOrderCanceled, isOrderFilled, isOrderOpen, type Order, type OrderSide } from './order';
import type { OrderBook } from './orderBook';
import type { OrderValidator, QuantityCheck } from './orderValidator';

/** The slice of `NotificationHandler` the order path needs. */
export interface OrderNotifier {
  asyncSendNotification(kind: NotificationKind, fields?: NotificationFields): Promise<void>;
}

export interface OrderManagerDeps {
  pair: string;
  gridManager: GridManager;
  orderValidator: OrderValidator;
  balanceTracker: BalanceTracker;
  feeCalculator: FeeCalculator;
  orderBook: OrderBook;
  eventBus: EventBus;
  executionStrategy: OrderExecutionStrategy;
  notifier: OrderNotifier;
  /** Shared by every finalize section; a fresh one is created when omitted. */
  finalizeLock?: Mutex;
}

/**
 * Turns grid crossings into orders: sizes and validates them, reserves funds, hands
 * them to the execution strategy and records the result on the grid and in the book.
 * A failing tick is logged and reported; it never escapes to the caller.
 */
export class OrderManager {
  private readonly pair: string;
  private readonly gridManager: GridManager;
  private readonly orderValidator: OrderValidator;
  private readonly balanceTracker: BalanceTracker;
  private readonly feeCalculator: FeeCalculator;
  private readonly orderBook: OrderBook;
  private readonly eventBus: EventBus;
  private readonly executionStrategy: OrderExecutionStrategy;
  private readonly notifier: OrderNotifier;
  private readonly finalizeLock: Mutex;
  /** Levels with an order on its way to the exchange. */
  private readonly claimedLevels = new Set<GridLevel>();

  constructor(deps: OrderManagerDeps) {
    this.pair = deps.pair;
    this.gridManager = deps.gridManager;
    this.orderValidator = deps.orderValidator;
    this.balanceTracker = deps.balanceTracker;
    this.feeCalculator = deps.feeCalculator;
    this.orderBook = deps.orderBook;
    this.eventBus = deps.eventBus;
    this.executionStrategy = deps.executionStrategy;
    this.notifier = deps.notifier;
    this.finalizeLock = deps.finalizeLock ?? new Mutex();

    this.eventBus.subscribe(Events.ORDER_COMPLETED, syncHandler((order) => this.onOrderCompleted(order)));
    this.eventBus.subscribe(Events.ORDER_CANCELLED, syncHandler((order) => this.onOrderCancelled(order)));
  }

  async executeOrder(side: OrderSide, currentPrice: number, previousPrice: number, timestamp: number): Promise<void> {
    const level = this.gridManager.getCrossedGridLevel(currentPrice, previousPrice, side);
    if (!level) {
      logger.debug('no_grid_level_crossed', { event: 'no_grid_level_crossed', side, currentPrice, previousPrice });
      return;
    }
    try {
      if (side === 'buy') {
        await this.processBuyOrder(level, currentPrice, timestamp);
      } else {
        await this.processSellOrder(level, timestamp);
      }
    } catch (error) {
      await this.handleExecutionFailure(side, error);
    }
  }

  /** Sells the whole available crypto at market, outside the grid. Returns the order when one was placed. */
  async executeTakeProfitOrStopLossOrder(
    currentPrice: number,
    timestamp: number,
    trigger: ExitTrigger
  ): Promise<Order | null> {
    const quantity = this.balanceTracker.cryptoBalance;
    if (!(quantity > 0)) {
      logger.info('exit_order_skipped', { event: 'exit_order_skipped', trigger, reason: 'no_crypto_balance' });
      return null;
    }
    const reservation = this.balanceTracker.reserveFundsForSell(quantity);
    if (!reservation.ok) {
      this.logSkip('sell', new InsufficientCryptoBalanceError(reservation.message));
      return null;
    }

    let order: Order;
    try {
      order = await this.executionStrategy.executeMarketOrder('sell', this.pair, quantity, currentPrice);
    } catch (error) {
      this.balanceTracker.releaseSellReservation(quantity);
      await this.handleExecutionFailure('sell', error);
      return null;
    }

    await this.finalizeLock.runExclusive(() => {
      this.orderBook.addOrder(order);
    });
    ordersPlacedCounter.labels('sell').inc();
    logger.info('exit_order_executed', {
      event: 'exit_order_executed',
      trigger,
      price: currentPrice,
      timestamp,
      order: describeOrder(order),
    });
    await this.notifier.asyncSendNotification(
      trigger === 'take_profit' ? 'TAKE_PROFIT_TRIGGERED' : 'STOP_LOSS_TRIGGERED',
      { order_details: describeOrder(order) }
    );
    await this.publishOutcome(order);
    return order;
  }

  /**
   * Backtest fills: every open order whose price lies within the candle's range is
   * closed at its own price and published as completed.
   */
  async simulateOrderFills(high: number, low: number, timestamp: number): Promise<void> {
    const filled: Order[] = [];
    for (const order of this.orderBook.getOpenOrders()) {
      if (order.price < low || order.price > high) continue;
      const updated = this.orderBook.updateOrderStatus(order.identifier, {
        status: 'closed',
        filled: order.amount,
        remaining: 0,
        average: order.price,
        lastTradeTimestamp: timestamp,
      });
      if (updated) filled.push(updated);
    }
    for (const order of filled) {
      await this.eventBus.publish(Events.ORDER_COMPLETED, order);
    }
  }

  private async processBuyOrder(level: GridLevel, currentPrice: number, timestamp: number) {
    if (!level.canPlaceBuyOrder()) {
      this.logSkip('buy', new GridLevelNotReadyError(`Grid level ${level.price} is not ready for a buy order, current state: ${level.state}`));
      return;
    }
    if (!this.claim(level)) {
      this.logSkip('buy', new GridLevelNotReadyError(`Grid level ${level.price} already has a buy order in flight`));
      return;
    }
    try {
      await this.submitBuyOrder(level, currentPrice, timestamp);
    } finally {
      this.unclaim(level);
    }
  }

  private async submitBuyOrder(level: GridLevel, currentPrice: number, timestamp: number) {
    const totalValue = this.balanceTracker.getTotalBalanceValue(currentPrice);
    const requested = this.gridManager.getOrderSizeForGridLevel(totalValue, currentPrice);
    // fee is reserved up front so the completion can settle in full
    const effectivePrice = level.price + this.feeCalculator.calculateFee(level.price);
    const check = this.orderValidator.adjustBuyQuantity(this.balanceTracker.balance, requested, effectivePrice);
    if (!check.ok) {
      this.logSkip('buy', this.rejectionError(check));
      return;
    }

    const quantity = check.quantity;
    const value = quantity * level.price;
    const reserved = value + this.feeCalculator.calculateFee(value);
    const reservation = this.balanceTracker.reserveFundsForBuy(reserved);
    if (!reservation.ok) {
      this.logSkip('buy', new InsufficientBalanceError(reservation.message));
      return;
    }

    let order: Order;
    try {
      order = await this.executionStrategy.executeLimitOrder('buy', this.pair, quantity, level.price);
    } catch (error) {
      this.balanceTracker.releaseBuyReservation(reserved);
      throw error;
    }

    await this.finalizeLock.runExclusive(() => {
      level.placeBuyOrder(order);
      this.orderBook.addOrder(order, level);
    });
    await this.afterPlacement(order, level, timestamp);
  }

  private async processSellOrder(level: GridLevel, timestamp: number) {
    const buyLevel = this.gridManager.findLowestCompletedBuyGrid();
    if (!buyLevel) {
      logger.info('no_completed_buy_level', { event: 'no_completed_buy_level', sellLevel: level.price });
      return;
    }
    const buyOrder = buyLevel.latestBuyOrder();
    if (!buyOrder) {
      logger.warn('buy_level_without_order', { event: 'buy_level_without_order', level: buyLevel.toString() });
      return;
    }
    if (!level.canPlaceSellOrder()) {
      this.logSkip('sell', new GridLevelNotReadyError(`Grid level ${level.price} is not ready for a sell order, current state: ${level.state}`));
      return;
    }
    if (!this.claim(level, buyLevel)) {
      this.logSkip('sell', new GridLevelNotReadyError(`Grid level ${level.price} or its buy level ${buyLevel.price} has an order in flight`));
      return;
    }
    try {
      await this.submitSellOrder(level, buyLevel, buyOrder, timestamp);
    } finally {
      this.unclaim(level, buyLevel);
    }
  }

  private async submitSellOrder(level: GridLevel, buyLevel: GridLevel, buyOrder: Order, timestamp: number) {
    const requested = buyOrder.filled > 0 ? buyOrder.filled : buyOrder.amount;
    const check = this.orderValidator.adjustSellQuantity(this.balanceTracker.cryptoBalance, requested);
    if (!check.ok) {
      this.logSkip('sell', this.rejectionError(check));
      return;
    }

    const quantity = check.quantity;
    const reservation = this.balanceTracker.reserveFundsForSell(quantity);
    if (!reservation.ok) {
      this.logSkip('sell', new InsufficientCryptoBalanceError(reservation.message));
      return;
    }

    let order: Order;
    try {
      order = await this.executionStrategy.executeLimitOrder('sell', this.pair, quantity, level.price);
    } catch (error) {
      this.balanceTracker.releaseSellReservation(quantity);
      throw error;
    }

    await this.finalizeLock.runExclusive(() => {
      level.placeSellOrder(order);
      this.orderBook.addOrder(order, level);
      this.gridManager.resetGridCycle(buyLevel);
    });
    await this.afterPlacement(order, level, timestamp);
  }

  private async afterPlacement(order: Order, level: GridLevel, timestamp: number) {
    ordersPlacedCounter.labels(order.side).inc();
    logger.info('grid_order_placed', {
      event: 'grid_order_placed',
      gridPrice: level.price,
      timestamp,
      order: describeOrder(order),
    });
    await this.notifier.asyncSendNotification('ORDER_PLACED', { order_details: describeOrder(order) });
    await this.publishOutcome(order);
  }

  /** Closed orders settle as completed; canceled ones settle what filled and release the rest. */
  private async publishOutcome(order: Order) {
    if (isOrderFilled(order)) {
      await this.eventBus.publish(Events.ORDER_COMPLETED, order);
    } else if (isOrderCanceled(order)) {
      await this.eventBus.publish(Events.ORDER_CANCELLED, order);
    }
  }

  private claim(...levels: GridLevel[]) {
    if (levels.some((level) => this.claimedLevels.has(level))) return false;
    for (const level of levels) this.claimedLevels.add(level);
    return true;
  }

  private unclaim(...levels: GridLevel[]) {
    for (const level of levels) this.claimedLevels.delete(level);
  }

  private async handleExecutionFailure(side: OrderSide, error: unknown) {
    ordersFailedCounter.labels(side).inc();
    if (error instanceof OrderExecutionFailedError) {
      logger.error('order_execution_failed', { event: 'order_execution_failed', side, error: formatError(error) });
      await this.notifier.asyncSendNotification('ORDER_FAILED', { error_details: errorMessage(error) });
      return;
    }
    logger.error('order_processing_error', { event: 'order_processing_error', side, error: formatError(error) });
    await this.notifier.asyncSendNotification('ERROR_OCCURRED', { error_details: errorMessage(error) });
  }

  private rejectionError(check: Extract<QuantityCheck, { ok: false }>): Error {
    switch (check.reason) {
      case 'insufficient_funds':
        return new InsufficientBalanceError(check.message);
      case 'insufficient_crypto':
        return new InsufficientCryptoBalanceError(check.message);
      case 'invalid_quantity':
        return new InvalidOrderQuantityError(check.message);
    }
  }

  private logSkip(side: OrderSide, reason: Error) {
    logger.info('order_skipped', { event: 'order_skipped', side, reason: reason.name, message: reason.message });
  }

  private onOrderCompleted(order: Order) {
    fillCounter.labels(order.side).inc();
  }

  private onOrderCancelled(order: Order) {
    orderCancelCounter.labels(order.side).inc();
    const level = this.orderBook.getGridLevelForOrder(order);
    if (!level || order.side !== 'buy' || isOrderOpen(order)) return;
    if (level.latestBuyOrder() === order && order.filled === 0) {
      this.gridManager.resetGridCycle(level);
      logger.info('grid_level_reset_after_cancel', { event: 'grid_level_reset_after_cancel', level: level.toString() });
    }
  }
}
