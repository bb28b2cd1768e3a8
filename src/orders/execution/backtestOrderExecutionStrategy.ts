import { DataFetchError } from '../../exchanges/errors';
import type { Order, OrderSide, OrderType } from '../order';
import type { OrderExecutionStrategy } from './types';

/**
 * Simulated exchange for backtests. Market orders fill in full at the given price;
 * limit orders rest OPEN; the candle fill simulation in `OrderManager` closes them.
 * A limit order is handed out as the stored instance, so `getOrder` sees those fills.
 */
export class BacktestOrderExecutionStrategy implements OrderExecutionStrategy {
  private readonly orders = new Map<string, Order>();
  private sequence = 0;

  constructor(private readonly clock: () => number = () => Date.now()) {}

  async executeMarketOrder(side: OrderSide, pair: string, quantity: number, price: number): Promise<Order> {
    const order = this.createOrder('market', side, pair, quantity, price);
    order.status = 'closed';
    order.filled = quantity;
    order.remaining = 0;
    order.average = price;
    order.cost = quantity * price;
    order.lastTradeTimestamp = order.timestamp;
    return { ...order };
  }

  async executeLimitOrder(side: OrderSide, pair: string, quantity: number, price: number): Promise<Order> {
    return this.createOrder('limit', side, pair, quantity, price);
  }

  async getOrder(orderId: string, pair: string): Promise<Order> {
    const order = this.orders.get(orderId);
    if (!order || order.symbol !== pair) {
      throw new DataFetchError(`Order ${orderId} not found for ${pair}`);
    }
    return { ...order };
  }

  private createOrder(orderType: OrderType, side: OrderSide, pair: string, quantity: number, price: number): Order {
    this.sequence += 1;
    const identifier = `backtest-${orderType}-${this.sequence}`;
    const timestamp = this.clock();
    const order: Order = {
      identifier,
      status: 'open',
      orderType,
      side,
      price,
      amount: quantity,
      filled: 0,
      remaining: quantity,
      timestamp,
      symbol: pair,
      info: { id: identifier, simulated: true },
    };
    this.orders.set(identifier, order);
    return order;
  }
}
