import type { Order, OrderSide } from '../order';

/** Where orders go: a real exchange, or an in-memory book for backtests. */
export interface OrderExecutionStrategy {
  executeMarketOrder(side: OrderSide, pair: string, quantity: number, price: number): Promise<Order>;
  executeLimitOrder(side: OrderSide, pair: string, quantity: number, price: number): Promise<Order>;
  getOrder(orderId: string, pair: string): Promise<Order>;
}
