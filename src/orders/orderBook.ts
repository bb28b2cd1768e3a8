import type { GridLevel } from '../grid/gridLevel';
import { isOrderOpen, isOrderTerminal, type Order, type OrderStatus } from './order';

export interface OrderStatusUpdate {
  status: OrderStatus;
  filled?: number;
  remaining?: number;
  average?: number;
  price?: number;
  fee?: Order['fee'];
  lastTradeTimestamp?: number;
}

export class OrderBook {
  private readonly buyOrders: Order[] = [];
  private readonly sellOrders: Order[] = [];
  private readonly nonGridOrders: Order[] = [];
  private readonly orderToGrid = new Map<Order, GridLevel>();
  private readonly byId = new Map<string, Order>();

  /** Grid orders carry their level; take-profit/stop-loss orders are stored without one. */
  addOrder(order: Order, gridLevel?: GridLevel) {
    if (this.byId.has(order.identifier)) {
      throw new Error(`duplicate_order:${order.identifier}`);
    }
    if (order.side === 'buy') {
      this.buyOrders.push(order);
    } else {
      this.sellOrders.push(order);
    }
    if (gridLevel) {
      this.orderToGrid.set(order, gridLevel);
    } else {
      this.nonGridOrders.push(order);
    }
    this.byId.set(order.identifier, order);
  }

  getOrder(orderId: string): Order | undefined {
    return this.byId.get(orderId);
  }

  getGridLevelForOrder(order: Order): GridLevel | undefined {
    return this.orderToGrid.get(order);
  }

  getBuyOrdersWithGrid(): Array<[Order, GridLevel | undefined]> {
    return this.buyOrders.map((order) => [order, this.orderToGrid.get(order)]);
  }

  getSellOrdersWithGrid(): Array<[Order, GridLevel | undefined]> {
    return this.sellOrders.map((order) => [order, this.orderToGrid.get(order)]);
  }

  getAllBuyOrders(): readonly Order[] {
    return this.buyOrders;
  }

  getAllSellOrders(): readonly Order[] {
    return this.sellOrders;
  }

  getNonGridOrders(): readonly Order[] {
    return this.nonGridOrders;
  }

  getOpenOrders(): Order[] {
    return [...this.buyOrders, ...this.sellOrders].filter(isOrderOpen);
  }

  getCompletedOrders(): Order[] {
    return [...this.buyOrders, ...this.sellOrders].filter((order) => order.status === 'closed');
  }

  /**
   * Applies a status/fill update in place. Orders already closed or canceled are left
   * untouched; the return value tells whether anything changed.
   */
  updateOrderStatus(orderId: string, update: OrderStatusUpdate): Order | null {
    const order = this.byId.get(orderId);
    if (!order || isOrderTerminal(order)) return null;
    order.status = update.status;
    if (update.filled !== undefined) order.filled = update.filled;
    if (update.remaining !== undefined) order.remaining = update.remaining;
    if (update.average !== undefined) order.average = update.average;
    if (update.price !== undefined && update.price > 0) order.price = update.price;
    if (update.fee !== undefined) order.fee = update.fee;
    if (update.lastTradeTimestamp !== undefined) order.lastTradeTimestamp = update.lastTradeTimestamp;
    return order;
  }
}
