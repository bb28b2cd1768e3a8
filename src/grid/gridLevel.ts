import { GridLevelNotReadyError } from '../orders/errors';
import type { Order } from '../orders/order';

export const GridCycleState = {
  READY_TO_BUY: 'READY_TO_BUY',
  READY_TO_SELL: 'READY_TO_SELL',
  /** Declared for hedged buy+sell levels; no transition enters it yet. */
  READY_TO_BUY_SELL: 'READY_TO_BUY_SELL',
  COMPLETED: 'COMPLETED',
} as const;

export type GridCycleState = (typeof GridCycleState)[keyof typeof GridCycleState];

export class GridLevel {
  readonly buyOrders: Order[] = [];
  readonly sellOrders: Order[] = [];

  constructor(public readonly price: number, private cycleState: GridCycleState) {}

  get state(): GridCycleState {
    return this.cycleState;
  }

  canPlaceBuyOrder() {
    return this.cycleState === GridCycleState.READY_TO_BUY;
  }

  canPlaceSellOrder() {
    return this.cycleState === GridCycleState.READY_TO_SELL;
  }

  /** The level then waits for its matching sell. */
  placeBuyOrder(order: Order) {
    if (!this.canPlaceBuyOrder()) {
      throw new GridLevelNotReadyError(`Grid level ${this.price} cannot take buy ${order.identifier} in state ${this.cycleState}`);
    }
    this.buyOrders.push(order);
    this.cycleState = GridCycleState.READY_TO_SELL;
  }

  placeSellOrder(order: Order) {
    if (!this.canPlaceSellOrder()) {
      throw new GridLevelNotReadyError(`Grid level ${this.price} cannot take sell ${order.identifier} in state ${this.cycleState}`);
    }
    this.sellOrders.push(order);
  }

  resetBuyCycle() {
    this.cycleState = GridCycleState.READY_TO_BUY;
  }

  markCompleted() {
    this.cycleState = GridCycleState.COMPLETED;
  }

  latestBuyOrder(): Order | undefined {
    return this.buyOrders[this.buyOrders.length - 1];
  }

  latestSellOrder(): Order | undefined {
    return this.sellOrders[this.sellOrders.length - 1];
  }

  toString() {
    return (
      `GridLevel(price=${this.price}, state=${this.cycleState}, ` +
      `buyOrders=${this.buyOrders.length}, sellOrders=${this.sellOrders.length})`
    );
  }
}
