import type { OrderSide, OrderType } from './order';

export class InsufficientBalanceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InsufficientBalanceError';
  }
}

export class InsufficientCryptoBalanceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InsufficientCryptoBalanceError';
  }
}

export class GridLevelNotReadyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GridLevelNotReadyError';
  }
}

export class InvalidOrderQuantityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOrderQuantityError';
  }
}

export class InvalidOrderStatusError extends Error {
  constructor(message: string, public readonly details: Record<string, unknown>) {
    super(message);
    this.name = 'InvalidOrderStatusError';
  }
}

export class OrderExecutionFailedError extends Error {
  public readonly details: {
    side: OrderSide;
    orderType: OrderType;
    pair: string;
    quantity: number;
    price: number;
  };

  constructor(message: string, side: OrderSide, orderType: OrderType, pair: string, quantity: number, price: number) {
    super(message);
    this.name = 'OrderExecutionFailedError';
    this.details = { side, orderType, pair, quantity, price };
  }
}
