import type { OrderSide, OrderType } from '../orders/order';

export interface Ohlcv {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface TickerUpdate {
  price: number;
  timestamp: number;
}

export type TickerListener = (update: TickerUpdate) => Promise<void>;

export interface AssetBalance {
  free: number;
  used: number;
  total: number;
}

export type BalanceSnapshot = Record<string, AssetBalance>;

export interface ExchangeStatus {
  status: 'ok' | 'maintenance' | 'shutdown' | 'error' | 'unknown';
  updated?: number;
  message?: string;
}

/**
 * What the engine needs from an exchange. Order payloads are returned raw
 * (`unknown`) and parsed once by the execution strategy.
 */
export interface ExchangeService {
  readonly name: string;
  getBalance(): Promise<BalanceSnapshot>;
  getCurrentPrice(pair: string): Promise<number>;
  placeOrder(pair: string, orderType: OrderType, side: OrderSide, amount: number, price?: number): Promise<unknown>;
  cancelOrder(orderId: string, pair: string): Promise<unknown>;
  fetchOrder(orderId: string, pair: string): Promise<unknown>;
  fetchOhlcv(pair: string, timeframe: string, startDate: string, endDate: string): Promise<Ohlcv[]>;
  listenToTickerUpdates(pair: string, onTicker: TickerListener, intervalMs: number): Promise<void>;
  closeConnection(): Promise<void>;
  getExchangeStatus(): Promise<ExchangeStatus>;
}
