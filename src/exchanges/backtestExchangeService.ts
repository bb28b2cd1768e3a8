import fs from 'fs';
import path from 'path';
import type { OrderSide, OrderType } from '../orders/order';
import { errorMessage } from '../utils/formatError';
import { logger } from '../utils/logger';
import { createCcxtClient, fetchOhlcvRange, toOhlcvRows, type CcxtClient } from './ccxtClient';
import { DataFetchError, HistoricalDataFileNotFoundError, UnsupportedOperationError } from './errors';
import type { BalanceSnapshot, ExchangeService, ExchangeStatus, Ohlcv, TickerListener } from './types';

export interface BacktestExchangeServiceOptions {
  exchangeName: string;
  historicalDataFile?: string;
  /** Public market-data client used when no data file is configured. */
  client?: CcxtClient;
}

/**
 * Market data for backtests. Candles come from a local JSON file of
 * `[timestamp, open, high, low, close, volume]` rows, or from the exchange's public API.
 */
export class BacktestExchangeService implements ExchangeService {
  readonly name: string;
  private readonly historicalDataFile?: string;
  private client: CcxtClient | null;

  constructor(options: BacktestExchangeServiceOptions) {
    this.name = options.exchangeName;
    this.historicalDataFile = options.historicalDataFile;
    this.client = options.client ?? null;
  }

  async fetchOhlcv(pair: string, timeframe: string, startDate: string, endDate: string): Promise<Ohlcv[]> {
    const startMs = Date.parse(startDate);
    const endMs = Date.parse(endDate);
    if (Number.isNaN(startMs) || Number.isNaN(endMs) || startMs > endMs) {
      throw new DataFetchError(`Invalid backtest period ${startDate} - ${endDate}`);
    }
    if (this.historicalDataFile) {
      return this.loadFromFile(this.historicalDataFile, startMs, endMs);
    }
    try {
      const rows = await fetchOhlcvRange(this.getClient(), pair, timeframe, startMs, endMs);
      logger.info('ohlcv_fetched', { event: 'ohlcv_fetched', exchange: this.name, pair, timeframe, candles: rows.length });
      return rows;
    } catch (error) {
      throw new DataFetchError(`Failed to fetch OHLCV for ${pair}: ${errorMessage(error)}`, error);
    }
  }

  async getBalance(): Promise<BalanceSnapshot> {
    throw new UnsupportedOperationError('getBalance', 'backtest');
  }

  async getCurrentPrice(_pair: string): Promise<number> {
    throw new UnsupportedOperationError('getCurrentPrice', 'backtest');
  }

  async placeOrder(_pair: string, _orderType: OrderType, _side: OrderSide, _amount: number, _price?: number): Promise<unknown> {
    throw new UnsupportedOperationError('placeOrder', 'backtest');
  }

  async cancelOrder(_orderId: string, _pair: string): Promise<unknown> {
    throw new UnsupportedOperationError('cancelOrder', 'backtest');
  }

  async fetchOrder(_orderId: string, _pair: string): Promise<unknown> {
    throw new UnsupportedOperationError('fetchOrder', 'backtest');
  }

  async listenToTickerUpdates(_pair: string, _onTicker: TickerListener, _intervalMs: number): Promise<void> {
    throw new UnsupportedOperationError('listenToTickerUpdates', 'backtest');
  }

  async closeConnection(): Promise<void> {
    logger.debug('backtest_exchange_closed', { event: 'backtest_exchange_closed', exchange: this.name });
  }

  async getExchangeStatus(): Promise<ExchangeStatus> {
    return { status: 'ok', message: 'backtest mode' };
  }

  private loadFromFile(filePath: string, startMs: number, endMs: number): Ohlcv[] {
    const resolved = path.resolve(filePath);
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(resolved, 'utf8'));
    } catch (error) {
      logger.error('historical_data_load_failed', { event: 'historical_data_load_failed', filePath: resolved, error: errorMessage(error) });
      throw new HistoricalDataFileNotFoundError(filePath);
    }
    let rows: Ohlcv[];
    try {
      rows = toOhlcvRows(raw);
    } catch (error) {
      throw new DataFetchError(`Malformed OHLCV rows in ${filePath}`, error);
    }
    const inPeriod = rows
      .filter((row) => row.timestamp >= startMs && row.timestamp <= endMs)
      .sort((a, b) => a.timestamp - b.timestamp);
    logger.info('ohlcv_loaded', { event: 'ohlcv_loaded', filePath: resolved, candles: inPeriod.length });
    return inPeriod;
  }

  private getClient() {
    if (!this.client) {
      this.client = createCcxtClient({ exchangeId: this.name });
    }
    return this.client;
  }
}
