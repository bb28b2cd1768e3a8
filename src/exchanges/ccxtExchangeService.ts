import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import { CONFIG } from '../config';
import type { OrderSide, OrderType } from '../orders/order';
import { apiErrorCounter } from '../telemetry/metrics';
import { errorMessage, formatError } from '../utils/formatError';
import { logger } from '../utils/logger';
import { createCcxtClient, fetchOhlcvRange, type CcxtClient } from './ccxtClient';
import { DataFetchError, MissingEnvironmentVariableError, OrderCancellationError } from './errors';
import type {
  BalanceSnapshot,
  ExchangeService,
  ExchangeStatus,
  Ohlcv,
  TickerListener,
} from './types';

export interface CcxtExchangeServiceOptions {
  exchangeName: string;
  /** Paper trading runs against the exchange sandbox. */
  sandbox: boolean;
  apiKey?: string;
  secretKey?: string;
  /** Prebuilt client; skips credential lookup. */
  client?: CcxtClient;
}

const numberish = z.number().nullish().transform((value) => value ?? 0);
const assetSchema = z.object({ free: numberish, used: numberish, total: numberish });
const tickerSchema = z.object({
  last: z.number().nullish(),
  close: z.number().nullish(),
  bid: z.number().nullish(),
  ask: z.number().nullish(),
  timestamp: z.number().nullish(),
});
const statusSchema = z.object({
  status: z.string().nullish(),
  updated: z.number().nullish(),
});
const KNOWN_STATUSES = ['ok', 'maintenance', 'shutdown', 'error'] as const;
// ccxt balance keys that aggregate all assets rather than naming one
const BALANCE_META_KEYS = new Set(['info', 'free', 'used', 'total', 'timestamp', 'datetime']);

function requireEnv(name: string, value: string | undefined) {
  if (!value) {
    throw new MissingEnvironmentVariableError(name);
  }
  return value;
}

export class CcxtExchangeService implements ExchangeService {
  readonly name: string;
  private readonly client: CcxtClient;
  private tickerController: AbortController | null = null;
  private tickerLoop: Promise<void> | null = null;

  constructor(options: CcxtExchangeServiceOptions) {
    this.name = options.exchangeName;
    this.client =
      options.client ??
      createCcxtClient({
        exchangeId: options.exchangeName,
        apiKey: requireEnv('EXCHANGE_API_KEY', options.apiKey ?? CONFIG.EXCHANGE_API_KEY),
        apiSecret: requireEnv('EXCHANGE_SECRET_KEY', options.secretKey ?? CONFIG.EXCHANGE_SECRET_KEY),
        sandbox: options.sandbox,
      });
    logger.info('exchange_connected', { event: 'exchange_connected', exchange: this.name, sandbox: options.sandbox });
  }

  async getBalance(): Promise<BalanceSnapshot> {
    const raw = await this.call('fetch_balance', () => this.client.fetchBalance());
    const parsed = z.record(z.unknown()).safeParse(raw);
    if (!parsed.success) {
      throw new DataFetchError('Malformed balance response');
    }
    const balances: BalanceSnapshot = {};
    for (const [asset, value] of Object.entries(parsed.data)) {
      if (BALANCE_META_KEYS.has(asset)) continue;
      const entry = assetSchema.safeParse(value);
      if (entry.success) balances[asset] = entry.data;
    }
    return balances;
  }

  async getCurrentPrice(pair: string): Promise<number> {
    const raw = await this.call('fetch_ticker', () => this.client.fetchTicker(pair));
    const parsed = tickerSchema.safeParse(raw);
    const ticker = parsed.success ? parsed.data : null;
    const price = ticker?.last ?? ticker?.close ?? null;
    if (price === null || !(price > 0)) {
      throw new DataFetchError(`No last price in ticker for ${pair}`);
    }
    return price;
  }

  placeOrder(pair: string, orderType: OrderType, side: OrderSide, amount: number, price?: number): Promise<unknown> {
    return this.call('place_order', () => this.client.createOrder(pair, orderType, side, amount, price));
  }

  async cancelOrder(orderId: string, pair: string): Promise<unknown> {
    try {
      return await this.client.cancelOrder(orderId, pair);
    } catch (error) {
      apiErrorCounter.labels('cancel_order').inc();
      throw new OrderCancellationError(`Error cancelling order ${orderId}: ${errorMessage(error)}`, error);
    }
  }

  fetchOrder(orderId: string, pair: string): Promise<unknown> {
    return this.call('fetch_order', () => this.client.fetchOrder(orderId, pair));
  }

  fetchOhlcv(pair: string, timeframe: string, startDate: string, endDate: string): Promise<Ohlcv[]> {
    return this.call('fetch_ohlcv', () =>
      fetchOhlcvRange(this.client, pair, timeframe, Date.parse(startDate), Date.parse(endDate))
    );
  }

  /** Polls the ticker until `closeConnection`; resolves once polling has stopped. */
  listenToTickerUpdates(pair: string, onTicker: TickerListener, intervalMs: number): Promise<void> {
    if (this.tickerLoop) {
      throw new Error('ticker_updates_already_running');
    }
    const controller = new AbortController();
    this.tickerController = controller;
    this.tickerLoop = this.pollTicker(pair, onTicker, intervalMs, controller.signal).finally(() => {
      this.tickerLoop = null;
      this.tickerController = null;
    });
    return this.tickerLoop;
  }

  async closeConnection(): Promise<void> {
    const loop = this.tickerLoop;
    this.tickerController?.abort();
    if (loop) await loop;
    if (this.client.close) {
      try {
        await this.client.close();
      } catch (error) {
        logger.warn('exchange_close_failed', { event: 'exchange_close_failed', exchange: this.name, error: errorMessage(error) });
      }
    }
    logger.info('exchange_connection_closed', { event: 'exchange_connection_closed', exchange: this.name });
  }

  async getExchangeStatus(): Promise<ExchangeStatus> {
    try {
      const parsed = statusSchema.safeParse(await this.client.fetchStatus());
      if (!parsed.success) return { status: 'unknown' };
      const status = KNOWN_STATUSES.find((known) => known === parsed.data.status) ?? 'unknown';
      return { status, updated: parsed.data.updated ?? undefined };
    } catch (error) {
      apiErrorCounter.labels('fetch_status').inc();
      return { status: 'error', message: errorMessage(error) };
    }
  }

  private async pollTicker(pair: string, onTicker: TickerListener, intervalMs: number, signal: AbortSignal) {
    while (!signal.aborted) {
      try {
        const price = await this.getCurrentPrice(pair);
        await onTicker({ price, timestamp: Date.now() });
      } catch (error) {
        logger.error('ticker_update_failed', {
          event: 'ticker_update_failed',
          exchange: this.name,
          pair,
          error: formatError(error),
        });
      }
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) throw error;
      }
    }
  }

  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      apiErrorCounter.labels(operation).inc();
      if (error instanceof DataFetchError) throw error;
      throw new DataFetchError(`${operation} failed on ${this.name}: ${errorMessage(error)}`, error);
    }
  }
}
