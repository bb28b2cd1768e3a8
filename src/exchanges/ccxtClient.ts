import ccxt from 'ccxt';
import { z } from 'zod';
import { UnsupportedExchangeError } from './errors';
import type { Ohlcv } from './types';

/** The part of a ccxt exchange instance the services call. */
export interface CcxtClient {
  readonly id: string;
  fetchBalance(): Promise<unknown>;
  fetchTicker(symbol: string): Promise<unknown>;
  createOrder(symbol: string, type: string, side: string, amount: number, price?: number): Promise<unknown>;
  cancelOrder(id: string, symbol?: string): Promise<unknown>;
  fetchOrder(id: string, symbol?: string): Promise<unknown>;
  fetchOHLCV(symbol: string, timeframe?: string, since?: number, limit?: number): Promise<unknown>;
  fetchStatus(): Promise<unknown>;
  setSandboxMode(enabled: boolean): void;
  close?(): Promise<unknown>;
}

type CcxtConstructor = new (config: Record<string, unknown>) => CcxtClient;

export interface CcxtConnectionOptions {
  exchangeId: string;
  apiKey?: string;
  apiSecret?: string;
  sandbox?: boolean;
}

export function createCcxtClient(options: CcxtConnectionOptions): CcxtClient {
  const id = options.exchangeId.toLowerCase();
  // exchange classes are looked up by id at runtime
  const ExchangeClass = (ccxt as unknown as Record<string, CcxtConstructor | undefined>)[id];
  if (typeof ExchangeClass !== 'function') {
    throw new UnsupportedExchangeError(`Exchange ${id} is not supported by ccxt`);
  }
  const client = new ExchangeClass({
    apiKey: options.apiKey,
    secret: options.apiSecret,
    enableRateLimit: true,
    options: { adjustForTimeDifference: true },
  });
  if (options.sandbox) {
    client.setSandboxMode(true);
  }
  return client;
}

const candleSchema = z.tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number().nullable()]);
export const candlesSchema = z.array(candleSchema);

export function toOhlcvRows(raw: unknown): Ohlcv[] {
  return candlesSchema.parse(raw).map(([timestamp, open, high, low, close, volume]) => ({
    timestamp,
    open,
    high,
    low,
    close,
    volume: volume ?? 0,
  }));
}

const BATCH_LIMIT = 1000;

/** Pages through `fetchOHLCV` from `startMs` until `endMs` (inclusive). */
export async function fetchOhlcvRange(
  client: CcxtClient,
  pair: string,
  timeframe: string,
  startMs: number,
  endMs: number
): Promise<Ohlcv[]> {
  const rows: Ohlcv[] = [];
  let since = startMs;
  while (since <= endMs) {
    const batch = toOhlcvRows(await client.fetchOHLCV(pair, timeframe, since, BATCH_LIMIT));
    if (batch.length === 0) break;
    for (const row of batch) {
      if (row.timestamp >= since && row.timestamp <= endMs) rows.push(row);
    }
    const last = batch[batch.length - 1].timestamp;
    if (last < since) break;
    since = last + 1;
  }
  return rows;
}
