import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { BacktestExchangeService } from '../../src/exchanges/backtestExchangeService';
import { DataFetchError, HistoricalDataFileNotFoundError, UnsupportedOperationError } from '../../src/exchanges/errors';
import type { CcxtClient } from '../../src/exchanges/ccxtClient';

const SAMPLE = path.join(process.cwd(), 'data', 'SOL_USDT_1h_sample.json');
const tempDirs: string[] = [];

function tempFile(name: string, content: string) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'grid-ohlcv-'));
  tempDirs.push(dir);
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('BacktestExchangeService', () => {
  it('loads the candles of the requested period from a file', async () => {
    const exchange = new BacktestExchangeService({ exchangeName: 'binance', historicalDataFile: SAMPLE });

    const candles = await exchange.fetchOhlcv('SOL/USDT', '1h', '2024-08-01T00:00:00Z', '2024-08-01T02:00:00Z');

    expect(candles).toEqual([
      { timestamp: 1722470400000, open: 142, high: 143.5, low: 140.5, close: 142, volume: 1000 },
      { timestamp: 1722474000000, open: 142, high: 143.5, low: 138.5, close: 140, volume: 1037 },
      { timestamp: 1722477600000, open: 140, high: 141.5, low: 135.5, close: 137, volume: 1074 },
    ]);
  });

  it('sorts out-of-order rows', async () => {
    const file = tempFile('rows.json', JSON.stringify([[2000, 2, 2, 2, 2, 1], [1000, 1, 1, 1, 1, 1]]));
    const exchange = new BacktestExchangeService({ exchangeName: 'binance', historicalDataFile: file });

    const candles = await exchange.fetchOhlcv('SOL/USDT', '1s', '1970-01-01T00:00:00Z', '1970-01-01T00:00:05Z');

    expect(candles.map((candle) => candle.timestamp)).toEqual([1000, 2000]);
  });

  it('reports a missing file and malformed rows', async () => {
    const missing = new BacktestExchangeService({ exchangeName: 'binance', historicalDataFile: '/nonexistent/ohlcv.json' });
    await expect(missing.fetchOhlcv('SOL/USDT', '1h', '2024-08-01', '2024-08-02')).rejects.toBeInstanceOf(
      HistoricalDataFileNotFoundError
    );

    const malformed = new BacktestExchangeService({
      exchangeName: 'binance',
      historicalDataFile: tempFile('bad.json', JSON.stringify([[1, 'open']])),
    });
    await expect(malformed.fetchOhlcv('SOL/USDT', '1h', '2024-08-01', '2024-08-02')).rejects.toBeInstanceOf(DataFetchError);
  });

  it('rejects an inverted period', async () => {
    const exchange = new BacktestExchangeService({ exchangeName: 'binance', historicalDataFile: SAMPLE });
    await expect(exchange.fetchOhlcv('SOL/USDT', '1h', '2024-08-02', '2024-08-01')).rejects.toThrow(
      'Invalid backtest period 2024-08-02 - 2024-08-01'
    );
  });

  it('falls back to the exchange API without a file', async () => {
    const fetchOHLCV = vi.fn().mockResolvedValueOnce([[1722470400000, 142, 143.5, 140.5, 142, 1000]]).mockResolvedValueOnce([]);
    const client: CcxtClient = {
      id: 'binance',
      fetchBalance: vi.fn(),
      fetchTicker: vi.fn(),
      createOrder: vi.fn(),
      cancelOrder: vi.fn(),
      fetchOrder: vi.fn(),
      fetchOHLCV,
      fetchStatus: vi.fn(),
      setSandboxMode: vi.fn(),
    };
    const exchange = new BacktestExchangeService({ exchangeName: 'binance', client });

    const candles = await exchange.fetchOhlcv('SOL/USDT', '1h', '2024-08-01T00:00:00Z', '2024-08-01T01:00:00Z');

    expect(candles).toHaveLength(1);
    expect(fetchOHLCV).toHaveBeenCalledWith('SOL/USDT', '1h', 1722470400000, 1000);
  });

  it('refuses trading operations', async () => {
    const exchange = new BacktestExchangeService({ exchangeName: 'binance' });
    await expect(exchange.placeOrder('SOL/USDT', 'limit', 'buy', 1, 100)).rejects.toBeInstanceOf(UnsupportedOperationError);
    await expect(exchange.getBalance()).rejects.toThrow('getBalance is not available in backtest mode');
    await expect(exchange.getExchangeStatus()).resolves.toEqual({ status: 'ok', message: 'backtest mode' });
  });
});
