import { describe, expect, it } from 'vitest';
import { DataFetchError } from '../../src/exchanges/errors';
import { OrderExecutionFailedError } from '../../src/orders/errors';
import { errorMessage, formatError } from '../../src/utils/formatError';

describe('formatError', () => {
  it('keeps the exchange error a fetch failure wraps', () => {
    const exchangeError = new Error('binance GET /api/v3/order 503');
    exchangeError.name = 'ExchangeNotAvailable';

    const formatted = formatError(new DataFetchError('fetch_order failed on binance', exchangeError));

    expect(formatted).toMatchObject({
      name: 'DataFetchError',
      message: 'fetch_order failed on binance',
      cause: { name: 'ExchangeNotAvailable', message: 'binance GET /api/v3/order 503' },
    });
  });

  it('stops following causes after a few levels', () => {
    let error = new Error('level-0');
    for (let i = 1; i <= 5; i += 1) {
      error = new Error(`level-${i}`, { cause: error });
    }

    const formatted = formatError(error);

    expect(formatted).toMatchObject({
      message: 'level-5',
      cause: { message: 'level-4', cause: { message: 'level-3', cause: { message: 'level-2' } } },
    });
    expect(formatted).not.toHaveProperty(['cause', 'cause', 'cause', 'cause']);
  });

  it('includes order details and leaves out an absent cause', () => {
    const formatted = formatError(
      new OrderExecutionFailedError('Failed to execute limit order: min notional', 'buy', 'limit', 'SOL/USDT', 1, 95)
    );

    expect(formatted.details).toEqual({ side: 'buy', orderType: 'limit', pair: 'SOL/USDT', quantity: 1, price: 95 });
    expect(formatted).not.toHaveProperty('cause');
  });

  it('formats plain values', () => {
    expect(formatError({ code: 42 })).toEqual({ code: 42 });
    expect(formatError('boom')).toEqual({ message: 'boom' });
    expect(errorMessage(new Error('socket hang up'))).toBe('socket hang up');
  });
});
