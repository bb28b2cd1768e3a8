import { describe, expect, it, vi } from 'vitest';
import { DataFetchError } from '../../../src/exchanges/errors';
import { OrderExecutionFailedError } from '../../../src/orders/errors';
import { LiveOrderExecutionStrategy } from '../../../src/orders/execution/liveOrderExecutionStrategy';
import { logger } from '../../../src/utils/logger';
import { stubExchange } from '../../helpers/exchange';

const PAIR = 'SOL/USDT';

describe('LiveOrderExecutionStrategy', () => {
  it('returns a market order the exchange reports closed on the first attempt', async () => {
    const placeOrder = vi.fn().mockResolvedValue({ id: 'm1', status: 'closed', amount: 2, filled: 2, average: 100.2 });
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ placeOrder }), { retryDelayMs: 0 });

    const order = await strategy.executeMarketOrder('buy', PAIR, 2, 100);

    expect(placeOrder).toHaveBeenCalledTimes(1);
    expect(placeOrder).toHaveBeenCalledWith(PAIR, 'market', 'buy', 2, 100);
    expect(order).toMatchObject({ identifier: 'm1', status: 'closed', side: 'buy', orderType: 'market', filled: 2, price: 100.2 });
  });

  it('makes exactly maxRetries placement attempts before giving up', async () => {
    const placeOrder = vi.fn().mockRejectedValue(new Error('exchange unavailable'));
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ placeOrder }), { maxRetries: 3, retryDelayMs: 0 });

    const failure = strategy.executeMarketOrder('sell', PAIR, 1, 100);

    await expect(failure).rejects.toBeInstanceOf(OrderExecutionFailedError);
    await expect(failure).rejects.toThrow('Failed to execute market order after 3 retries.');
    expect(placeOrder).toHaveBeenCalledTimes(3);
  });

  it('widens the price by the slippage step on every retry', async () => {
    const placeOrder = vi.fn().mockRejectedValue(new Error('rejected'));
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ placeOrder }), {
      maxRetries: 3,
      retryDelayMs: 0,
      maxSlippage: 0.03,
    });

    const error = await strategy.executeMarketOrder('buy', PAIR, 1, 100).catch((caught: unknown) => caught);

    const step = 0.03 / 3;
    expect(placeOrder.mock.calls.map((call) => call[4])).toEqual([100, 100 * (1 + step), 100 * (1 + step * 2)]);
    expect(error).toBeInstanceOf(OrderExecutionFailedError);
    if (error instanceof OrderExecutionFailedError) {
      expect(error.details).toEqual({ side: 'buy', orderType: 'market', pair: PAIR, quantity: 1, price: 100 * (1 + step * 2) });
    }
  });

  it('lowers the price for sells', async () => {
    const placeOrder = vi
      .fn()
      .mockRejectedValueOnce(new Error('rejected'))
      .mockResolvedValueOnce({ id: 'm2', status: 'closed', amount: 1, filled: 1 });
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ placeOrder }), { maxRetries: 2, retryDelayMs: 0 });

    await strategy.executeMarketOrder('sell', PAIR, 1, 200);

    expect(placeOrder).toHaveBeenLastCalledWith(PAIR, 'market', 'sell', 1, 200 * (1 - 0.01 / 2));
  });

  it('cancels a partial fill and re-places only the remainder', async () => {
    const placeOrder = vi
      .fn()
      .mockResolvedValueOnce({ id: 'p1', status: 'open', amount: 2, filled: 0.5, remaining: 1.5 })
      .mockResolvedValueOnce({ id: 'p2', status: 'closed', amount: 1.5, filled: 1.5 });
    const cancelOrder = vi.fn().mockResolvedValue({ id: 'p1', status: 'canceled' });
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ placeOrder, cancelOrder }), { retryDelayMs: 0 });

    const order = await strategy.executeMarketOrder('buy', PAIR, 2, 100);

    expect(cancelOrder).toHaveBeenCalledWith('p1', PAIR);
    expect(placeOrder).toHaveBeenNthCalledWith(2, PAIR, 'market', 'buy', 1.5, 100 * (1 + 0.01 / 3));
    expect(order.identifier).toBe('p2');
  });

  it('logs a partial fill whose cancel keeps failing and still retries', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    const placeOrder = vi
      .fn()
      .mockResolvedValueOnce({ id: 'p1', status: 'open', amount: 2, filled: 1, remaining: 1 })
      .mockResolvedValueOnce({ id: 'p2', status: 'closed', amount: 1, filled: 1 });
    const cancelOrder = vi.fn().mockRejectedValue(new Error('cancel refused'));
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ placeOrder, cancelOrder }), { retryDelayMs: 0 });

    await strategy.executeMarketOrder('buy', PAIR, 2, 100);

    expect(cancelOrder).toHaveBeenCalledTimes(3);
    expect(errorSpy).toHaveBeenCalledWith('partial_fill_unresolved', expect.objectContaining({ event: 'partial_fill_unresolved' }));
  });

  it('reports the fills of every attempt on the returned order', async () => {
    const placeOrder = vi
      .fn()
      .mockResolvedValueOnce({ id: 'p1', status: 'open', amount: 1, filled: 0.4, remaining: 0.6, average: 101 })
      .mockResolvedValueOnce({ id: 'p2', status: 'closed', amount: 0.6, filled: 0.6, average: 99 });
    const cancelOrder = vi.fn().mockResolvedValue({ id: 'p1', status: 'canceled', amount: 1, filled: 0.4 });
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ placeOrder, cancelOrder }), { retryDelayMs: 0 });

    const order = await strategy.executeMarketOrder('sell', PAIR, 1, 100);

    expect(order).toMatchObject({ identifier: 'p2', status: 'closed', amount: 1, filled: 1, remaining: 0 });
    expect(order.average).toBeCloseTo(0.4 * 101 + 0.6 * 99, 9);
    expect(order.cost).toBeCloseTo(99.8, 9);
  });

  it('returns what filled as a canceled order when the attempts run out after a partial fill', async () => {
    const warnSpy = vi.spyOn(logger, 'warn');
    const placeOrder = vi
      .fn()
      .mockResolvedValueOnce({ id: 'p1', status: 'open', amount: 1, filled: 0.4, remaining: 0.6, average: 100 })
      .mockRejectedValueOnce(new Error('exchange unavailable'));
    const cancelOrder = vi.fn().mockResolvedValue({ id: 'p1', status: 'canceled', amount: 1, filled: 0.4 });
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ placeOrder, cancelOrder }), {
      maxRetries: 2,
      retryDelayMs: 0,
    });

    const order = await strategy.executeMarketOrder('sell', PAIR, 1, 100);

    expect(order).toMatchObject({ identifier: 'p1', status: 'canceled', amount: 1, filled: 0.4 });
    expect(order.remaining).toBeCloseTo(0.6, 12);
    expect(order.average).toBeCloseTo(100, 9);
    expect(warnSpy).toHaveBeenCalledWith(
      'market_order_partially_executed',
      expect.objectContaining({ event: 'market_order_partially_executed', attempts: 2 })
    );
  });

  it('keeps asking until the exchange confirms the cancel', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    const placeOrder = vi
      .fn()
      .mockResolvedValueOnce({ id: 'p1', status: 'open', amount: 2, filled: 1, remaining: 1 })
      .mockResolvedValueOnce({ id: 'p2', status: 'closed', amount: 1, filled: 1 });
    const cancelOrder = vi.fn().mockResolvedValue({ id: 'p1', status: 'open', amount: 2, filled: 1 });
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ placeOrder, cancelOrder }), { retryDelayMs: 0 });

    await strategy.executeMarketOrder('buy', PAIR, 2, 100);

    expect(cancelOrder).toHaveBeenCalledTimes(3);
    expect(errorSpy).toHaveBeenCalledWith('partial_fill_unresolved', expect.objectContaining({ event: 'partial_fill_unresolved' }));
  });

  it('looks the order up when the cancel reply has no status and uses its fill', async () => {
    const placeOrder = vi
      .fn()
      .mockResolvedValueOnce({ id: 'p1', status: 'open', amount: 2, filled: 0.5, remaining: 1.5 })
      .mockResolvedValueOnce({ id: 'p2', status: 'closed', amount: 1.3, filled: 1.3 });
    const cancelOrder = vi.fn().mockResolvedValue({ id: 'p1' });
    const fetchOrder = vi.fn().mockResolvedValue({ id: 'p1', status: 'canceled', amount: 2, filled: 0.7 });
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ placeOrder, cancelOrder, fetchOrder }), { retryDelayMs: 0 });

    const order = await strategy.executeMarketOrder('buy', PAIR, 2, 100);

    expect(fetchOrder).toHaveBeenCalledWith('p1', PAIR);
    expect(placeOrder.mock.calls[1][3]).toBeCloseTo(1.3, 12);
    expect(order.filled).toBeCloseTo(2, 12);
  });

  it('fetches the order once when the placement ack carries no status', async () => {
    const placeOrder = vi.fn().mockResolvedValue({ id: 'ack-1' });
    const fetchOrder = vi.fn().mockResolvedValue({ id: 'ack-1', status: 'closed', amount: 1, filled: 1, average: 99 });
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ placeOrder, fetchOrder }), { retryDelayMs: 0 });

    const order = await strategy.executeMarketOrder('sell', PAIR, 1, 100);

    expect(fetchOrder).toHaveBeenCalledWith('ack-1', PAIR);
    expect(placeOrder).toHaveBeenCalledTimes(1);
    expect(order).toMatchObject({ identifier: 'ack-1', status: 'closed', side: 'sell', orderType: 'market' });
  });

  it('places limit orders once and parses the reply', async () => {
    const placeOrder = vi.fn().mockResolvedValue({ id: 'l1', status: 'open', amount: 1, price: 95 });
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ placeOrder }));

    const order = await strategy.executeLimitOrder('buy', PAIR, 1, 95);

    expect(placeOrder).toHaveBeenCalledWith(PAIR, 'limit', 'buy', 1, 95);
    expect(order).toMatchObject({ identifier: 'l1', status: 'open', orderType: 'limit', side: 'buy', symbol: PAIR, remaining: 1 });
  });

  it('passes data fetch errors through and wraps everything else for limit orders', async () => {
    const fetchFailure = new DataFetchError('place_order failed on binance: timeout');
    const failing = new LiveOrderExecutionStrategy(stubExchange({ placeOrder: vi.fn().mockRejectedValue(fetchFailure) }));
    await expect(failing.executeLimitOrder('buy', PAIR, 1, 95)).rejects.toBe(fetchFailure);

    const rejecting = new LiveOrderExecutionStrategy(stubExchange({ placeOrder: vi.fn().mockRejectedValue(new Error('min notional')) }));
    const error = await rejecting.executeLimitOrder('sell', PAIR, 1, 105).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(OrderExecutionFailedError);
    expect(error).toHaveProperty('message', 'Failed to execute limit order: min notional');
  });

  it('wraps unexpected lookup errors as data fetch errors', async () => {
    const strategy = new LiveOrderExecutionStrategy(stubExchange({ fetchOrder: vi.fn().mockRejectedValue(new Error('boom')) }));
    const error = await strategy.getOrder('x1', PAIR).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(DataFetchError);
    expect(error).toHaveProperty('message', 'Unexpected error fetching order x1: boom');
  });
});
