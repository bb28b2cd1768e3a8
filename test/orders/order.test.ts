import { describe, expect, it } from 'vitest';
import {
  executionPrice,
  isOrderTerminal,
  normalizeOrderStatus,
  OrderParseError,
  parseExchangeOrder,
} from '../../src/orders/order';
import { FeeCalculator } from '../../src/orders/feeCalculator';

describe('parseExchangeOrder', () => {
  it('parses a unified exchange payload once into an Order', () => {
    const raw = {
      id: 12345,
      status: 'open',
      type: 'limit',
      side: 'buy',
      price: '1500.5',
      amount: 2,
      filled: 0.5,
      timestamp: 1700000000000,
      symbol: 'ETH/USDT',
      fee: { cost: 0.75, currency: 'USDT' },
    };
    const order = parseExchangeOrder(raw);

    expect(order).toMatchObject({
      identifier: '12345',
      status: 'open',
      orderType: 'limit',
      side: 'buy',
      price: 1500.5,
      amount: 2,
      filled: 0.5,
      remaining: 1.5,
      timestamp: 1700000000000,
      symbol: 'ETH/USDT',
      fee: { cost: 0.75, currency: 'USDT', rate: undefined },
    });
    expect(order.info).toBe(raw);
  });

  it('maps a missing status to unknown and the british spelling to canceled', () => {
    expect(parseExchangeOrder({ id: 'a', side: 'sell', type: 'market' }).status).toBe('unknown');
    expect(normalizeOrderStatus('CANCELLED')).toBe('canceled');
    expect(normalizeOrderStatus('partially_filled')).toBe('unknown');
  });

  it('falls back to the caller defaults for side, type and symbol', () => {
    const order = parseExchangeOrder(
      { id: 'x1', status: 'closed', average: 99, amount: 1, filled: 1 },
      { side: 'sell', orderType: 'market', symbol: 'BTC/USDT' }
    );
    expect(order.side).toBe('sell');
    expect(order.orderType).toBe('market');
    expect(order.symbol).toBe('BTC/USDT');
    expect(order.price).toBe(99);
    expect(executionPrice(order)).toBe(99);
    expect(isOrderTerminal(order)).toBe(true);
  });

  it('rejects payloads without a usable side', () => {
    expect(() => parseExchangeOrder({ id: 'x2', status: 'open', type: 'limit' })).toThrow('unknown_order_side:missing');
    expect(() => parseExchangeOrder('not an order')).toThrow(OrderParseError);
  });
});

describe('FeeCalculator', () => {
  it('charges the configured rate on the trade value', () => {
    const fees = new FeeCalculator(0.001);
    expect(fees.calculateFee(1000)).toBe(1);
    expect(fees.calculateFee(0)).toBe(0);
  });

  it('rejects negative rates', () => {
    expect(() => new FeeCalculator(-0.1)).toThrow('invalid_trading_fee:-0.1');
  });
});
