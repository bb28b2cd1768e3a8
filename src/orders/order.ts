import { z } from 'zod';

export type OrderSide = 'buy' | 'sell';
export type OrderType = 'market' | 'limit';
export type OrderStatus = 'open' | 'closed' | 'canceled' | 'expired' | 'rejected' | 'unknown';

export interface OrderFee {
  cost: number;
  currency?: string;
  rate?: number;
}

export interface Order {
  identifier: string;
  status: OrderStatus;
  orderType: OrderType;
  side: OrderSide;
  price: number;
  average?: number;
  amount: number;
  filled: number;
  remaining: number;
  timestamp: number;
  datetime?: string;
  lastTradeTimestamp?: number;
  symbol: string;
  timeInForce?: string;
  fee?: OrderFee;
  cost?: number;
  /** Untouched exchange payload, kept for auditing. */
  info: unknown;
}

const KNOWN_STATUSES: Record<string, OrderStatus> = {
  open: 'open',
  closed: 'closed',
  canceled: 'canceled',
  cancelled: 'canceled',
  expired: 'expired',
  rejected: 'rejected',
};

const optionalNumber = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined || value === '') return undefined;
    const num = Number(value);
    return Number.isFinite(num) ? num : undefined;
  });

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const rawOrderSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  status: z.string().nullish(),
  type: z.string().nullish(),
  side: z.string().nullish(),
  price: optionalNumber,
  average: optionalNumber,
  amount: optionalNumber,
  filled: optionalNumber,
  remaining: optionalNumber,
  timestamp: optionalNumber,
  datetime: optionalString,
  lastTradeTimestamp: optionalNumber,
  symbol: optionalString,
  timeInForce: optionalString,
  cost: optionalNumber,
  fee: z
    .object({
      cost: optionalNumber,
      currency: optionalString,
      rate: optionalNumber,
    })
    .nullish(),
});

export class OrderParseError extends Error {
  constructor(message: string, public readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'OrderParseError';
  }
}

export function normalizeOrderStatus(status: string | null | undefined): OrderStatus {
  if (!status) return 'unknown';
  return KNOWN_STATUSES[status.toLowerCase()] ?? 'unknown';
}

function parseSide(side: string | null | undefined, fallback?: OrderSide): OrderSide {
  const normalized = side?.toLowerCase();
  if (normalized === 'buy' || normalized === 'sell') return normalized;
  if (fallback) return fallback;
  throw new OrderParseError(`unknown_order_side:${side ?? 'missing'}`);
}

function parseType(type: string | null | undefined, fallback?: OrderType): OrderType {
  const normalized = type?.toLowerCase();
  if (normalized === 'market' || normalized === 'limit') return normalized;
  if (fallback) return fallback;
  throw new OrderParseError(`unknown_order_type:${type ?? 'missing'}`);
}

export interface OrderParseDefaults {
  side?: OrderSide;
  orderType?: OrderType;
  symbol?: string;
}

/**
 * Turns a raw exchange payload (ccxt unified order shape) into an `Order`.
 * Side and type fall back to what the caller asked for when the exchange omits them.
 */
export function parseExchangeOrder(raw: unknown, defaults: OrderParseDefaults = {}): Order {
  const result = rawOrderSchema.safeParse(raw);
  if (!result.success) {
    throw new OrderParseError('invalid_order_payload', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  const data = result.data;
  const amount = data.amount ?? 0;
  const filled = data.filled ?? 0;
  const fee = data.fee && data.fee.cost !== undefined
    ? { cost: data.fee.cost, currency: data.fee.currency, rate: data.fee.rate }
    : undefined;

  return {
    identifier: data.id === null || data.id === undefined ? '' : String(data.id),
    status: normalizeOrderStatus(data.status),
    orderType: parseType(data.type, defaults.orderType),
    side: parseSide(data.side, defaults.side),
    price: data.price ?? data.average ?? 0,
    average: data.average,
    amount,
    filled,
    remaining: data.remaining ?? Math.max(amount - filled, 0),
    timestamp: data.timestamp ?? 0,
    datetime: data.datetime,
    lastTradeTimestamp: data.lastTradeTimestamp,
    symbol: data.symbol ?? defaults.symbol ?? '',
    timeInForce: data.timeInForce,
    fee,
    cost: data.cost,
    info: raw,
  };
}

export function isOrderOpen(order: Order) {
  return order.status === 'open';
}

export function isOrderFilled(order: Order) {
  return order.status === 'closed';
}

export function isOrderCanceled(order: Order) {
  return order.status === 'canceled';
}

export function isOrderTerminal(order: Order) {
  return order.status === 'closed' || order.status === 'canceled';
}

/** Price the order actually traded at, when the exchange reports it. */
export function executionPrice(order: Order) {
  return order.average !== undefined && order.average > 0 ? order.average : order.price;
}

export function describeOrder(order: Order) {
  return (
    `Order(id=${order.identifier}, status=${order.status}, type=${order.orderType}, side=${order.side}, ` +
    `price=${order.price}, average=${order.average ?? 'n/a'}, amount=${order.amount}, filled=${order.filled}, ` +
    `remaining=${order.remaining}, symbol=${order.symbol})`
  );
}
