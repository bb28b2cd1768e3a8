import type { OrderBook } from '../orders/orderBook';
import { executionPrice, isOrderFilled, type Order } from '../orders/order';

const ANNUAL_RISK_FREE_RATE = 0.03;
const PERIODS_PER_YEAR = 252;

export interface AccountValuePoint {
  timestamp: number;
  price: number;
  accountValue: number;
}

export interface PerformanceInput {
  pair: string;
  initialBalance: number;
  tradingFee: number;
  finalFiatBalance: number;
  finalCryptoBalance: number;
  finalPrice: number;
  totalFees: number;
  orderBook: OrderBook;
  series: readonly AccountValuePoint[];
}

export interface PerformanceSummary {
  pair: string;
  startDate: string | null;
  endDate: string | null;
  durationMs: number;
  roiPct: number;
  maxDrawdownPct: number;
  maxRunupPct: number;
  timeInProfitPct: number;
  timeInLossPct: number;
  buyAndHoldReturnPct: number;
  gridTradingGains: number;
  totalFees: number;
  finalAccountValue: number;
  finalCryptoBalance: number;
  finalCryptoValue: number;
  finalFiatBalance: number;
  numBuyTrades: number;
  numSellTrades: number;
  sharpeRatio: number | null;
  sortinoRatio: number | null;
}

export function calculateRoi(initial: number, final: number) {
  if (initial <= 0) return 0;
  return ((final - initial) / initial) * 100;
}

/** Largest peak-to-trough fall, in percent of the peak. */
export function calculateMaxDrawdown(values: readonly number[]) {
  let peak = Number.NEGATIVE_INFINITY;
  let maxDrawdown = 0;
  for (const value of values) {
    if (value > peak) peak = value;
    if (peak > 0) {
      const drawdown = ((peak - value) / peak) * 100;
      if (drawdown > maxDrawdown) maxDrawdown = drawdown;
    }
  }
  return maxDrawdown;
}

export function calculateMaxRunup(values: readonly number[]) {
  let trough = Number.POSITIVE_INFINITY;
  let maxRunup = 0;
  for (const value of values) {
    if (value < trough) trough = value;
    if (trough > 0) {
      const runup = ((value - trough) / trough) * 100;
      if (runup > maxRunup) maxRunup = runup;
    }
  }
  return maxRunup;
}

function periodReturns(values: readonly number[]) {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i += 1) {
    const previous = values[i - 1];
    if (previous !== 0) returns.push(values[i] / previous - 1);
  }
  return returns;
}

function stdDev(samples: readonly number[]) {
  if (samples.length < 2) return 0;
  const mean = samples.reduce((sum, v) => sum + v, 0) / samples.length;
  const variance = samples.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (samples.length - 1);
  return Math.sqrt(Math.max(variance, 0));
}

export function calculateSharpeRatio(values: readonly number[]): number | null {
  const excess = periodReturns(values).map((r) => r - ANNUAL_RISK_FREE_RATE / PERIODS_PER_YEAR);
  const deviation = stdDev(excess);
  if (excess.length < 2 || deviation === 0) return null;
  const mean = excess.reduce((sum, v) => sum + v, 0) / excess.length;
  return (mean / deviation) * Math.sqrt(PERIODS_PER_YEAR);
}

export function calculateSortinoRatio(values: readonly number[]): number | null {
  const excess = periodReturns(values).map((r) => r - ANNUAL_RISK_FREE_RATE / PERIODS_PER_YEAR);
  const deviation = stdDev(excess.filter((r) => r < 0));
  if (excess.length < 2 || deviation === 0) return null;
  const mean = excess.reduce((sum, v) => sum + v, 0) / excess.length;
  return (mean / deviation) * Math.sqrt(PERIODS_PER_YEAR);
}

/** Net sell proceeds minus gross buy cost over filled orders, fees included. */
export function calculateGridTradingGains(orders: readonly Order[], tradingFee: number) {
  let gains = 0;
  for (const order of orders) {
    if (!isOrderFilled(order)) continue;
    const value = order.filled * executionPrice(order);
    gains += order.side === 'sell' ? value * (1 - tradingFee) : -value * (1 + tradingFee);
  }
  return gains;
}

export function summarizePerformance(input: PerformanceInput): PerformanceSummary {
  const values = input.series.map((point) => point.accountValue);
  const first = input.series[0];
  const last = input.series[input.series.length - 1];
  const finalCryptoValue = input.finalCryptoBalance * input.finalPrice;
  const finalAccountValue = input.finalFiatBalance + finalCryptoValue;
  const completed = input.orderBook.getCompletedOrders();
  const inProfit = values.filter((value) => value > input.initialBalance).length;

  return {
    pair: input.pair,
    startDate: first ? new Date(first.timestamp).toISOString() : null,
    endDate: last ? new Date(last.timestamp).toISOString() : null,
    durationMs: first && last ? last.timestamp - first.timestamp : 0,
    roiPct: calculateRoi(input.initialBalance, finalAccountValue),
    maxDrawdownPct: calculateMaxDrawdown(values),
    maxRunupPct: calculateMaxRunup(values),
    timeInProfitPct: values.length ? (inProfit / values.length) * 100 : 0,
    timeInLossPct: values.length ? ((values.length - inProfit) / values.length) * 100 : 0,
    buyAndHoldReturnPct: first && first.price > 0 ? ((input.finalPrice - first.price) / first.price) * 100 : 0,
    gridTradingGains: calculateGridTradingGains(
      completed.filter((order) => input.orderBook.getGridLevelForOrder(order) !== undefined),
      input.tradingFee
    ),
    totalFees: input.totalFees,
    finalAccountValue,
    finalCryptoBalance: input.finalCryptoBalance,
    finalCryptoValue,
    finalFiatBalance: input.finalFiatBalance,
    numBuyTrades: completed.filter((order) => order.side === 'buy').length,
    numSellTrades: completed.filter((order) => order.side === 'sell').length,
    sharpeRatio: calculateSharpeRatio(values),
    sortinoRatio: calculateSortinoRatio(values),
  };
}
