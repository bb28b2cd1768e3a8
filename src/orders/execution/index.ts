import { CONFIG } from '../../config';
import type { ExchangeService } from '../../exchanges/types';
import type { TradingMode } from '../../strategies/types';
import { BacktestOrderExecutionStrategy } from './backtestOrderExecutionStrategy';
import { LiveOrderExecutionStrategy, type LiveExecutionOptions } from './liveOrderExecutionStrategy';
import type { OrderExecutionStrategy } from './types';

export { BacktestOrderExecutionStrategy } from './backtestOrderExecutionStrategy';
export { LiveOrderExecutionStrategy } from './liveOrderExecutionStrategy';
export type { LiveExecutionOptions } from './liveOrderExecutionStrategy';
export type { OrderExecutionStrategy } from './types';

export function createOrderExecutionStrategy(
  mode: TradingMode,
  exchange: ExchangeService,
  options: LiveExecutionOptions = {
    maxRetries: CONFIG.EXECUTION.MAX_RETRIES,
    retryDelayMs: CONFIG.EXECUTION.RETRY_DELAY_MS,
    maxSlippage: CONFIG.EXECUTION.MAX_SLIPPAGE,
  }
): OrderExecutionStrategy {
  if (mode === 'backtest') {
    return new BacktestOrderExecutionStrategy();
  }
  return new LiveOrderExecutionStrategy(exchange, options);
}
