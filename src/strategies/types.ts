export type TradingMode = 'backtest' | 'paper_trading' | 'live';

export const TRADING_MODES: readonly TradingMode[] = ['backtest', 'paper_trading', 'live'];

export function isLiveLike(mode: TradingMode) {
  return mode === 'live' || mode === 'paper_trading';
}

export type ExitTrigger = 'take_profit' | 'stop_loss';
