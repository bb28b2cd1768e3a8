import type { BotConfig } from '../config/botConfig';
import { BacktestExchangeService } from './backtestExchangeService';
import { CcxtExchangeService } from './ccxtExchangeService';
import type { ExchangeService } from './types';

export function createExchangeService(config: BotConfig): ExchangeService {
  const { name, tradingMode } = config.exchange;
  switch (tradingMode) {
    case 'backtest':
      return new BacktestExchangeService({
        exchangeName: name,
        historicalDataFile: config.tradingSettings.historicalDataFile,
      });
    case 'paper_trading':
      return new CcxtExchangeService({ exchangeName: name, sandbox: true });
    case 'live':
      return new CcxtExchangeService({ exchangeName: name, sandbox: false });
  }
}
