import type { AccountValuePoint } from '../backtest/performance';
import type { BotConfig } from '../config/botConfig';
import { EventBus, Events } from '../events/eventBus';
import type { ExchangeService } from '../exchanges/types';
import type { GridManager } from '../grid/gridManager';
import type { BalanceTracker } from '../orders/balanceTracker';
import type { OrderManager } from '../orders/orderManager';
import { accountValueGauge } from '../telemetry/metrics';
import { logger } from '../utils/logger';
import type { ExitTrigger, TradingMode } from './types';

export interface GridTradingStrategyDeps {
  config: BotConfig;
  mode: TradingMode;
  pair: string;
  exchange: ExchangeService;
  gridManager: GridManager;
  orderManager: OrderManager;
  balanceTracker: BalanceTracker;
  eventBus: EventBus;
  tickerIntervalMs: number;
}

/**
 * Drives the grid from prices: candle replay for backtests, ticker polling for paper
 * and live trading. Each step fills, trades the crossings, then checks the exits.
 */
export class GridTradingStrategy {
  private running = false;
  private lastPrice: number | null = null;
  private readonly series: AccountValuePoint[] = [];

  constructor(private readonly deps: GridTradingStrategyDeps) {}

  get isRunning() {
    return this.running;
  }

  get lastKnownPrice() {
    return this.lastPrice;
  }

  get accountValueSeries(): readonly AccountValuePoint[] {
    return this.series;
  }

  initialize() {
    this.deps.gridManager.initializeGridLevels();
  }

  async run(): Promise<void> {
    this.running = true;
    if (this.deps.mode === 'backtest') {
      await this.runBacktest();
    } else {
      await this.runLive();
    }
    this.running = false;
  }

  async stop() {
    this.running = false;
    await this.deps.exchange.closeConnection();
    logger.info('strategy_stopped', { event: 'strategy_stopped', mode: this.deps.mode });
  }

  private async runBacktest() {
    const { config, exchange, pair, orderManager, balanceTracker } = this.deps;
    const { timeframe, period } = config.tradingSettings;
    const candles = await exchange.fetchOhlcv(pair, timeframe, period.startDate, period.endDate);
    if (candles.length === 0) {
      logger.warn('backtest_no_data', { event: 'backtest_no_data', pair, timeframe });
      return;
    }

    const [first, ...rest] = candles;
    balanceTracker.recordInvestment(first.close);
    this.recordAccountValue(first.close, first.timestamp);

    let previousClose = first.close;
    for (const candle of rest) {
      if (!this.running) break;
      await orderManager.simulateOrderFills(candle.high, candle.low, candle.timestamp);
      await orderManager.executeOrder('buy', candle.close, previousClose, candle.timestamp);
      await orderManager.executeOrder('sell', candle.close, previousClose, candle.timestamp);
      const exited = await this.checkTakeProfitOrStopLoss(candle.close, candle.timestamp);
      this.recordAccountValue(candle.close, candle.timestamp);
      if (exited) break;
      previousClose = candle.close;
    }
    logger.info('backtest_finished', { event: 'backtest_finished', pair, candles: candles.length });
  }

  private async runLive() {
    const { exchange, pair, orderManager, balanceTracker, eventBus, tickerIntervalMs } = this.deps;
    let previousPrice: number | null = null;

    await exchange.listenToTickerUpdates(
      pair,
      async ({ price, timestamp }) => {
        if (!this.running) return;
        if (previousPrice === null) {
          balanceTracker.recordInvestment(price);
          previousPrice = price;
          this.recordAccountValue(price, timestamp);
          return;
        }
        await orderManager.executeOrder('buy', price, previousPrice, timestamp);
        await orderManager.executeOrder('sell', price, previousPrice, timestamp);
        previousPrice = price;
        this.recordAccountValue(price, timestamp);
        if (await this.checkTakeProfitOrStopLoss(price, timestamp)) {
          this.running = false;
          eventBus.publishSync(Events.STOP_BOT, 'exit_order_filled');
        }
      },
      tickerIntervalMs
    );
  }

  /** Exits apply only while crypto is held. Returns true once an exit order was placed. */
  private async checkTakeProfitOrStopLoss(price: number, timestamp: number): Promise<boolean> {
    if (!(this.deps.balanceTracker.cryptoBalance > 0)) return false;
    const trigger = this.exitTrigger(price);
    if (!trigger) return false;

    logger.info('exit_triggered', { event: 'exit_triggered', trigger, price });
    const order = await this.deps.orderManager.executeTakeProfitOrStopLossOrder(price, timestamp, trigger);
    if (!order) return false;
    this.deps.gridManager.completeAllLevels();
    return true;
  }

  private exitTrigger(price: number): ExitTrigger | null {
    const { takeProfit, stopLoss } = this.deps.config.riskManagement;
    if (takeProfit.enabled && takeProfit.threshold !== undefined && price >= takeProfit.threshold) {
      return 'take_profit';
    }
    if (stopLoss.enabled && stopLoss.threshold !== undefined && price <= stopLoss.threshold) {
      return 'stop_loss';
    }
    return null;
  }

  private recordAccountValue(price: number, timestamp: number) {
    this.lastPrice = price;
    const accountValue = this.deps.balanceTracker.getTotalBalanceValue(price);
    accountValueGauge.set(accountValue);
    if (this.deps.mode === 'backtest') {
      this.series.push({ timestamp, price, accountValue });
    }
  }
}
