import { NotificationHandler } from '../alerts/notificationHandler';
import { TelegramChannel, type NotificationChannel } from '../alerts/telegram';
import { summarizePerformance, type PerformanceSummary } from '../backtest/performance';
import { CONFIG } from '../config';
import { getPair, getTradingMode, type BotConfig } from '../config/botConfig';
import { EventBus, Events, syncHandler } from '../events/eventBus';
import { createExchangeService } from '../exchanges/exchangeServiceFactory';
import type { ExchangeService, ExchangeStatus } from '../exchanges/types';
import { GridManager } from '../grid/gridManager';
import { BalanceTracker, type BalanceSnapshotView } from '../orders/balanceTracker';
import { createOrderExecutionStrategy, type OrderExecutionStrategy } from '../orders/execution';
import { FeeCalculator } from '../orders/feeCalculator';
import { OrderBook } from '../orders/orderBook';
import { OrderManager } from '../orders/orderManager';
import { OrderStatusTracker } from '../orders/orderStatusTracker';
import { OrderValidator } from '../orders/orderValidator';
import { GridTradingStrategy } from '../strategies/gridTradingStrategy';
import { isLiveLike, type TradingMode } from '../strategies/types';
import { formatError } from '../utils/formatError';
import { logger, setLogContext } from '../utils/logger';
import { Mutex } from '../utils/mutex';
import { WorkerPool } from '../utils/workerPool';

export interface GridTradingBotOptions {
  config: BotConfig;
  exchange?: ExchangeService;
  executionStrategy?: OrderExecutionStrategy;
  notificationChannels?: NotificationChannel[];
  pollingIntervalMs?: number;
  tickerIntervalMs?: number;
}

export interface BotBalances extends BalanceSnapshotView {
  adjustedFiatBalance: number;
  adjustedCryptoBalance: number;
  totalValue: number | null;
}

export interface BotHealthStatus {
  running: boolean;
  mode: TradingMode;
  tracking: boolean;
  openOrders: number;
  exchange: ExchangeStatus;
}

function defaultChannels(): NotificationChannel[] {
  if (!TelegramChannel.isConfigured(CONFIG.TELEGRAM_TOKEN, CONFIG.TELEGRAM_CHAT_ID)) return [];
  return [new TelegramChannel({ token: CONFIG.TELEGRAM_TOKEN, chatId: CONFIG.TELEGRAM_CHAT_ID })];
}

/** Wires one grid engine for the configured pair and mode and owns its lifecycle. */
export class GridTradingBot {
  readonly mode: TradingMode;
  readonly pair: string;
  readonly eventBus = new EventBus();
  readonly orderBook = new OrderBook();
  readonly gridManager: GridManager;
  readonly balanceTracker: BalanceTracker;
  readonly orderManager: OrderManager;
  readonly orderStatusTracker: OrderStatusTracker;
  readonly notificationHandler: NotificationHandler;
  readonly strategy: GridTradingStrategy;
  private readonly config: BotConfig;
  private readonly exchange: ExchangeService;
  private initialized = false;
  private running = false;
  private stopping: Promise<void> | null = null;
  private pendingRun: Promise<PerformanceSummary | null> | null = null;
  /** Settles when the current `run()` has left its shutdown. */
  private runFinished: Promise<void> = Promise.resolve();

  constructor(options: GridTradingBotOptions) {
    const { config } = options;
    this.config = config;
    this.mode = getTradingMode(config);
    this.pair = getPair(config);
    setLogContext({ pair: this.pair, mode: this.mode });

    this.exchange = options.exchange ?? createExchangeService(config);
    const executionStrategy = options.executionStrategy ?? createOrderExecutionStrategy(this.mode, this.exchange);
    const feeCalculator = new FeeCalculator(config.exchange.tradingFee);

    this.gridManager = new GridManager({
      bottom: config.gridStrategy.range.bottom,
      top: config.gridStrategy.range.top,
      numGrids: config.gridStrategy.numGrids,
      spacing: config.gridStrategy.spacing.type,
      percentageSpacing: config.gridStrategy.spacing.percentageSpacing,
    });
    this.balanceTracker = new BalanceTracker(this.eventBus, feeCalculator);
    this.notificationHandler = new NotificationHandler(this.eventBus, {
      channels: options.notificationChannels ?? defaultChannels(),
      tradingMode: this.mode,
      pool: new WorkerPool(CONFIG.NOTIFICATION.WORKERS),
      timeoutMs: CONFIG.NOTIFICATION.TIMEOUT_MS,
    });
    this.orderManager = new OrderManager({
      pair: this.pair,
      gridManager: this.gridManager,
      orderValidator: new OrderValidator(),
      balanceTracker: this.balanceTracker,
      feeCalculator,
      orderBook: this.orderBook,
      eventBus: this.eventBus,
      executionStrategy,
      notifier: this.notificationHandler,
      finalizeLock: new Mutex(),
    });
    this.orderStatusTracker = new OrderStatusTracker(this.orderBook, executionStrategy, this.eventBus, {
      pair: this.pair,
      pollingIntervalMs: options.pollingIntervalMs ?? CONFIG.ORDER_POLL_INTERVAL_MS,
    });
    this.strategy = new GridTradingStrategy({
      config,
      mode: this.mode,
      pair: this.pair,
      exchange: this.exchange,
      gridManager: this.gridManager,
      orderManager: this.orderManager,
      balanceTracker: this.balanceTracker,
      eventBus: this.eventBus,
      tickerIntervalMs: options.tickerIntervalMs ?? CONFIG.TICKER_REFRESH_INTERVAL_MS,
    });

    this.eventBus.subscribe(Events.START_BOT, syncHandler((reason) => this.onStartRequested(reason)));
    this.eventBus.subscribe(Events.STOP_BOT, syncHandler((reason) => this.onStopRequested(reason)));
  }

  get isRunning() {
    return this.running;
  }

  /** Runs until the data ends (backtest) or the bot is stopped. Backtests return their summary. */
  async run(): Promise<PerformanceSummary | null> {
    if (this.running) {
      throw new Error('bot_already_running');
    }
    this.running = true;
    this.stopping = null;
    const outcome = this.runToCompletion();
    this.runFinished = outcome.then(
      () => undefined,
      () => undefined
    );
    return outcome;
  }

  /** Stops a running bot, waits for its run to wind down, then runs it again in the background. */
  async restart(reason = 'restart'): Promise<void> {
    if (this.running) {
      logger.info('bot_restarting', { event: 'bot_restarting', reason });
      await this.stop(reason);
    }
    await this.runFinished;
    this.startInBackground(reason);
  }

  private async runToCompletion(): Promise<PerformanceSummary | null> {
    try {
      if (!this.initialized) {
        await this.balanceTracker.setupBalances({
          mode: this.mode,
          initialBalance: this.config.tradingSettings.initialBalance,
          baseCurrency: this.config.pair.baseCurrency,
          quoteCurrency: this.config.pair.quoteCurrency,
          exchange: this.exchange,
        });
        this.strategy.initialize();
        this.initialized = true;
      }
      if (isLiveLike(this.mode)) {
        this.orderStatusTracker.startTracking();
      }
      logger.info('bot_started', { event: 'bot_started', mode: this.mode, pair: this.pair });
      await this.strategy.run();
    } finally {
      await this.stop('run_finished');
    }
    return this.mode === 'backtest' ? this.generatePerformanceReport() : null;
  }

  /** Safe to call more than once; concurrent callers share one shutdown. */
  stop(reason = 'requested'): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(reason);
    }
    return this.stopping;
  }

  generatePerformanceReport(): PerformanceSummary {
    const finalPrice = this.strategy.lastKnownPrice ?? 0;
    const summary = summarizePerformance({
      pair: this.pair,
      initialBalance: this.balanceTracker.investment,
      tradingFee: this.config.exchange.tradingFee,
      finalFiatBalance: this.balanceTracker.getAdjustedFiatBalance(),
      finalCryptoBalance: this.balanceTracker.getAdjustedCryptoBalance(),
      finalPrice,
      totalFees: this.balanceTracker.totalFees,
      orderBook: this.orderBook,
      series: this.strategy.accountValueSeries,
    });
    logger.info('performance_summary', { event: 'performance_summary', ...summary });
    return summary;
  }

  getBalances(): BotBalances {
    const price = this.strategy.lastKnownPrice;
    return {
      ...this.balanceTracker.snapshot(),
      adjustedFiatBalance: this.balanceTracker.getAdjustedFiatBalance(),
      adjustedCryptoBalance: this.balanceTracker.getAdjustedCryptoBalance(),
      totalValue: price === null ? null : this.balanceTracker.getTotalBalanceValue(price),
    };
  }

  async getHealthStatus(): Promise<BotHealthStatus> {
    const exchange = await this.exchange.getExchangeStatus();
    if (exchange.status !== 'ok') {
      await this.notificationHandler.asyncSendNotification('HEALTH_CHECK_ALERT', {
        alert_details: `exchange ${this.exchange.name} reports ${exchange.status}${exchange.message ? `: ${exchange.message}` : ''}`,
      });
    }
    return {
      running: this.running,
      mode: this.mode,
      tracking: this.orderStatusTracker.isTracking,
      openOrders: this.orderBook.getOpenOrders().length,
      exchange,
    };
  }

  private async shutdown(reason: string) {
    logger.info('bot_stopping', { event: 'bot_stopping', reason });
    await this.strategy.stop();
    await this.orderStatusTracker.stopTracking();
    await this.eventBus.drain();
    this.running = false;
    logger.info('bot_stopped', { event: 'bot_stopped', reason });
  }

  private onStartRequested(reason: string) {
    if (this.running) {
      logger.info('bot_start_ignored', { event: 'bot_start_ignored', reason });
      return;
    }
    logger.info('bot_start_requested', { event: 'bot_start_requested', reason });
    this.startInBackground(reason);
  }

  private startInBackground(reason: string) {
    this.pendingRun = this.run().catch((error: unknown) => {
      logger.error('bot_run_failed', { event: 'bot_run_failed', reason, error: formatError(error) });
      return null;
    });
  }

  private onStopRequested(reason: string) {
    if (!this.running) return;
    logger.info('bot_stop_requested', { event: 'bot_stop_requested', reason });
    void this.stop(reason).catch((error: unknown) => {
      logger.error('bot_stop_failed', { event: 'bot_stop_failed', reason, error: formatError(error) });
    });
  }

  /** Run started through START_BOT, if any. */
  get backgroundRun() {
    return this.pendingRun;
  }
}
