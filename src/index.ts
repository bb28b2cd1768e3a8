import { GridTradingBot } from './bot/gridTradingBot';
import { CONFIG } from './config';
import { loadBotConfig } from './config/botConfig';
import { startMetricsServer, stopMetricsServer } from './telemetry/metrics';
import { formatError } from './utils/formatError';
import { logger, setLogIngestionWebhook } from './utils/logger';

async function main() {
  if (CONFIG.LOG_INGEST_WEBHOOK) {
    setLogIngestionWebhook(CONFIG.LOG_INGEST_WEBHOOK);
  }
  const configPath = process.argv[2] ?? CONFIG.BOT_CONFIG_PATH;
  const config = loadBotConfig(configPath);
  logger.info('bot_config_loaded', {
    event: 'bot_config_loaded',
    configPath,
    exchange: config.exchange.name,
    mode: config.exchange.tradingMode,
  });

  if (CONFIG.METRICS.ENABLED) {
    startMetricsServer(CONFIG.METRICS.PORT);
  }

  const bot = new GridTradingBot({ config });
  const shutdown = (signal: string) => {
    logger.warn('shutdown_signal_received', { event: 'shutdown_signal_received', signal });
    void bot.stop(signal).catch((error: unknown) => {
      logger.error('shutdown_failed', { event: 'shutdown_failed', error: formatError(error) });
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  try {
    const summary = await bot.run();
    if (summary) {
      logger.info('backtest_completed', { event: 'backtest_completed', summary });
    }
  } finally {
    await stopMetricsServer();
  }
}

main().catch((error: unknown) => {
  logger.error('fatal', { event: 'fatal', error: formatError(error) });
  process.exitCode = 1;
});
