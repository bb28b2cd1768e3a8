import dotenv from 'dotenv';
dotenv.config();

export const CONFIG = {
  ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  LOG_INGEST_WEBHOOK: process.env.LOG_INGEST_WEBHOOK || '',
  BOT_CONFIG_PATH: process.env.BOT_CONFIG_PATH || 'config/config.json',
  EXCHANGE_API_KEY: process.env.EXCHANGE_API_KEY || '',
  EXCHANGE_SECRET_KEY: process.env.EXCHANGE_SECRET_KEY || '',
  TELEGRAM_TOKEN: process.env.TELEGRAM_TOKEN || '',
  TELEGRAM_CHAT_ID: process.env.TELEGRAM_CHAT_ID || '',
  ORDER_POLL_INTERVAL_MS: Number(process.env.ORDER_POLL_INTERVAL_MS || '15000'),
  TICKER_REFRESH_INTERVAL_MS: Number(process.env.TICKER_REFRESH_INTERVAL_MS || '3000'),
  EXECUTION: {
    MAX_RETRIES: Number(process.env.EXECUTION_MAX_RETRIES || '3'),
    RETRY_DELAY_MS: Number(process.env.EXECUTION_RETRY_DELAY_MS || '1000'),
    MAX_SLIPPAGE: Number(process.env.EXECUTION_MAX_SLIPPAGE || '0.01'),
  },
  NOTIFICATION: {
    TIMEOUT_MS: Number(process.env.NOTIFICATION_TIMEOUT_MS || '5000'),
    WORKERS: Number(process.env.NOTIFICATION_WORKERS || '3'),
  },
  METRICS: {
    ENABLED: (process.env.ENABLE_METRICS_SERVER || 'false').toLowerCase() === 'true',
    PORT: Number(process.env.METRICS_PORT || '9100'),
  },
};
