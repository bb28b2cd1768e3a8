import axios from 'axios';
import { CONFIG } from '../config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown> | undefined;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHT;
}

function serializeMeta(meta: LogMeta) {
  if (!meta) return {};
  const serialized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value instanceof Error) {
      serialized[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (typeof value === 'object' && value !== null) {
      serialized[key] = JSON.parse(JSON.stringify(value, (_key, val: unknown) => {
        if (val instanceof Error) {
          return { name: val.name, message: val.message, stack: val.stack };
        }
        return val;
      }));
    } else {
      serialized[key] = value;
    }
  }
  return serialized;
}

let ingestionWebhook: string | null = null;
let baseMeta: Record<string, unknown> = {};
let threshold: LogLevel = isLogLevel(CONFIG.LOG_LEVEL) ? CONFIG.LOG_LEVEL : 'info';

function emit(level: LogLevel, msg: string, meta?: LogMeta) {
  if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[threshold]) return;
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    msg,
    ...baseMeta,
    ...serializeMeta(meta),
  };
  const line = JSON.stringify(entry);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else if (level === 'debug') {
    console.debug(line);
  } else {
    console.log(line);
  }

  if (ingestionWebhook) {
    axios
      .post(ingestionWebhook, entry, { timeout: 2000 })
      .catch((error: unknown) => {
        console.error(JSON.stringify({ level: 'error', msg: 'log_ingest_failed', error: String(error) }));
      });
  }
}

export const logger = {
  debug(msg: string, meta?: LogMeta) {
    emit('debug', msg, meta);
  },
  info(msg: string, meta?: LogMeta) {
    emit('info', msg, meta);
  },
  warn(msg: string, meta?: LogMeta) {
    emit('warn', msg, meta);
  },
  error(msg: string, meta?: LogMeta) {
    emit('error', msg, meta);
  },
};

export function setLogLevel(level: string) {
  if (!isLogLevel(level)) {
    throw new Error(`invalid_log_level:${level}`);
  }
  threshold = level;
}

/** Every entry is also POSTed to `url`; pass null to stop. */
export function setLogIngestionWebhook(url: string | null) {
  ingestionWebhook = url;
}

/** Fields merged into every entry, e.g. the pair and trading mode of the running bot. */
export function setLogContext(meta: Record<string, unknown>) {
  baseMeta = { ...meta };
}

export function clearLogContext() {
  baseMeta = {};
}
