import fs from 'fs';
import { z } from 'zod';
import { TRADING_MODES, type TradingMode } from '../strategies/types';

export const TIMEFRAMES = ['1s', '1m', '3m', '5m', '15m', '30m', '1h', '2h', '4h', '6h', '8h', '12h', '1d', '3d', '1w', '1M'] as const;

const thresholdSchema = z.object({
  enabled: z.boolean(),
  threshold: z.number().positive().optional(),
});

export const BotConfigSchema = z
  .object({
    exchange: z.object({
      name: z.string().min(1),
      tradingFee: z.number().min(0).max(1),
      tradingMode: z.enum(['backtest', 'paper_trading', 'live']),
    }),
    pair: z.object({
      baseCurrency: z.string().min(1),
      quoteCurrency: z.string().min(1),
    }),
    tradingSettings: z.object({
      timeframe: z.enum(TIMEFRAMES),
      period: z.object({
        startDate: z.string().min(1),
        endDate: z.string().min(1),
      }),
      initialBalance: z.number().positive(),
      historicalDataFile: z.string().min(1).optional(),
    }),
    gridStrategy: z.object({
      numGrids: z.number().int().min(2),
      range: z.object({
        top: z.number().positive(),
        bottom: z.number().positive(),
      }),
      spacing: z.object({
        type: z.enum(['arithmetic', 'geometric']),
        percentageSpacing: z.number().positive().optional(),
      }),
    }),
    riskManagement: z.object({
      takeProfit: thresholdSchema,
      stopLoss: thresholdSchema,
    }),
  })
  .superRefine((config, ctx) => {
    const { range, spacing } = config.gridStrategy;
    if (range.top <= range.bottom) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['gridStrategy', 'range'],
        message: 'top must be greater than bottom',
      });
    }
    if (spacing.type === 'geometric' && spacing.percentageSpacing === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['gridStrategy', 'spacing', 'percentageSpacing'],
        message: 'geometric spacing needs percentageSpacing',
      });
    }
    const { takeProfit, stopLoss } = config.riskManagement;
    if (takeProfit.enabled && takeProfit.threshold === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['riskManagement', 'takeProfit', 'threshold'],
        message: 'enabled take profit needs a threshold',
      });
    }
    if (stopLoss.enabled && stopLoss.threshold === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['riskManagement', 'stopLoss', 'threshold'],
        message: 'enabled stop loss needs a threshold',
      });
    }
    const start = Date.parse(config.tradingSettings.period.startDate);
    const end = Date.parse(config.tradingSettings.period.endDate);
    if (Number.isNaN(start) || Number.isNaN(end) || start >= end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tradingSettings', 'period'],
        message: 'period needs valid dates with startDate before endDate',
      });
    }
  });

export type BotConfig = z.infer<typeof BotConfigSchema>;

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid bot configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

export class ConfigFileError extends Error {
  constructor(public readonly filePath: string, cause?: unknown) {
    super(`Unable to read bot configuration from ${filePath}`, { cause });
    this.name = 'ConfigFileError';
  }
}

export function parseBotConfig(raw: unknown): BotConfig {
  const result = BotConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

export function loadBotConfig(filePath: string): BotConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigFileError(filePath, error);
  }
  return parseBotConfig(raw);
}

/** ccxt-style symbol, e.g. `BTC/USDT`. */
export function getPair(config: BotConfig) {
  return `${config.pair.baseCurrency}/${config.pair.quoteCurrency}`;
}

export function getTradingMode(config: BotConfig): TradingMode {
  const mode = config.exchange.tradingMode;
  return TRADING_MODES.includes(mode) ? mode : 'backtest';
}
