import type { BotConfig } from '../../domain/model/types';
import { configSchema } from './schema';

export interface Env {
  TICKER: string;
  TAKE_PROFIT_PCT: string;
  EXECUTION_MODE?: string;
  BITHUMB_ACCESS_KEY?: string;
  BITHUMB_SECRET_KEY?: string;
  BITHUMB_BASE_URL?: string;
  BASE_AMOUNT_KRW?: string;
  SIZING_MODE?: string;
  FEE_RATE?: string;
  PAPER_START_KRW?: string;
}

const REQUIRED_ENV_KEYS = ['TICKER', 'TAKE_PROFIT_PCT'] as const;

function readOptional(source: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = source[key]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function readRequired(source: NodeJS.ProcessEnv, key: string): string {
  const value = readOptional(source, key);
  if (value === undefined) {
    throw new Error(`Missing required env var: ${key}`);
  }

  return value;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const missing = REQUIRED_ENV_KEYS.filter((key) => readOptional(source, key) === undefined);

  if (missing.length > 0) {
    throw new Error(`Missing required env vars: ${missing.join(', ')}`);
  }

  return {
    TICKER: readRequired(source, 'TICKER'),
    TAKE_PROFIT_PCT: readRequired(source, 'TAKE_PROFIT_PCT'),
    EXECUTION_MODE: readOptional(source, 'EXECUTION_MODE'),
    BITHUMB_ACCESS_KEY: readOptional(source, 'BITHUMB_ACCESS_KEY'),
    BITHUMB_SECRET_KEY: readOptional(source, 'BITHUMB_SECRET_KEY'),
    BITHUMB_BASE_URL: readOptional(source, 'BITHUMB_BASE_URL'),
    BASE_AMOUNT_KRW: readOptional(source, 'BASE_AMOUNT_KRW'),
    SIZING_MODE: readOptional(source, 'SIZING_MODE'),
    FEE_RATE: readOptional(source, 'FEE_RATE'),
    PAPER_START_KRW: readOptional(source, 'PAPER_START_KRW')
  };
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

export function buildBotConfig(env: Env): BotConfig {
  const parsed = configSchema.safeParse({
    ticker: env.TICKER,
    execution: {
      mode: env.EXECUTION_MODE,
      paper_start_krw: toNumber(env.PAPER_START_KRW)
    },
    exchange: {
      base_url: env.BITHUMB_BASE_URL,
      access_key: env.BITHUMB_ACCESS_KEY,
      secret_key: env.BITHUMB_SECRET_KEY
    },
    strategy: {
      take_profit_pct: toNumber(env.TAKE_PROFIT_PCT),
      base_amount_krw: toNumber(env.BASE_AMOUNT_KRW),
      sizing_mode: env.SIZING_MODE,
      fee_rate: toNumber(env.FEE_RATE)
    }
  });

  if (!parsed.success) {
    throw new Error(`bot config validation failed: ${parsed.error.message}`);
  }

  return parsed.data;
}

export function loadBotConfig(source: NodeJS.ProcessEnv = process.env): BotConfig {
  return buildBotConfig(loadEnv(source));
}
