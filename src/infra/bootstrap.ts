import type { ClockPort } from '../app/ports/clock_port';
import type { ExchangePort } from '../app/ports/exchange_port';
import type { LoggerPort } from '../app/ports/logger_port';
import { runRound } from '../app/usecases/run_round';
import { SystemClock } from '../adapters/clock/system_clock';
import { BithumbClient } from '../adapters/exchange/bithumb_client';
import { BithumbExchange } from '../adapters/exchange/bithumb_exchange';
import { PaperExchange } from '../adapters/exchange/paper_exchange';
import type { BotConfig } from '../domain/model/types';
import { hourlyScheduleFrom } from '../domain/utils/time';
import { loadBotConfig } from './config/env';
import { createLogger } from './logging/logger';
import { createHourlyCron, type CronController } from './scheduler/cron_hourly';

export interface AppRuntime {
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createExchange(config: BotConfig, logger: LoggerPort): ExchangePort {
  const client = new BithumbClient({
    baseUrl: config.exchange.base_url,
    accessKey: config.exchange.access_key,
    secretKey: config.exchange.secret_key
  });

  if (config.execution.mode === 'PAPER') {
    return new PaperExchange(client, createLogger('paper'), {
      startKrw: config.execution.paper_start_krw,
      feeRate: config.strategy.fee_rate
    });
  }

  logger.warn('LIVE mode: orders will be sent to the exchange', { ticker: config.ticker });
  return new BithumbExchange(client);
}

export function bootstrap(clock: ClockPort = new SystemClock()): AppRuntime {
  const config = loadBotConfig();
  const logger = createLogger('bot');
  const exchange = createExchange(config, logger);

  logger.info('runtime mode selected', {
    mode: config.execution.mode,
    ticker: config.ticker,
    take_profit_pct: config.strategy.take_profit_pct,
    base_amount_krw: config.strategy.base_amount_krw,
    sizing_mode: config.strategy.sizing_mode
  });

  const executeRound = async (): Promise<void> => {
    await runRound({ config, exchange, clock, logger });
  };

  let scheduler: CronController | null = null;

  return {
    async start() {
      const schedule = hourlyScheduleFrom(clock.now());
      logger.info('bot startup: run first round immediately');
      await executeRound();

      scheduler = createHourlyCron(schedule, executeRound, logger);
      scheduler.start();
    },
    stop() {
      scheduler?.stop();
      logger.info('bot stopped');
      return Promise.resolve();
    }
  };
}
