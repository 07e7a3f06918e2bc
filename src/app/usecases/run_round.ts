import type { BotConfig, RoundRecord, StepOutcome } from '../../domain/model/types';
import { effectivePnlPct } from '../../domain/pricing/pnl';
import { roundTo } from '../../domain/utils/math';
import { buildRoundId } from '../../domain/utils/time';
import type { ClockPort } from '../ports/clock_port';
import type { ExchangePort } from '../ports/exchange_port';
import type { LoggerPort } from '../ports/logger_port';
import { accumulatePosition } from './accumulate_position';
import { takeProfit } from './take_profit';
import { nowIso, toErrorMessage } from './usecase_utils';
import { createRetrier } from './with_retry';

export interface RunRoundDependencies {
  config: BotConfig;
  exchange: ExchangePort;
  clock: ClockPort;
  logger: LoggerPort;
}

async function guardStep(
  logger: LoggerPort,
  step: 'sell' | 'buy',
  run: () => Promise<StepOutcome>
): Promise<StepOutcome> {
  try {
    return await run();
  } catch (error) {
    const errorMessage = toErrorMessage(error);
    logger.error(`${step} step unhandled error`, { error: errorMessage });

    return {
      type: 'FAILED',
      summary: `FAILED: unhandled ${step} error`,
      error: errorMessage
    };
  }
}

async function logPositionSummary(dependencies: RunRoundDependencies): Promise<void> {
  const { config, exchange, clock, logger } = dependencies;
  const retry = createRetrier(clock);

  try {
    const chance = await retry(() => exchange.getOrderChance(config.ticker));
    const currentPrice = await retry(() => exchange.getQuote(config.ticker));
    const pnlPct = effectivePnlPct(currentPrice, chance.ask.avgBuyPrice, config.strategy.fee_rate);

    logger.info('position summary', {
      avg_buy_price: roundTo(chance.ask.avgBuyPrice, 2),
      price: roundTo(currentPrice, 2),
      pnl_pct: roundTo(pnlPct, 3),
      balance: chance.ask.balance,
      krw_available: Math.floor(chance.bid.balance)
    });
  } catch (error) {
    logger.warn('position summary unavailable', { error: toErrorMessage(error) });
  }
}

export async function runRound(dependencies: RunRoundDependencies): Promise<RoundRecord> {
  const { config, exchange, clock, logger } = dependencies;
  const startedAt = clock.now();
  const roundId = buildRoundId(config.ticker, startedAt);

  logger.info('round started', { round_id: roundId, ticker: config.ticker });

  const sell = await guardStep(logger, 'sell', () =>
    takeProfit(
      { exchange, clock, logger },
      {
        ticker: config.ticker,
        takeProfitPct: config.strategy.take_profit_pct,
        feeRate: config.strategy.fee_rate
      }
    )
  );

  const buy = await guardStep(logger, 'buy', () =>
    accumulatePosition(
      { exchange, clock, logger },
      {
        ticker: config.ticker,
        baseAmount: config.strategy.base_amount_krw,
        sizingMode: config.strategy.sizing_mode
      }
    )
  );

  await logPositionSummary(dependencies);

  const record: RoundRecord = {
    round_id: roundId,
    ticker: config.ticker,
    started_at_iso: startedAt.toISOString(),
    finished_at_iso: nowIso(clock),
    sell,
    buy,
    summary: `sell=${sell.type}, buy=${buy.type}`
  };

  logger.info('round finished', {
    round_id: record.round_id,
    summary: record.summary,
    sell: sell.summary,
    buy: buy.summary
  });

  return record;
}
