import type { SizingMode, StepOutcome } from '../../domain/model/types';
import { decideBuyAmount, type SizingDecision } from '../../domain/sizing/position_sizing';
import type { ClockPort } from '../ports/clock_port';
import type { ExchangePort } from '../ports/exchange_port';
import type { LoggerPort } from '../ports/logger_port';
import { placeBuy } from './place_buy';
import { toErrorMessage } from './usecase_utils';
import { createRetrier } from './with_retry';

export interface AccumulatePositionInput {
  ticker: string;
  baseAmount: number;
  sizingMode: SizingMode;
}

export interface AccumulatePositionDependencies {
  exchange: ExchangePort;
  clock: ClockPort;
  logger: LoggerPort;
}

export async function accumulatePosition(
  dependencies: AccumulatePositionDependencies,
  input: AccumulatePositionInput
): Promise<StepOutcome> {
  const { exchange, clock, logger } = dependencies;
  const { ticker, baseAmount, sizingMode } = input;
  const retry = createRetrier(clock);

  let currentPrice: number;
  let minTotal: number;
  let decision: SizingDecision;
  try {
    currentPrice = await retry(() => exchange.getQuote(ticker));
    const chance = await retry(() => exchange.getOrderChance(ticker));
    minTotal = chance.bid.minTotal;

    decision = decideBuyAmount({
      mode: sizingMode,
      baseAmount,
      currentPrice,
      avgBuyPrice: chance.ask.avgBuyPrice,
      positionBalance: chance.ask.balance,
      availableKrw: chance.bid.balance,
      minTotal
    });
  } catch (error) {
    const errorMessage = toErrorMessage(error);
    logger.error('buy step failed before sizing', { ticker, error: errorMessage });

    return {
      type: 'FAILED',
      summary: `FAILED: buy sizing (${errorMessage})`,
      error: errorMessage
    };
  }

  if (decision.type === 'SKIP') {
    logger.info('buy skipped', { reason: decision.reason, summary: decision.summary });
    return {
      type: 'SKIPPED',
      reason: decision.reason,
      summary: decision.summary
    };
  }

  logger.info('buy amount decided', {
    mode: sizingMode,
    amount: decision.amount,
    multiplier: decision.multiplier,
    capped: decision.capped,
    price: currentPrice
  });

  return placeBuy(
    { exchange, clock, logger },
    {
      ticker,
      amount: decision.amount,
      currentPrice,
      minTotal
    }
  );
}
