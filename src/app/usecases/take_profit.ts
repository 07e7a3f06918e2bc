import type { StepOutcome } from '../../domain/model/types';
import { effectivePnlPct, takeProfitTriggerPrice } from '../../domain/pricing/pnl';
import { ceilQuantityForNotional, roundQuantity } from '../../domain/pricing/tick_size';
import { percentOf, roundTo } from '../../domain/utils/math';
import type { ClockPort } from '../ports/clock_port';
import type { ExchangePort } from '../ports/exchange_port';
import type { LoggerPort } from '../ports/logger_port';
import { toErrorMessage } from './usecase_utils';
import { createRetrier } from './with_retry';

export const SELL_FRACTION_PCT = 10;

export interface TakeProfitInput {
  ticker: string;
  takeProfitPct: number;
  feeRate: number;
}

export interface TakeProfitDependencies {
  exchange: ExchangePort;
  clock: ClockPort;
  logger: LoggerPort;
}

export async function takeProfit(
  dependencies: TakeProfitDependencies,
  input: TakeProfitInput
): Promise<StepOutcome> {
  const { exchange, clock, logger } = dependencies;
  const { ticker, takeProfitPct, feeRate } = input;
  const retry = createRetrier(clock);

  try {
    const currentPrice = await retry(() => exchange.getQuote(ticker));
    const chance = await retry(() => exchange.getOrderChance(ticker));
    const { balance, avgBuyPrice, minTotal } = chance.ask;

    if (balance <= 0 || avgBuyPrice <= 0) {
      logger.info('sell skipped: no position', { balance, avg_buy_price: avgBuyPrice });
      return {
        type: 'SKIPPED',
        reason: 'NO_POSITION',
        summary: `SKIPPED: no position (balance=${balance}, avg=${avgBuyPrice})`
      };
    }

    const pnlPct = effectivePnlPct(currentPrice, avgBuyPrice, feeRate);
    if (pnlPct < takeProfitPct) {
      logger.info('sell skipped: target not reached', {
        pnl_pct: roundTo(pnlPct, 3),
        target_pct: takeProfitPct,
        trigger_price: roundTo(takeProfitTriggerPrice(avgBuyPrice, takeProfitPct, feeRate), 2),
        price: currentPrice
      });
      return {
        type: 'SKIPPED',
        reason: 'BELOW_TARGET',
        summary: `SKIPPED: pnl ${pnlPct.toFixed(3)}% below target ${takeProfitPct.toFixed(3)}%`
      };
    }

    let quantity = roundQuantity(percentOf(balance, SELL_FRACTION_PCT));
    const estimatedTotal = quantity * currentPrice;

    if (estimatedTotal < minTotal) {
      const minQuantity = ceilQuantityForNotional(minTotal, currentPrice);
      if (minQuantity > balance) {
        logger.info('sell skipped: below min total', {
          estimated_total: Math.round(estimatedTotal),
          min_total: minTotal,
          balance
        });
        return {
          type: 'SKIPPED',
          reason: 'BELOW_MIN_TOTAL',
          summary: `SKIPPED: sell total ${Math.round(estimatedTotal)} below min ${minTotal}`
        };
      }

      quantity = minQuantity;
    }

    const order = await retry(() => exchange.placeMarketSell(ticker, quantity));
    logger.info('market sell submitted', {
      ticker,
      volume: quantity,
      uuid: order.uuid,
      pnl_pct: roundTo(pnlPct, 3)
    });

    return {
      type: 'EXECUTED',
      summary: `EXECUTED: market sell volume=${quantity} at pnl ${pnlPct.toFixed(3)}%`,
      orders: [
        {
          uuid: order.uuid,
          side: 'ask',
          ord_type: 'market',
          volume: quantity
        }
      ]
    };
  } catch (error) {
    const errorMessage = toErrorMessage(error);
    logger.error('sell step failed', { ticker, error: errorMessage });

    return {
      type: 'FAILED',
      summary: `FAILED: sell (${errorMessage})`,
      error: errorMessage
    };
  }
}
