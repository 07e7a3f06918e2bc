import {
  assertBuyOrderStateTransition,
  isTerminalBuyOrderState,
  type BuyOrderState
} from '../../domain/model/order_state';
import type { FillSnapshot, OrderSnapshot, StepOutcome } from '../../domain/model/types';
import { getTickSize, roundDownToTick, roundQuantity } from '../../domain/pricing/tick_size';
import { roundTo } from '../../domain/utils/math';
import type { ClockPort } from '../ports/clock_port';
import type { ExchangePort } from '../ports/exchange_port';
import type { LoggerPort } from '../ports/logger_port';
import { toErrorMessage } from './usecase_utils';
import { createRetrier, type Retrier } from './with_retry';

export const LIMIT_FILL_WAIT_MS = 5 * 60 * 1000;
export const MARKET_SETTLE_MS = 10_000;
export const MIN_TOTAL_SAFETY_MARGIN = 10;
const MIN_PRICE = 1e-12;

export type LimitPlanAdjustment = 'RAW_PRICE' | 'SAFETY_MARGIN';

export interface LimitBuyPlan {
  limitPrice: number;
  quantity: number;
  notional: number;
  adjustments: LimitPlanAdjustment[];
}

export interface PlaceBuyInput {
  ticker: string;
  amount: number;
  currentPrice: number;
  minTotal: number;
}

export interface PlaceBuyDependencies {
  exchange: ExchangePort;
  clock: ClockPort;
  logger: LoggerPort;
}

export function planLimitBuy(amount: number, currentPrice: number, minTotal: number): LimitBuyPlan {
  const tick = getTickSize(currentPrice);
  const adjustments: LimitPlanAdjustment[] = [];

  let limitPrice = roundDownToTick(currentPrice - tick, tick);
  let quantity = roundQuantity(amount / Math.max(limitPrice, MIN_PRICE));
  let notional = limitPrice * quantity;

  if (notional < minTotal) {
    adjustments.push('RAW_PRICE');
    limitPrice = currentPrice;
    quantity = roundQuantity(amount / limitPrice);
    notional = limitPrice * quantity;
  }

  if (notional <= minTotal) {
    adjustments.push('SAFETY_MARGIN');
    quantity = roundQuantity((minTotal + MIN_TOTAL_SAFETY_MARGIN) / limitPrice);
    notional = limitPrice * quantity;
  }

  return { limitPrice, quantity, notional, adjustments };
}

async function reportMarketFill(
  dependencies: PlaceBuyDependencies,
  retry: Retrier,
  ticker: string,
  uuid: string
): Promise<FillSnapshot | undefined> {
  const { exchange, clock, logger } = dependencies;

  try {
    await clock.sleep(MARKET_SETTLE_MS);
    const status = await retry(() => exchange.getOrderStatus(uuid));
    const quote = await retry(() => exchange.getQuote(ticker));
    const paidTotal = status.filledNotional + status.feePaid;
    const fill: FillSnapshot = {
      paid_total: roundTo(paidTotal, 2),
      fee_paid: status.feePaid,
      estimated_volume: roundQuantity(paidTotal / Math.max(quote, MIN_PRICE))
    };

    logger.info('market buy filled', {
      uuid,
      state: status.state,
      paid_total: fill.paid_total,
      price: quote,
      volume: fill.estimated_volume
    });

    return fill;
  } catch (error) {
    logger.warn('market buy fill lookup failed', { uuid, error: toErrorMessage(error) });
    return undefined;
  }
}

export async function placeBuy(
  dependencies: PlaceBuyDependencies,
  input: PlaceBuyInput
): Promise<StepOutcome> {
  const { exchange, clock, logger } = dependencies;
  const { ticker, amount, currentPrice, minTotal } = input;
  const retry = createRetrier(clock);

  const plan = planLimitBuy(amount, currentPrice, minTotal);
  if (plan.adjustments.length > 0) {
    logger.info('limit buy plan adjusted', {
      adjustments: plan.adjustments,
      price: plan.limitPrice,
      volume: plan.quantity,
      notional: roundTo(plan.notional, 2),
      min_total: minTotal
    });
  }

  const orders: OrderSnapshot[] = [];
  let state: BuyOrderState = 'CREATED';
  const moveState = (next: BuyOrderState): void => {
    assertBuyOrderStateTransition(state, next);
    state = next;
  };

  try {
    const limitOrder = await retry(() =>
      exchange.placeLimitBuy(ticker, plan.limitPrice, plan.quantity)
    );
    orders.push({
      uuid: limitOrder.uuid,
      side: 'bid',
      ord_type: 'limit',
      price: plan.limitPrice,
      volume: plan.quantity
    });
    moveState('PLACED');
    logger.info('limit buy submitted', {
      ticker,
      price: plan.limitPrice,
      amount,
      volume: plan.quantity,
      uuid: limitOrder.uuid
    });

    await clock.sleep(LIMIT_FILL_WAIT_MS);

    const status = await retry(() => exchange.getOrderStatus(limitOrder.uuid));
    moveState('CHECKED');

    if (status.state === 'done') {
      moveState('DONE');
      logger.info('limit buy filled', { uuid: limitOrder.uuid });

      return {
        type: 'EXECUTED',
        summary: `EXECUTED: limit buy filled, price=${plan.limitPrice}, volume=${plan.quantity}`,
        orders,
        final_state: state
      };
    }

    await retry(() => exchange.cancelOrder(limitOrder.uuid));
    moveState('CANCELED');
    logger.info('limit buy not filled, replacing with market buy', {
      uuid: limitOrder.uuid,
      state: status.state,
      amount
    });

    const marketOrder = await retry(() => exchange.placeMarketBuy(ticker, amount));
    orders.push({
      uuid: marketOrder.uuid,
      side: 'bid',
      ord_type: 'price',
      notional: amount
    });
    moveState('MARKET_REPLACED');

    const fill = await reportMarketFill(dependencies, retry, ticker, marketOrder.uuid);

    return {
      type: 'EXECUTED',
      summary: `EXECUTED: limit buy canceled, market buy ${amount} KRW submitted`,
      orders,
      final_state: state,
      fill
    };
  } catch (error) {
    const errorMessage = toErrorMessage(error);
    const failedFrom = state;
    if (!isTerminalBuyOrderState(state)) {
      state = 'FAILED';
    }
    logger.error('buy order failed', {
      ticker,
      amount,
      failed_from: failedFrom,
      state,
      error: errorMessage,
      orders
    });

    return {
      type: 'FAILED',
      summary: `FAILED: buy order (${errorMessage})`,
      error: errorMessage
    };
  }
}
