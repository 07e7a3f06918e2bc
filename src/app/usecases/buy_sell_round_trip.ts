import { ceilQuantityForNotional, roundQuantity } from '../../domain/pricing/tick_size';
import type { ClockPort } from '../ports/clock_port';
import type { ExchangePort } from '../ports/exchange_port';
import type { LoggerPort } from '../ports/logger_port';
import { createRetrier } from './with_retry';

export const BALANCE_SETTLE_MS = 3000;
const MIN_PRICE = 1e-12;

export interface RoundTripInput {
  ticker: string;
  amountKrw: number;
}

export interface RoundTripDependencies {
  exchange: ExchangePort;
  clock: ClockPort;
  logger: LoggerPort;
}

export interface RoundTripResult {
  buyUuid: string;
  sellUuid: string;
  volume: number;
}

export async function runBuySellRoundTrip(
  dependencies: RoundTripDependencies,
  input: RoundTripInput
): Promise<RoundTripResult> {
  const { exchange, clock, logger } = dependencies;
  const { ticker, amountKrw } = input;
  const retry = createRetrier(clock);

  const price = await retry(() => exchange.getQuote(ticker));
  const chance = await retry(() => exchange.getOrderChance(ticker));
  logger.info('preflight', {
    ticker,
    price,
    bid_min: chance.bid.minTotal,
    ask_min: chance.ask.minTotal,
    krw_available: chance.bid.balance,
    coin_available: chance.ask.balance
  });

  if (amountKrw < chance.bid.minTotal) {
    throw new Error(`amount ${amountKrw} is below min total ${chance.bid.minTotal}`);
  }
  if (chance.bid.balance < amountKrw) {
    throw new Error(`insufficient KRW: available=${chance.bid.balance}, need=${amountKrw}`);
  }

  const buy = await retry(() => exchange.placeMarketBuy(ticker, amountKrw));
  logger.info('market buy submitted', { uuid: buy.uuid, amount: amountKrw });

  await clock.sleep(BALANCE_SETTLE_MS);

  const sellPrice = await retry(() => exchange.getQuote(ticker));
  const afterBuy = await retry(() => exchange.getOrderChance(ticker));
  const coinAvailable = afterBuy.ask.balance;
  let volume = roundQuantity(amountKrw / Math.max(sellPrice, MIN_PRICE));

  if (volume > coinAvailable) {
    logger.warn('sell volume reduced to available balance', { volume, available: coinAvailable });
    volume = roundQuantity(coinAvailable);
  }

  const estimatedTotal = volume * sellPrice;
  if (estimatedTotal < afterBuy.ask.minTotal) {
    const minVolume = ceilQuantityForNotional(afterBuy.ask.minTotal, sellPrice);
    if (minVolume > coinAvailable) {
      throw new Error(
        `sell total ${Math.round(estimatedTotal)} below min ${afterBuy.ask.minTotal}, available ${coinAvailable}`
      );
    }

    logger.info('sell volume raised to min total', { from: volume, to: minVolume });
    volume = minVolume;
  }

  const sell = await retry(() => exchange.placeMarketSell(ticker, volume));
  logger.info('market sell submitted', {
    uuid: sell.uuid,
    volume,
    estimated_total: Math.round(volume * sellPrice)
  });

  return { buyUuid: buy.uuid, sellUuid: sell.uuid, volume };
}
