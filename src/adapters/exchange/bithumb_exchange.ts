import type { ExchangePort } from '../../app/ports/exchange_port';
import type { OrderChance, OrderHandle, OrderState, OrderStatus } from '../../domain/model/types';
import { QUANTITY_DECIMALS } from '../../domain/pricing/tick_size';
import type { BithumbClient, BithumbOrder } from './bithumb_client';

export const DEFAULT_MIN_TOTAL_KRW = 5000;

export function formatDecimal(value: number, decimals: number = QUANTITY_DECIMALS): string {
  const fixed = value.toFixed(decimals);
  return fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed;
}

export function toOrderState(state: string | undefined): OrderState {
  switch (state) {
    case 'done':
      return 'done';
    case 'cancel':
      return 'cancel';
    default:
      return 'wait';
  }
}

export function toOrderStatus(order: BithumbOrder): OrderStatus {
  const trades = order.trades ?? [];
  const filledNotional = trades.reduce((sum, trade) => sum + trade.funds, 0);

  return {
    uuid: order.uuid,
    state: toOrderState(order.state),
    filledVolume: order.executed_volume ?? 0,
    filledNotional,
    feePaid: order.paid_fee ?? 0
  };
}

export class BithumbExchange implements ExchangePort {
  constructor(private readonly client: BithumbClient) {}

  getQuote(ticker: string): Promise<number> {
    return this.client.getTradePrice(ticker);
  }

  async getOrderChance(ticker: string): Promise<OrderChance> {
    const chance = await this.client.getOrderChance(ticker);

    return {
      bid: {
        balance: chance.bid_account.balance,
        minTotal: chance.market?.bid?.min_total ?? DEFAULT_MIN_TOTAL_KRW
      },
      ask: {
        balance: chance.ask_account.balance,
        minTotal: chance.market?.ask?.min_total ?? DEFAULT_MIN_TOTAL_KRW,
        avgBuyPrice: chance.ask_account.avg_buy_price ?? 0
      }
    };
  }

  async placeLimitBuy(ticker: string, price: number, quantity: number): Promise<OrderHandle> {
    const order = await this.client.createOrder({
      market: ticker,
      side: 'bid',
      ord_type: 'limit',
      price: formatDecimal(price),
      volume: formatDecimal(quantity)
    });

    return { uuid: order.uuid };
  }

  async placeMarketBuy(ticker: string, notional: number): Promise<OrderHandle> {
    const order = await this.client.createOrder({
      market: ticker,
      side: 'bid',
      ord_type: 'price',
      price: formatDecimal(notional, 0)
    });

    return { uuid: order.uuid };
  }

  async placeMarketSell(ticker: string, quantity: number): Promise<OrderHandle> {
    const order = await this.client.createOrder({
      market: ticker,
      side: 'ask',
      ord_type: 'market',
      volume: formatDecimal(quantity)
    });

    return { uuid: order.uuid };
  }

  async cancelOrder(uuid: string): Promise<void> {
    await this.client.cancelOrder(uuid);
  }

  async getOrderStatus(uuid: string): Promise<OrderStatus> {
    const order = await this.client.getOrder(uuid);
    return toOrderStatus(order);
  }
}
