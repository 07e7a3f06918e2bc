import { randomUUID } from 'node:crypto';
import type { ExchangePort } from '../../app/ports/exchange_port';
import type { LoggerPort } from '../../app/ports/logger_port';
import type {
  OrderChance,
  OrderHandle,
  OrderSide,
  OrderState,
  OrderStatus,
  OrderType
} from '../../domain/model/types';
import { roundQuantity } from '../../domain/pricing/tick_size';
import { DEFAULT_MIN_TOTAL_KRW } from './bithumb_exchange';

export interface QuoteSource {
  getTradePrice(market: string): Promise<number>;
}

export interface PaperExchangeOptions {
  startKrw: number;
  feeRate: number;
  minTotal?: number;
}

interface PaperOrder {
  uuid: string;
  ticker: string;
  side: OrderSide;
  ordType: OrderType;
  state: OrderState;
  price: number;
  volume: number;
  reservedKrw: number;
  filledVolume: number;
  filledNotional: number;
  feePaid: number;
}

export class PaperExchange implements ExchangePort {
  private krw: number;
  private coin = 0;
  private avgBuyPrice = 0;
  private readonly orders = new Map<string, PaperOrder>();
  private readonly feeRate: number;
  private readonly minTotal: number;

  constructor(
    private readonly quotes: QuoteSource,
    private readonly logger: LoggerPort,
    options: PaperExchangeOptions
  ) {
    this.krw = options.startKrw;
    this.feeRate = options.feeRate;
    this.minTotal = options.minTotal ?? DEFAULT_MIN_TOTAL_KRW;
  }

  getQuote(ticker: string): Promise<number> {
    return this.quotes.getTradePrice(ticker);
  }

  getOrderChance(ticker: string): Promise<OrderChance> {
    void ticker;

    return Promise.resolve({
      bid: { balance: this.krw, minTotal: this.minTotal },
      ask: { balance: this.coin, minTotal: this.minTotal, avgBuyPrice: this.avgBuyPrice }
    });
  }

  placeLimitBuy(ticker: string, price: number, quantity: number): Promise<OrderHandle> {
    const notional = price * quantity;
    this.assertMinTotal(notional);
    const reservedKrw = notional * (1 + this.feeRate);
    if (reservedKrw > this.krw) {
      return Promise.reject(new Error(`paper: insufficient KRW (need ${reservedKrw}, have ${this.krw})`));
    }

    this.krw -= reservedKrw;
    const order = this.createOrder(ticker, 'bid', 'limit', price, quantity, reservedKrw);
    this.logger.info('paper limit buy placed', { uuid: order.uuid, price, volume: quantity });
    return Promise.resolve({ uuid: order.uuid });
  }

  async placeMarketBuy(ticker: string, notional: number): Promise<OrderHandle> {
    this.assertMinTotal(notional);
    const fee = notional * this.feeRate;
    if (notional + fee > this.krw) {
      throw new Error(`paper: insufficient KRW (need ${notional + fee}, have ${this.krw})`);
    }

    const price = await this.quotes.getTradePrice(ticker);
    const volume = roundQuantity(notional / price);
    const order = this.createOrder(ticker, 'bid', 'price', price, volume, 0);
    this.krw -= notional + fee;
    this.fillBuy(order, price, volume, fee);
    return { uuid: order.uuid };
  }

  async placeMarketSell(ticker: string, quantity: number): Promise<OrderHandle> {
    if (quantity > this.coin) {
      throw new Error(`paper: insufficient volume (need ${quantity}, have ${this.coin})`);
    }

    const price = await this.quotes.getTradePrice(ticker);
    const proceeds = price * quantity;
    this.assertMinTotal(proceeds);
    const fee = proceeds * this.feeRate;
    const order = this.createOrder(ticker, 'ask', 'market', price, quantity, 0);

    this.coin = roundQuantity(this.coin - quantity);
    if (this.coin === 0) {
      this.avgBuyPrice = 0;
    }
    this.krw += proceeds - fee;
    order.state = 'done';
    order.filledVolume = quantity;
    order.filledNotional = proceeds;
    order.feePaid = fee;

    this.logger.info('paper market sell filled', { uuid: order.uuid, price, volume: quantity });
    return { uuid: order.uuid };
  }

  cancelOrder(uuid: string): Promise<void> {
    const order = this.orders.get(uuid);
    if (!order) {
      return Promise.reject(new Error(`paper: order ${uuid} not found`));
    }
    if (order.state !== 'wait') {
      return Promise.reject(new Error(`paper: order ${uuid} is ${order.state}, cannot cancel`));
    }

    order.state = 'cancel';
    this.krw += order.reservedKrw;
    order.reservedKrw = 0;
    return Promise.resolve();
  }

  async getOrderStatus(uuid: string): Promise<OrderStatus> {
    const order = this.orders.get(uuid);
    if (!order) {
      throw new Error(`paper: order ${uuid} not found`);
    }

    if (order.state === 'wait') {
      const price = await this.quotes.getTradePrice(order.ticker);
      if (price <= order.price) {
        const notional = order.price * order.volume;
        const fee = notional * this.feeRate;
        this.krw += order.reservedKrw - notional - fee;
        order.reservedKrw = 0;
        this.fillBuy(order, order.price, order.volume, fee);
      }
    }

    return {
      uuid: order.uuid,
      state: order.state,
      filledVolume: order.filledVolume,
      filledNotional: order.filledNotional,
      feePaid: order.feePaid
    };
  }

  private assertMinTotal(notional: number): void {
    if (notional < this.minTotal) {
      throw new Error(`paper: order total ${notional} below min total ${this.minTotal}`);
    }
  }

  private createOrder(
    ticker: string,
    side: OrderSide,
    ordType: OrderType,
    price: number,
    volume: number,
    reservedKrw: number
  ): PaperOrder {
    const order: PaperOrder = {
      uuid: `PAPER_${randomUUID()}`,
      ticker,
      side,
      ordType,
      state: 'wait',
      price,
      volume,
      reservedKrw,
      filledVolume: 0,
      filledNotional: 0,
      feePaid: 0
    };
    this.orders.set(order.uuid, order);
    return order;
  }

  private fillBuy(order: PaperOrder, price: number, volume: number, fee: number): void {
    const nextCoin = this.coin + volume;
    this.avgBuyPrice = (this.avgBuyPrice * this.coin + price * volume) / nextCoin;
    this.coin = roundQuantity(nextCoin);

    order.state = 'done';
    order.filledVolume = volume;
    order.filledNotional = price * volume;
    order.feePaid = fee;

    this.logger.info('paper buy filled', {
      uuid: order.uuid,
      ord_type: order.ordType,
      price,
      volume,
      avg_buy_price: this.avgBuyPrice
    });
  }
}
