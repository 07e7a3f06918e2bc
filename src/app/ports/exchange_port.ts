import type { OrderChance, OrderHandle, OrderStatus } from '../../domain/model/types';

export interface ExchangePort {
  getQuote(ticker: string): Promise<number>;
  getOrderChance(ticker: string): Promise<OrderChance>;
  placeLimitBuy(ticker: string, price: number, quantity: number): Promise<OrderHandle>;
  placeMarketBuy(ticker: string, notional: number): Promise<OrderHandle>;
  placeMarketSell(ticker: string, quantity: number): Promise<OrderHandle>;
  cancelOrder(uuid: string): Promise<void>;
  getOrderStatus(uuid: string): Promise<OrderStatus>;
}
