import type { BuyOrderState } from './order_state';

export type ExecutionMode = 'PAPER' | 'LIVE';
export type SizingMode = 'SCALED' | 'STEP';

export interface StrategyConfig {
  take_profit_pct: number;
  base_amount_krw: number;
  sizing_mode: SizingMode;
  fee_rate: number;
}

export interface ExecutionConfig {
  mode: ExecutionMode;
  paper_start_krw: number;
}

export interface ExchangeConfig {
  base_url: string;
  access_key?: string;
  secret_key?: string;
}

export interface BotConfig {
  ticker: string;
  execution: ExecutionConfig;
  exchange: ExchangeConfig;
  strategy: StrategyConfig;
}

export type OrderSide = 'bid' | 'ask';

export type OrderType = 'limit' | 'price' | 'market';

export type OrderState = 'wait' | 'done' | 'cancel';

export interface BidAccount {
  balance: number;
  minTotal: number;
}

export interface AskAccount {
  balance: number;
  minTotal: number;
  avgBuyPrice: number;
}

export interface OrderChance {
  bid: BidAccount;
  ask: AskAccount;
}

export interface OrderHandle {
  uuid: string;
}

export interface OrderStatus {
  uuid: string;
  state: OrderState;
  filledVolume: number;
  filledNotional: number;
  feePaid: number;
}

export type SkipReason = 'NO_POSITION' | 'BELOW_TARGET' | 'BELOW_MIN_TOTAL' | 'INSUFFICIENT_BALANCE';

export interface OrderSnapshot {
  uuid: string;
  side: OrderSide;
  ord_type: OrderType;
  price?: number;
  volume?: number;
  notional?: number;
}

export interface FillSnapshot {
  paid_total: number;
  fee_paid: number;
  estimated_volume: number;
}

export interface ExecutedStep {
  type: 'EXECUTED';
  summary: string;
  orders: OrderSnapshot[];
  final_state?: BuyOrderState;
  fill?: FillSnapshot;
}

export interface SkippedStep {
  type: 'SKIPPED';
  reason: SkipReason;
  summary: string;
}

export interface FailedStep {
  type: 'FAILED';
  summary: string;
  error: string;
}

export type StepOutcome = ExecutedStep | SkippedStep | FailedStep;

export interface RoundRecord {
  round_id: string;
  ticker: string;
  started_at_iso: string;
  finished_at_iso: string;
  sell: StepOutcome;
  buy: StepOutcome;
  summary: string;
}
