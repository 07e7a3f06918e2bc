export const BUY_ORDER_STATE_VALUES = [
  'CREATED',
  'PLACED',
  'CHECKED',
  'DONE',
  'CANCELED',
  'MARKET_REPLACED',
  'FAILED'
] as const;

export type BuyOrderState = (typeof BUY_ORDER_STATE_VALUES)[number];

const ALLOWED_TRANSITIONS: Record<BuyOrderState, readonly BuyOrderState[]> = {
  CREATED: ['PLACED', 'FAILED'],
  PLACED: ['CHECKED', 'FAILED'],
  CHECKED: ['DONE', 'CANCELED', 'FAILED'],
  CANCELED: ['MARKET_REPLACED', 'FAILED'],
  DONE: [],
  MARKET_REPLACED: [],
  FAILED: []
};

export function canTransitionBuyOrderState(from: BuyOrderState, to: BuyOrderState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertBuyOrderStateTransition(from: BuyOrderState, to: BuyOrderState): void {
  if (!canTransitionBuyOrderState(from, to)) {
    throw new Error(`Invalid buy order state transition: ${from} -> ${to}`);
  }
}

export function isTerminalBuyOrderState(state: BuyOrderState): boolean {
  return ALLOWED_TRANSITIONS[state].length === 0;
}
