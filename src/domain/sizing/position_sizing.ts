import type { SizingMode } from '../model/types';
import { clamp } from '../utils/math';

export const MAX_SCALED_DRAWDOWN_PCT = 5;
const STEP_MULTIPLIER = 2;

export interface SizingInput {
  mode: SizingMode;
  baseAmount: number;
  currentPrice: number;
  avgBuyPrice: number;
  positionBalance: number;
  availableKrw: number;
  minTotal: number;
}

export interface BuySizingDecision {
  type: 'BUY';
  amount: number;
  multiplier: number;
  capped: boolean;
  summary: string;
}

export interface SkipSizingDecision {
  type: 'SKIP';
  reason: 'INSUFFICIENT_BALANCE' | 'BELOW_MIN_TOTAL';
  summary: string;
}

export type SizingDecision = BuySizingDecision | SkipSizingDecision;

function hasPosition(input: SizingInput): boolean {
  return input.positionBalance > 0 && input.avgBuyPrice > 0;
}

export function drawdownMultiplier(currentPrice: number, avgBuyPrice: number): number {
  if (avgBuyPrice <= 0 || currentPrice >= avgBuyPrice) {
    return 1;
  }

  const diffPct = ((avgBuyPrice - currentPrice) / avgBuyPrice) * 100;
  const capped = clamp(diffPct, 0, MAX_SCALED_DRAWDOWN_PCT);
  return 1 + capped / MAX_SCALED_DRAWDOWN_PCT;
}

function stepMultiplier(input: SizingInput): number {
  return hasPosition(input) && input.avgBuyPrice < input.currentPrice ? STEP_MULTIPLIER : 1;
}

export function decideBuyAmount(input: SizingInput): SizingDecision {
  const { mode, baseAmount, availableKrw, minTotal } = input;

  if (mode === 'STEP' && availableKrw < minTotal) {
    return {
      type: 'SKIP',
      reason: 'INSUFFICIENT_BALANCE',
      summary: `SKIPPED: KRW balance ${Math.floor(availableKrw)} below min total ${minTotal}`
    };
  }

  let multiplier = 1;
  if (mode === 'STEP') {
    multiplier = stepMultiplier(input);
  } else if (hasPosition(input)) {
    multiplier = drawdownMultiplier(input.currentPrice, input.avgBuyPrice);
  }

  let amount = Math.round(baseAmount * multiplier);
  if (amount < minTotal) {
    amount = Math.trunc(minTotal);
  }

  let capped = false;
  if (amount > availableKrw) {
    amount = Math.trunc(availableKrw);
    capped = true;

    if (amount < minTotal) {
      return {
        type: 'SKIP',
        reason: 'BELOW_MIN_TOTAL',
        summary: `SKIPPED: amount capped to available KRW ${amount} is below min total ${minTotal}`
      };
    }
  }

  return {
    type: 'BUY',
    amount,
    multiplier,
    capped,
    summary: `BUY ${amount} KRW (x${multiplier.toFixed(2)}${capped ? ', capped to balance' : ''})`
  };
}
