import { roundTo } from '../utils/math';

export const QUANTITY_DECIMALS = 8;
const QUANTITY_STEP = 10 ** -QUANTITY_DECIMALS;

const TICK_TABLE: ReadonlyArray<readonly [number, number]> = [
  [2_000_000, 1000],
  [1_000_000, 500],
  [500_000, 100],
  [100_000, 50],
  [10_000, 10],
  [1_000, 5],
  [100, 1],
  [10, 0.1],
  [1, 0.01]
];

const MIN_TICK = 0.001;

export function getTickSize(price: number): number {
  const row = TICK_TABLE.find(([lowerBound]) => price >= lowerBound);
  return row ? row[1] : MIN_TICK;
}

export function roundDownToTick(value: number, unit: number): number {
  if (unit === 0) {
    return value;
  }

  return roundTo(Math.floor(value / unit) * unit, QUANTITY_DECIMALS);
}

export function roundQuantity(quantity: number): number {
  return roundTo(quantity, QUANTITY_DECIMALS);
}

export function minQuantityForNotional(minNotional: number, price: number): number {
  if (price <= 0) {
    return 0;
  }

  return roundQuantity(minNotional / price);
}

export function ceilQuantityForNotional(minNotional: number, price: number): number {
  const quantity = minQuantityForNotional(minNotional, price);
  if (quantity === 0 || quantity * price >= minNotional) {
    return quantity;
  }

  return roundQuantity(quantity + QUANTITY_STEP);
}
