import { describe, expect, it } from 'vitest';
import {
  ceilQuantityForNotional,
  getTickSize,
  minQuantityForNotional,
  roundDownToTick
} from '../../src/domain/pricing/tick_size';

describe('getTickSize', () => {
  it.each([
    [3_500_000, 1000],
    [2_000_000, 1000],
    [1_999_999, 500],
    [1_000_000, 500],
    [500_000, 100],
    [499_999, 50],
    [100_000, 50],
    [10_000, 10],
    [9_999, 5],
    [1_000, 5],
    [999, 1],
    [100, 1],
    [99.9, 0.1],
    [10, 0.1],
    [9.99, 0.01],
    [1, 0.01],
    [0.5, 0.001]
  ])('price %d uses tick %d', (price, tick) => {
    expect(getTickSize(price)).toBe(tick);
  });
});

describe('roundDownToTick', () => {
  it('floors to the tick grid', () => {
    expect(roundDownToTick(12_345, 10)).toBe(12_340);
    expect(roundDownToTick(49_999_500, 1000)).toBe(49_999_000);
    expect(roundDownToTick(15.555, 0.1)).toBeCloseTo(15.5, 8);
    expect(roundDownToTick(0.98765, 0.001)).toBeCloseTo(0.987, 8);
  });

  it('returns the value unchanged for a zero unit', () => {
    expect(roundDownToTick(12.345678912, 0)).toBe(12.345678912);
  });

  it('never rounds up and lands on a multiple of the tick', () => {
    const prices = [1234.567, 98_765.4321, 2_345_678.9, 0.98765, 15.555, 733.3];

    for (const price of prices) {
      const unit = getTickSize(price);
      const rounded = roundDownToTick(price, unit);
      const steps = rounded / unit;

      expect(rounded).toBeLessThanOrEqual(price);
      expect(Math.abs(steps - Math.round(steps))).toBeLessThan(1e-6);
    }
  });
});

describe('minQuantityForNotional', () => {
  it('divides the minimum by the price with 8 decimals', () => {
    expect(minQuantityForNotional(5000, 50_000_000)).toBe(0.0001);
    expect(minQuantityForNotional(10_000, 110)).toBe(90.90909091);
  });

  it('returns 0 for a non-positive price', () => {
    expect(minQuantityForNotional(5000, 0)).toBe(0);
    expect(minQuantityForNotional(5000, -1)).toBe(0);
  });

  it('covers the minimum within quantity rounding', () => {
    for (const price of [123.45, 9_876.5, 51_234_000, 0.37]) {
      const quantity = minQuantityForNotional(5000, price);
      expect(quantity * price).toBeGreaterThanOrEqual(5000 - price * 5e-9);
    }
  });
});

describe('ceilQuantityForNotional', () => {
  it('steps up when rounding leaves the notional under the minimum', () => {
    expect(minQuantityForNotional(5000, 60_000)).toBe(0.08333333);
    expect(ceilQuantityForNotional(5000, 60_000)).toBe(0.08333334);
  });

  it('keeps quantities that already reach the minimum', () => {
    expect(ceilQuantityForNotional(10_000, 110)).toBe(90.90909091);
    expect(ceilQuantityForNotional(5000, 50_000_000)).toBe(0.0001);
    expect(ceilQuantityForNotional(5000, 0)).toBe(0);
  });

  it('always reaches the minimum', () => {
    for (const price of [60_000, 70_000, 123.45, 9_876.5, 51_234_000, 0.37]) {
      expect(ceilQuantityForNotional(5000, price) * price).toBeGreaterThanOrEqual(5000);
    }
  });
});
