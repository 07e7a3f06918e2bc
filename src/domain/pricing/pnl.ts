export const DEFAULT_FEE_RATE = 0.0004;

export function effectivePnlPct(
  currentPrice: number,
  avgPrice: number,
  feeRate: number = DEFAULT_FEE_RATE
): number {
  if (avgPrice <= 0) {
    return 0;
  }

  const costBasis = avgPrice * (1 + feeRate);
  const proceeds = currentPrice * (1 - feeRate);
  return ((proceeds - costBasis) / costBasis) * 100;
}

export function takeProfitTriggerPrice(
  avgPrice: number,
  targetPct: number,
  feeRate: number = DEFAULT_FEE_RATE
): number {
  if (avgPrice <= 0) {
    return 0;
  }

  return (avgPrice * (1 + feeRate) * (1 + targetPct / 100)) / (1 - feeRate);
}
