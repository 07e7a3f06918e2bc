export function buildRoundId(ticker: string, startedAt: Date): string {
  const safeIso = startedAt.toISOString().replace(/[:.]/g, '-');
  return `${safeIso}_${ticker}`;
}

export function hourlyScheduleFrom(anchor: Date): string {
  return `${anchor.getUTCMinutes()} * * * *`;
}
