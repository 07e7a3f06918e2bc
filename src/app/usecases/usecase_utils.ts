import type { ClockPort } from '../ports/clock_port';

export function nowIso(clock?: ClockPort): string {
  return (clock?.now() ?? new Date()).toISOString();
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
