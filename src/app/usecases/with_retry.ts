import type { ClockPort } from '../ports/clock_port';
import { sleep as timerSleep, toErrorMessage } from './usecase_utils';

const DEFAULT_TRIES = 3;
const DEFAULT_DELAY_MS = 500;
const DEFAULT_BACKOFF = 2;

export interface RetryOptions {
  tries?: number;
  delayMs?: number;
  backoff?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`retries exhausted after ${attempts} attempts: ${toErrorMessage(cause)}`, { cause });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const tries = options.tries ?? DEFAULT_TRIES;
  const backoff = options.backoff ?? DEFAULT_BACKOFF;
  const sleep = options.sleep ?? timerSleep;
  let delayMs = options.delayMs ?? DEFAULT_DELAY_MS;

  if (!Number.isInteger(tries) || tries < 1) {
    throw new Error(`tries must be a positive integer, got ${tries}`);
  }

  let lastError: unknown;
  for (let attempt = 1; attempt <= tries; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt === tries) {
        break;
      }

      await sleep(delayMs);
      delayMs *= backoff;
    }
  }

  throw new RetryExhaustedError(tries, lastError);
}

export type Retrier = <T>(operation: () => Promise<T>) => Promise<T>;

export function createRetrier(clock: ClockPort, options: Omit<RetryOptions, 'sleep'> = {}): Retrier {
  return (operation) =>
    withRetry(operation, {
      ...options,
      sleep: (ms) => clock.sleep(ms)
    });
}
