import { describe, expect, it, vi } from 'vitest';
import { createRetrier, RetryExhaustedError, withRetry } from '../../src/app/usecases/with_retry';
import { FakeClock } from '../helpers/fakes';

function recordingSleep(): { sleeps: number[]; sleep: (ms: number) => Promise<void> } {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleep: (ms) => {
      sleeps.push(ms);
      return Promise.resolve();
    }
  };
}

describe('withRetry', () => {
  it('returns the first success after two failures, sleeping with backoff', async () => {
    const { sleeps, sleep } = recordingSleep();
    const operation = vi
      .fn(() => Promise.resolve('ok'))
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    await expect(withRetry(operation, { sleep })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([500, 1000]);
  });

  it('wraps the last failure once every attempt has failed', async () => {
    const { sleeps, sleep } = recordingSleep();
    const lastError = new Error('third');
    const operation = vi
      .fn(() => Promise.resolve('never'))
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockRejectedValueOnce(lastError);

    const error = await withRetry(operation, { sleep, delayMs: 100, backoff: 3 }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toHaveProperty('attempts', 3);
    expect(error).toHaveProperty('cause', lastError);
    expect(error).toHaveProperty('message', 'retries exhausted after 3 attempts: third');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([100, 300]);
  });

  it('does not sleep after a single failed attempt', async () => {
    const { sleeps, sleep } = recordingSleep();

    await expect(
      withRetry(() => Promise.reject(new Error('down')), { sleep, tries: 1 })
    ).rejects.toThrowError(RetryExhaustedError);
    expect(sleeps).toEqual([]);
  });

  it('rejects a non-positive attempt budget', async () => {
    await expect(withRetry(() => Promise.resolve(1), { tries: 0 })).rejects.toThrowError(
      /tries must be a positive integer/
    );
  });
});

describe('createRetrier', () => {
  it('sleeps through the injected clock', async () => {
    const clock = new FakeClock();
    const retry = createRetrier(clock);
    const operation = vi.fn(() => Promise.resolve(42)).mockRejectedValueOnce(new Error('blip'));

    await expect(retry(operation)).resolves.toBe(42);
    expect(clock.sleeps).toEqual([500]);
  });
});
