import { describe, it, expect, vi } from 'vitest';
import { pollUntil } from '../poll.js';
import { recordingSleep } from './helpers.js';

describe('pollUntil', () => {
  it('stops at the first accepted value', async () => {
    const { sleep, delays } = recordingSleep();
    const operation = vi.fn(async (attempt: number) => attempt);

    const result = await pollUntil(operation, {
      maxAttempts: 5,
      intervalMs: 100,
      isDone: (value) => value === 3,
      sleep,
    });

    expect(result).toEqual({ done: true, attempts: 3, waitedMs: 200, last: 3 });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 100]);
  });

  it('does not sleep after the last attempt', async () => {
    const { sleep, delays } = recordingSleep();

    const result = await pollUntil(async () => 'nope', {
      maxAttempts: 3,
      intervalMs: 10,
      isDone: () => false,
      sleep,
    });

    expect(result).toEqual({ done: false, attempts: 3, waitedMs: 20, last: 'nope' });
    expect(delays).toEqual([10, 10]);
  });

  it('reports every attempt with its retry decision', async () => {
    const { sleep } = recordingSleep();
    const onAttempt = vi.fn();

    await pollUntil(async (attempt) => attempt, { maxAttempts: 2, intervalMs: 0, isDone: () => false, sleep, onAttempt });

    expect(onAttempt.mock.calls).toEqual([
      [1, 1, true],
      [2, 2, false],
    ]);
  });

  it('rejects a non-positive attempt budget', async () => {
    await expect(pollUntil(async () => 1, { maxAttempts: 0, intervalMs: 1, isDone: () => true })).rejects.toThrow(
      RangeError
    );
  });

  it('propagates errors thrown by the operation', async () => {
    const { sleep } = recordingSleep();
    await expect(
      pollUntil(
        async () => {
          throw new Error('boom');
        },
        { maxAttempts: 3, intervalMs: 1, isDone: () => true, sleep }
      )
    ).rejects.toThrow('boom');
  });
});
