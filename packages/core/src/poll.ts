/**
 * Fixed-interval polling combinator.
 *
 * Runs `operation` until `isDone` accepts its value or `maxAttempts` is spent,
 * sleeping `intervalMs` between attempts (never after the last one).
 */

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface PollOptions<T> {
  maxAttempts: number;
  intervalMs: number;
  isDone: (value: T) => boolean;
  sleep?: Sleep;
  /** Called after every attempt, before any sleep */
  onAttempt?: (attempt: number, value: T, willRetry: boolean) => void;
}

export interface PollResult<T> {
  done: boolean;
  attempts: number;
  waitedMs: number;
  last: T;
}

export async function pollUntil<T>(
  operation: (attempt: number) => Promise<T>,
  options: PollOptions<T>
): Promise<PollResult<T>> {
  const { maxAttempts, intervalMs, isDone, sleep = defaultSleep, onAttempt } = options;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  if (intervalMs < 0) {
    throw new RangeError(`intervalMs must not be negative, got ${intervalMs}`);
  }

  let waitedMs = 0;
  let attempt = 1;

  while (true) {
    const value = await operation(attempt);
    const done = isDone(value);
    const willRetry = !done && attempt < maxAttempts;
    onAttempt?.(attempt, value, willRetry);

    if (!willRetry) {
      return { done, attempts: attempt, waitedMs, last: value };
    }

    await sleep(intervalMs);
    waitedMs += intervalMs;
    attempt += 1;
  }
}
