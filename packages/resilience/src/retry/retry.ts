import type { Result } from 'neverthrow';

import { delay as defaultDelay } from '../delay/delay.js';

import type { RetryOptions, RetryOutcome, RetryPolicy } from './types.js';

export const calculateExponentialBackoff = (attempt: number, baseDelayMs: number, maxDelayMs: number): number => {
  const delay = baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(delay, maxDelayMs);
};

/** Delays between attempts for a policy, in order. */
export function backoffSchedule(policy: RetryPolicy): number[] {
  return Array.from({ length: policy.retries }, (_, i) =>
    calculateExponentialBackoff(i + 1, policy.baseDelayMs, policy.maxDelayMs ?? Number.POSITIVE_INFINITY)
  );
}

/**
 * Runs a Result-returning operation, retrying err results with exponential backoff.
 * Thrown exceptions are not caught: operations report failures through their Result.
 */
export async function retryWithBackoff<T, E extends Error>(
  operation: (attempt: number) => Promise<Result<T, E>>,
  options: RetryOptions<E>
): Promise<RetryOutcome<T, E>> {
  const delay = options.effects?.delay ?? defaultDelay;
  const schedule = backoffSchedule(options.policy);

  let attempt = 1;
  for (;;) {
    const result = await operation(attempt);
    if (result.isOk()) {
      return { attempts: attempt, result };
    }

    const delayMs = schedule[attempt - 1];
    const retryable = options.shouldRetry?.(result.error) ?? true;
    if (delayMs === undefined || !retryable || options.signal?.aborted) {
      return { attempts: attempt, result };
    }

    options.onRetry?.({ attempt, delayMs, error: result.error });
    await delay(delayMs, options.signal);
    attempt += 1;
  }
}
