import type { Result } from 'neverthrow';

import type { DelayFn } from '../delay/delay.js';

export interface RetryPolicy {
  /** Retries after the first attempt. */
  retries: number;
  baseDelayMs: number;
  maxDelayMs?: number | undefined;
}

export interface RetryEffects {
  delay: DelayFn;
}

export interface RetryAttempt {
  attempt: number;
  delayMs: number;
  error: Error;
}

export interface RetryOptions<E extends Error> {
  policy: RetryPolicy;
  /** Errors this rejects are returned immediately. Defaults to retrying everything. */
  shouldRetry?: ((error: E) => boolean) | undefined;
  onRetry?: ((attempt: RetryAttempt) => void) | undefined;
  signal?: AbortSignal | undefined;
  effects?: Partial<RetryEffects> | undefined;
}

export interface RetryOutcome<T, E extends Error> {
  result: Result<T, E>;
  /** Total attempts made, including the first. */
  attempts: number;
}
