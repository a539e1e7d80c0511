export { delay, type DelayFn } from './delay/delay.js';
export { backoffSchedule, calculateExponentialBackoff, retryWithBackoff } from './retry/retry.js';
export type { RetryAttempt, RetryEffects, RetryOptions, RetryOutcome, RetryPolicy } from './retry/types.js';
export { isTransientError } from './transient/transient-error.js';
