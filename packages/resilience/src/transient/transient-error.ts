import { hasNumberProperty, hasProperty, hasStringProperty, isObject } from '@cnab-ingest/core';

const TRANSIENT_ERROR_NAMES = new Set([
  'AbortError',
  'RequestTimeout',
  'RequestTimeoutException',
  'ServiceUnavailable',
  'SlowDown',
  'ThrottlingException',
  'Throttling',
  'TimeoutError',
  'TooManyRequestsException',
  'InternalError',
]);

const TRANSIENT_ERROR_CODES = new Set([
  'EAI_AGAIN',
  'ECONNABORTED',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EPIPE',
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

function httpStatusOf(error: unknown): number | undefined {
  if (hasProperty(error, '$metadata') && hasNumberProperty(error.$metadata, 'httpStatusCode')) {
    return error.$metadata.httpStatusCode;
  }
  return undefined;
}

/**
 * Classifies failures from SDK and socket layers that are worth retrying:
 * throttling, timeouts, connection resets and 5xx responses.
 */
export function isTransientError(error: unknown, depth = 0): boolean {
  if (!isObject(error) || depth > 5) return false;

  if (hasProperty(error, '$retryable') && isObject(error.$retryable)) return true;

  const status = httpStatusOf(error);
  if (status !== undefined && (status === 429 || status >= 500)) return true;

  if (hasStringProperty(error, 'name') && TRANSIENT_ERROR_NAMES.has(error.name)) return true;
  if (hasStringProperty(error, 'code') && TRANSIENT_ERROR_CODES.has(error.code)) return true;

  if (hasProperty(error, 'cause')) return isTransientError(error.cause, depth + 1);

  return false;
}
