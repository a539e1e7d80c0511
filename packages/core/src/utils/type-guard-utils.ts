import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

/**
 * Message of a thrown value, whatever was thrown.
 */
export function getErrorMessage(error: unknown, fallback?: string): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string' && error !== '') return error;
  return fallback ?? String(error);
}

/**
 * Converts a caught value into an err, prefixing the message with what was being attempted.
 */
export function wrapError<T = never>(error: unknown, context: string): Result<T, Error> {
  return err(new Error(`${context}: ${getErrorMessage(error)}`, { cause: error }));
}

// Narrowing helpers for SDK and driver errors, which carry codes and metadata as loose properties

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function hasProperty<K extends string>(value: unknown, key: K): value is Record<K, unknown> {
  return isObject(value) && key in value;
}

export function hasStringProperty<K extends string>(value: unknown, key: K): value is Record<K, string> {
  return hasProperty(value, key) && typeof value[key] === 'string';
}

export function hasNumberProperty<K extends string>(value: unknown, key: K): value is Record<K, number> {
  return hasProperty(value, key) && typeof value[key] === 'number';
}
