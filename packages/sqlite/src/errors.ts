import { hasStringProperty } from '@cnab-ingest/core';

const UNIQUE_VIOLATION_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);
const LOCK_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

export function isUniqueConstraintError(error: unknown): boolean {
  return hasStringProperty(error, 'code') && UNIQUE_VIOLATION_CODES.has(error.code);
}

/**
 * Another connection held the write lock past the busy timeout.
 */
export function isDatabaseBusyError(error: unknown): boolean {
  return hasStringProperty(error, 'code') && LOCK_CODES.has(error.code);
}
