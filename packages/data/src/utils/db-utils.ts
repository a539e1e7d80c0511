import { wrapError } from '@cnab-ingest/core';
import type { Logger } from '@cnab-ingest/logger';
import type { ControlledTransaction, Kysely } from '@cnab-ingest/sqlite';
import type { Result } from 'neverthrow';

/**
 * Runs `work` inside one transaction. An ok result commits; an err result or a
 * throw rolls back. A failed rollback is logged and the original failure returned.
 */
export async function runInTransaction<T, TDB>(
  db: Kysely<TDB>,
  logger: Logger,
  work: (trx: ControlledTransaction<TDB>) => Promise<Result<T, Error>>,
  errorContext: string
): Promise<Result<T, Error>> {
  let trx: ControlledTransaction<TDB>;
  try {
    trx = await db.startTransaction().execute();
  } catch (error) {
    return wrapError(error, errorContext);
  }

  let result: Result<T, Error>;
  try {
    result = await work(trx);
  } catch (error) {
    await rollbackQuietly(trx, logger);
    return wrapError(error, errorContext);
  }

  if (result.isErr()) {
    await rollbackQuietly(trx, logger);
    return result;
  }

  try {
    await trx.commit().execute();
  } catch (error) {
    await rollbackQuietly(trx, logger);
    return wrapError(error, errorContext);
  }
  return result;
}

async function rollbackQuietly<TDB>(trx: ControlledTransaction<TDB>, logger: Logger): Promise<void> {
  try {
    await trx.rollback().execute();
  } catch (rollbackError) {
    logger.error({ rollbackError }, 'Rollback failed');
  }
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}
