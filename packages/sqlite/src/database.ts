import * as fs from 'node:fs';
import * as path from 'node:path';

import { wrapError } from '@cnab-ingest/core';
import { getLogger } from '@cnab-ingest/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

const logger = getLogger('SqliteDatabase');

export const IN_MEMORY = ':memory:';

export interface CreateSqliteDatabaseOptions {
  /** How long a writer waits on a lock held by another worker process. */
  busyTimeoutMs?: number | undefined;
}

/**
 * Opens a SQLite file for several competing worker processes: WAL journaling so
 * readers never block the writer, enforced foreign keys, and a busy timeout so a
 * short write lock is waited out instead of failing the transaction.
 */
export function createSqliteDatabase<T>(
  dbPath: string,
  options: CreateSqliteDatabaseOptions = {}
): Result<Kysely<T>, Error> {
  try {
    if (dbPath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const connection = new Database(dbPath);
    connection.pragma('foreign_keys = ON');
    connection.pragma('journal_mode = WAL');
    connection.pragma('synchronous = NORMAL');
    connection.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);

    logger.debug({ dbPath }, 'Opened SQLite database');
    return ok(new Kysely<T>({ dialect: new SqliteDialect({ database: connection }) }));
  } catch (error) {
    logger.error({ error, dbPath }, 'Could not open SQLite database');
    return wrapError(error, `Failed to open SQLite database ${dbPath}`);
  }
}

export async function closeSqliteDatabase<T>(db: Kysely<T>): Promise<Result<void, Error>> {
  try {
    await db.destroy();
    logger.debug('Closed SQLite database');
    return ok();
  } catch (error) {
    logger.error({ error }, 'Could not close SQLite database');
    return wrapError(error, 'Failed to close SQLite database');
  }
}
