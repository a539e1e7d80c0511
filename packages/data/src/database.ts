import { getLogger } from '@cnab-ingest/logger';
import {
  closeSqliteDatabase,
  createSqliteDatabase,
  getMigrationStatus as readMigrationStatus,
  runMigrations as applyMigrations,
  type Kysely,
  type MigrationStatus,
} from '@cnab-ingest/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import * as initialSchema from './migrations/001_initial_schema.js';
import type { DatabaseSchema } from './schema/database-schema.js';

export type KyselyDB = Kysely<DatabaseSchema>;

const logger = getLogger('IngestDatabase');

const MIGRATIONS = {
  '001_initial_schema': initialSchema,
};

export function createDatabase(dbPath: string): Result<KyselyDB, Error> {
  return createSqliteDatabase<DatabaseSchema>(dbPath);
}

export function closeDatabase(db: KyselyDB): Promise<Result<void, Error>> {
  return closeSqliteDatabase(db);
}

export function runMigrations(db: KyselyDB): Promise<Result<void, Error>> {
  return applyMigrations(db, MIGRATIONS);
}

export function getMigrationStatus(db: KyselyDB): Promise<Result<MigrationStatus, Error>> {
  return readMigrationStatus(db, MIGRATIONS);
}

/**
 * Opens the database and applies pending migrations, including the transaction type seed.
 * The connection is closed again if migrating fails.
 */
export async function initializeDatabase(dbPath: string): Promise<Result<KyselyDB, Error>> {
  const created = createDatabase(dbPath);
  if (created.isErr()) return created;

  const db = created.value;
  const migrated = await runMigrations(db);
  if (migrated.isErr()) {
    const closed = await closeDatabase(db);
    if (closed.isErr()) {
      logger.warn({ error: closed.error.message }, 'Could not close database after failed migration');
    }
    return err(migrated.error);
  }

  logger.debug({ dbPath }, 'Database ready');
  return ok(db);
}
