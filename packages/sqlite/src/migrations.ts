import { getErrorMessage, wrapError } from '@cnab-ingest/core';
import { getLogger } from '@cnab-ingest/logger';
import { Migrator, type Kysely, type Migration } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

const logger = getLogger('SqliteMigrations');

export interface MigrationStatus {
  executed: string[];
  pending: string[];
}

/** Migrations ship as modules keyed by name, e.g. '001_initial_schema', and run in key order. */
function migratorFor<T>(db: Kysely<T>, migrations: Record<string, Migration>): Migrator {
  return new Migrator({ db, provider: { getMigrations: () => Promise.resolve(migrations) } });
}

export async function runMigrations<T>(
  db: Kysely<T>,
  migrations: Record<string, Migration>
): Promise<Result<void, Error>> {
  try {
    const { error, results = [] } = await migratorFor(db, migrations).migrateToLatest();

    for (const { migrationName, status } of results) {
      if (status === 'Error') {
        logger.error({ migrationName }, 'Migration failed');
      } else if (status === 'Success') {
        logger.debug({ migrationName }, 'Migration applied');
      }
    }

    if (error !== undefined) {
      return err(new Error(`Migration failed: ${getErrorMessage(error, 'unknown error')}`, { cause: error }));
    }
    return ok();
  } catch (error) {
    return wrapError(error, 'Failed to run migrations');
  }
}

export async function getMigrationStatus<T>(
  db: Kysely<T>,
  migrations: Record<string, Migration>
): Promise<Result<MigrationStatus, Error>> {
  try {
    const known = await migratorFor(db, migrations).getMigrations();
    const executed: string[] = [];
    const pending: string[] = [];
    for (const migration of known) {
      (migration.executedAt === undefined ? pending : executed).push(migration.name);
    }
    return ok({ executed, pending });
  } catch (error) {
    return wrapError(error, 'Failed to read migration status');
  }
}
