export { closeSqliteDatabase, createSqliteDatabase, IN_MEMORY, type CreateSqliteDatabaseOptions } from './database.js';
export { getMigrationStatus, runMigrations, type MigrationStatus } from './migrations.js';
export { isDatabaseBusyError, isUniqueConstraintError } from './errors.js';

// Consumers take kysely through this package so there is a single copy of its types
export {
  Kysely,
  sql,
  type ControlledTransaction,
  type Generated,
  type Insertable,
  type Migration,
  type Selectable,
} from 'kysely';
