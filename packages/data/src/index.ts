export { DataContext } from './data-context.js';
export {
  closeDatabase,
  createDatabase,
  getMigrationStatus,
  initializeDatabase,
  runMigrations,
  type KyselyDB,
} from './database.js';
export type { DatabaseSchema, FilesTable, StoresTable, TransactionsTable, TransactionTypesTable } from './schema/database-schema.js';
export { BaseRepository } from './repositories/base-repository.js';
export { FileRepository, type FinalizeFileParams } from './repositories/file-repository.js';
export { StoreRepository } from './repositories/store-repository.js';
export { TransactionRepository, type BalanceInput, type TransactionInsert } from './repositories/transaction-repository.js';
export { TransactionTypeRepository } from './repositories/transaction-type-repository.js';
export { runInTransaction } from './utils/db-utils.js';
