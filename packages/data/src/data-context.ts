import { getLogger } from '@cnab-ingest/logger';
import type { Result } from 'neverthrow';

import type { KyselyDB } from './database.js';
import { closeDatabase, initializeDatabase } from './database.js';
import { FileRepository } from './repositories/file-repository.js';
import { StoreRepository } from './repositories/store-repository.js';
import { TransactionRepository } from './repositories/transaction-repository.js';
import { TransactionTypeRepository } from './repositories/transaction-type-repository.js';
import { runInTransaction } from './utils/db-utils.js';

const logger = getLogger('DataContext');

/**
 * Unit of work over the ingestion database. Every repository on one context
 * shares its connection, so a context handed to `executeInTransaction`'s callback
 * reads and writes inside that transaction only.
 */
export class DataContext {
  static async initialize(dbPath: string): Promise<Result<DataContext, Error>> {
    const db = await initializeDatabase(dbPath);
    return db.map((connection) => new DataContext(connection));
  }

  readonly files: FileRepository;
  readonly stores: StoreRepository;
  readonly transactions: TransactionRepository;
  readonly transactionTypes: TransactionTypeRepository;

  constructor(private readonly connection: KyselyDB) {
    this.files = new FileRepository(connection);
    this.stores = new StoreRepository(connection);
    this.transactions = new TransactionRepository(connection);
    this.transactionTypes = new TransactionTypeRepository(connection);
  }

  /**
   * Commits when `work` returns ok; rolls back when it returns err or throws.
   */
  async executeInTransaction<T>(work: (tx: DataContext) => Promise<Result<T, Error>>): Promise<Result<T, Error>> {
    return runInTransaction(this.connection, logger, (trx) => work(new DataContext(trx)), 'Transaction failed');
  }

  async close(): Promise<Result<void, Error>> {
    return closeDatabase(this.connection);
  }
}
