import type { ParsedTransaction, Transaction } from '@cnab-ingest/core';
import { formatAmount, parseAmount, wrapError } from '@cnab-ingest/core';
import type { Insertable, Selectable } from '@cnab-ingest/sqlite';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import type { KyselyDB } from '../database.js';
import type { TransactionsTable } from '../schema/database-schema.js';
import { chunk } from '../utils/db-utils.js';

import { BaseRepository } from './base-repository.js';

// Nine bound parameters per row
const INSERT_CHUNK_SIZE = 500;

export interface TransactionInsert {
  transaction: ParsedTransaction;
  storeId: number;
}

/** The columns a balance needs. */
export interface BalanceInput {
  storeId: number;
  typeCode: number;
  amount: string;
}

function toTransaction(row: Selectable<TransactionsTable>): Transaction {
  return {
    id: row.id,
    fileId: row.file_id,
    storeId: row.store_id,
    typeCode: row.type_code,
    amount: parseAmount(row.amount),
    occurredOn: row.occurred_on,
    occurredAt: row.occurred_at,
    customerId: row.customer_id,
    cardId: row.card_id,
    createdAt: new Date(row.created_at),
  };
}

export class TransactionRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'TransactionRepository');
  }

  /**
   * Bulk insert in file order. Callers wanting all-or-nothing run this inside DataContext.executeInTransaction.
   */
  async insertMany(fileId: string, inserts: readonly TransactionInsert[]): Promise<Result<number, Error>> {
    if (inserts.length === 0) return ok(0);

    try {
      const createdAt = this.nowIso();
      const rows: Insertable<TransactionsTable>[] = inserts.map(({ transaction, storeId }) => ({
        file_id: fileId,
        store_id: storeId,
        type_code: transaction.typeCode,
        amount: formatAmount(transaction.amount),
        occurred_on: transaction.occurredOn,
        occurred_at: transaction.occurredAt,
        customer_id: transaction.customerId,
        card_id: transaction.cardId,
        created_at: createdAt,
      }));

      let inserted = 0;
      for (const batch of chunk(rows, INSERT_CHUNK_SIZE)) {
        await this.db.insertInto('transactions').values(batch).execute();
        inserted += batch.length;
      }

      this.logger.debug({ fileId, inserted }, 'Inserted transactions');
      return ok(inserted);
    } catch (error) {
      return wrapError(error, `Failed to insert transactions for file ${fileId}`);
    }
  }

  async countByFile(fileId: string): Promise<Result<number, Error>> {
    try {
      const row = await this.db
        .selectFrom('transactions')
        .select((eb) => eb.fn.countAll<number>().as('count'))
        .where('file_id', '=', fileId)
        .executeTakeFirstOrThrow();
      return ok(Number(row.count));
    } catch (error) {
      return wrapError(error, `Failed to count transactions for file ${fileId}`);
    }
  }

  async findByFile(fileId: string): Promise<Result<Transaction[], Error>> {
    try {
      const rows = await this.db
        .selectFrom('transactions')
        .selectAll()
        .where('file_id', '=', fileId)
        .orderBy('id')
        .execute();
      return ok(rows.map(toTransaction));
    } catch (error) {
      return wrapError(error, `Failed to load transactions for file ${fileId}`);
    }
  }

  async findByStore(
    storeId: number,
    filters?: { from?: string | undefined; to?: string | undefined }
  ): Promise<Result<Transaction[], Error>> {
    try {
      let query = this.db.selectFrom('transactions').selectAll().where('store_id', '=', storeId);
      if (filters?.from) {
        query = query.where('occurred_on', '>=', filters.from);
      }
      if (filters?.to) {
        query = query.where('occurred_on', '<=', filters.to);
      }
      const rows = await query.orderBy('occurred_on').orderBy('occurred_at').orderBy('id').execute();
      return ok(rows.map(toTransaction));
    } catch (error) {
      return wrapError(error, `Failed to load transactions for store ${storeId}`);
    }
  }

  /**
   * Balance inputs for one store, or for every store when storeId is omitted.
   */
  async findBalanceInputs(storeId?: number): Promise<Result<BalanceInput[], Error>> {
    try {
      let query = this.db.selectFrom('transactions').select(['store_id', 'type_code', 'amount']);
      if (storeId !== undefined) {
        query = query.where('store_id', '=', storeId);
      }
      const rows = await query.execute();
      return ok(rows.map((row) => ({ storeId: row.store_id, typeCode: row.type_code, amount: row.amount })));
    } catch (error) {
      return wrapError(error, 'Failed to load balance inputs');
    }
  }
}
