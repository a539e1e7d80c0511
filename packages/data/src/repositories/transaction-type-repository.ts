import type { TransactionType } from '@cnab-ingest/core';
import { wrapError } from '@cnab-ingest/core';
import type { Selectable } from '@cnab-ingest/sqlite';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import type { KyselyDB } from '../database.js';
import type { TransactionTypesTable } from '../schema/database-schema.js';

import { BaseRepository } from './base-repository.js';

function toTransactionType(row: Selectable<TransactionTypesTable>): TransactionType {
  return {
    typeCode: row.type_code,
    description: row.description,
    nature: row.nature,
    sign: row.sign,
  };
}

export class TransactionTypeRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'TransactionTypeRepository');
  }

  async findAll(): Promise<Result<TransactionType[], Error>> {
    try {
      const rows = await this.db.selectFrom('transaction_types').selectAll().orderBy('type_code').execute();
      return ok(rows.map(toTransactionType));
    } catch (error) {
      return wrapError(error, 'Failed to load transaction types');
    }
  }

  async findByCode(typeCode: number): Promise<Result<TransactionType | undefined, Error>> {
    try {
      const row = await this.db
        .selectFrom('transaction_types')
        .selectAll()
        .where('type_code', '=', typeCode)
        .executeTakeFirst();
      return ok(row ? toTransactionType(row) : undefined);
    } catch (error) {
      return wrapError(error, `Failed to load transaction type ${typeCode}`);
    }
  }
}
