import { sql, type Kysely } from '@cnab-ingest/sqlite';

import { loadTransactionTypeSeed } from '../seed/transaction-types.js';

// eslint-disable-next-line @typescript-eslint/no-explicit-any -- migrations run against the untyped schema
export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('files')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('size_bytes', 'integer', (col) => col.notNull())
    .addColumn('object_key', 'text', (col) => col.notNull().unique())
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('Uploaded'))
    .addColumn('error_message', 'text')
    .addColumn('uploaded_at', 'text', (col) => col.notNull())
    .addColumn('processed_at', 'text')
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .addColumn('updated_at', 'text')
    .addCheckConstraint('files_status_valid', sql`status IN ('Uploaded', 'Processing', 'Processed', 'Rejected')`)
    .addCheckConstraint('files_error_message_length', sql`error_message IS NULL OR length(error_message) <= 1000`)
    .execute();

  await db.schema.createIndex('idx_files_status').on('files').column('status').execute();

  await db.schema
    .createTable('stores')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('owner_name', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .addColumn('updated_at', 'text')
    .addCheckConstraint('stores_name_length', sql`length(name) BETWEEN 1 AND 19`)
    .addCheckConstraint('stores_owner_name_length', sql`length(owner_name) BETWEEN 1 AND 14`)
    .execute();

  // Store identity; concurrent creators of the same store collide here
  await db.schema.createIndex('idx_stores_identity').on('stores').columns(['name', 'owner_name']).unique().execute();

  await db.schema
    .createTable('transaction_types')
    .addColumn('type_code', 'integer', (col) => col.primaryKey())
    .addColumn('description', 'text', (col) => col.notNull())
    .addColumn('nature', 'text', (col) => col.notNull())
    .addColumn('sign', 'text', (col) => col.notNull())
    .addCheckConstraint('transaction_types_nature_valid', sql`nature IN ('Income', 'Expense')`)
    .addCheckConstraint('transaction_types_sign_valid', sql`sign IN ('+', '-')`)
    .execute();

  await db.schema
    .createTable('transactions')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('file_id', 'text', (col) => col.notNull().references('files.id').onDelete('cascade'))
    .addColumn('store_id', 'integer', (col) => col.notNull().references('stores.id').onDelete('restrict'))
    .addColumn('type_code', 'integer', (col) => col.notNull().references('transaction_types.type_code'))
    .addColumn('amount', 'text', (col) => col.notNull())
    .addColumn('occurred_on', 'text', (col) => col.notNull())
    .addColumn('occurred_at', 'text', (col) => col.notNull())
    .addColumn('customer_id', 'text', (col) => col.notNull())
    .addColumn('card_id', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull().defaultTo(sql`(datetime('now'))`))
    .addCheckConstraint('transactions_customer_id_length', sql`length(customer_id) = 11`)
    .addCheckConstraint('transactions_card_id_length', sql`length(card_id) = 12`)
    .execute();

  await db.schema.createIndex('idx_transactions_file_id').on('transactions').column('file_id').execute();
  await db.schema.createIndex('idx_transactions_store_id').on('transactions').column('store_id').execute();
  await db.schema.createIndex('idx_transactions_occurred_on').on('transactions').column('occurred_on').execute();

  const seed = loadTransactionTypeSeed();
  await db
    .insertInto('transaction_types')
    .values(
      seed.map((type) => ({
        type_code: type.typeCode,
        description: type.description,
        nature: type.nature,
        sign: type.sign,
      }))
    )
    .execute();
}

// eslint-disable-next-line @typescript-eslint/no-explicit-any -- migrations run against the untyped schema
export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('transactions').ifExists().execute();
  await db.schema.dropTable('transaction_types').ifExists().execute();
  await db.schema.dropTable('stores').ifExists().execute();
  await db.schema.dropTable('files').ifExists().execute();
}
