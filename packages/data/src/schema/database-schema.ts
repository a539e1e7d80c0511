import type { FileStatus, TransactionNature } from '@cnab-ingest/core';
import type { Generated } from '@cnab-ingest/sqlite';

/**
 * Timestamps are ISO-8601 strings; amounts are decimal strings with two places.
 */
export interface FilesTable {
  id: string;
  name: string;
  size_bytes: number;
  object_key: string;
  status: FileStatus;
  error_message: string | null;
  uploaded_at: string;
  processed_at: string | null;
  created_at: string;
  updated_at: string | null;
}

export interface StoresTable {
  id: Generated<number>;
  name: string;
  owner_name: string;
  created_at: string;
  updated_at: string | null;
}

export interface TransactionTypesTable {
  type_code: number;
  description: string;
  nature: TransactionNature;
  sign: string;
}

export interface TransactionsTable {
  id: Generated<number>;
  file_id: string;
  store_id: number;
  type_code: number;
  amount: string;
  /** YYYY-MM-DD */
  occurred_on: string;
  /** HH:MM:SS */
  occurred_at: string;
  customer_id: string;
  card_id: string;
  created_at: string;
}

export interface DatabaseSchema {
  files: FilesTable;
  stores: StoresTable;
  transaction_types: TransactionTypesTable;
  transactions: TransactionsTable;
}
