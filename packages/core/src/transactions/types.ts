import type { Decimal } from 'decimal.js';

/** Composite key used to deduplicate stores across files. */
export interface StoreIdentity {
  name: string;
  ownerName: string;
}

export function storeIdentityKey(identity: StoreIdentity): string {
  return `${identity.name}\u0000${identity.ownerName}`;
}

export interface Store extends StoreIdentity {
  id: number;
  createdAt: Date;
  updatedAt: Date | undefined;
}

/**
 * One decoded CNAB line, before its store has been resolved to an id.
 */
export interface ParsedTransaction {
  lineNumber: number;
  typeCode: number;
  /** YYYY-MM-DD */
  occurredOn: string;
  /** HH:MM:SS */
  occurredAt: string;
  amount: Decimal;
  customerId: string;
  cardId: string;
  store: StoreIdentity;
}

export interface Transaction {
  id: number;
  fileId: string;
  storeId: number;
  typeCode: number;
  amount: Decimal;
  occurredOn: string;
  occurredAt: string;
  customerId: string;
  cardId: string;
  createdAt: Date;
}

export type TransactionNature = 'Income' | 'Expense';

export type TransactionSign = 1 | -1;

export interface TransactionType {
  typeCode: number;
  description: string;
  nature: TransactionNature;
  /** Raw sign column, "+" or "-" */
  sign: string;
}
