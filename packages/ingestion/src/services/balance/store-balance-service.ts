import type { StoreIdentity } from '@cnab-ingest/core';
import { formatAmount, parseAmount } from '@cnab-ingest/core';
import type { BalanceInput, StoreRepository, TransactionRepository } from '@cnab-ingest/data';
import { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { SignLookup } from '../sign-lookup.js';

export interface StoreBalance extends StoreIdentity {
  storeId: number;
  /** Two decimal places */
  balance: string;
  transactionCount: number;
}

/**
 * Σ(amount × sign) over the inputs. Decimal addition is exact, so the order of
 * the terms does not matter.
 */
export async function sumSignedAmounts(
  inputs: readonly BalanceInput[],
  signs: SignLookup
): Promise<Result<Decimal, Error>> {
  let total = new Decimal(0);
  for (const input of inputs) {
    const signedResult = await signs.signedAmount(input.typeCode, parseAmount(input.amount));
    if (signedResult.isErr()) return err(signedResult.error);
    total = total.plus(signedResult.value);
  }
  return ok(total);
}

/**
 * Balances are derived on demand; nothing here is stored.
 */
export class StoreBalanceService {
  constructor(
    private readonly stores: Pick<StoreRepository, 'findById' | 'list'>,
    private readonly transactions: Pick<TransactionRepository, 'findBalanceInputs'>,
    private readonly signs: SignLookup
  ) {}

  async getBalance(storeId: number): Promise<Result<StoreBalance | undefined, Error>> {
    const storeResult = await this.stores.findById(storeId);
    if (storeResult.isErr()) return err(storeResult.error);
    const store = storeResult.value;
    if (!store) return ok(undefined);

    const inputsResult = await this.transactions.findBalanceInputs(storeId);
    if (inputsResult.isErr()) return err(inputsResult.error);

    const totalResult = await sumSignedAmounts(inputsResult.value, this.signs);
    if (totalResult.isErr()) return err(totalResult.error);

    return ok({
      storeId: store.id,
      name: store.name,
      ownerName: store.ownerName,
      balance: formatAmount(totalResult.value),
      transactionCount: inputsResult.value.length,
    });
  }

  async listBalances(): Promise<Result<StoreBalance[], Error>> {
    const storesResult = await this.stores.list();
    if (storesResult.isErr()) return err(storesResult.error);

    const inputsResult = await this.transactions.findBalanceInputs();
    if (inputsResult.isErr()) return err(inputsResult.error);

    const inputsByStore = new Map<number, BalanceInput[]>();
    for (const input of inputsResult.value) {
      const bucket = inputsByStore.get(input.storeId);
      if (bucket) {
        bucket.push(input);
      } else {
        inputsByStore.set(input.storeId, [input]);
      }
    }

    const balances: StoreBalance[] = [];
    for (const store of storesResult.value) {
      const inputs = inputsByStore.get(store.id) ?? [];
      const totalResult = await sumSignedAmounts(inputs, this.signs);
      if (totalResult.isErr()) return err(totalResult.error);

      balances.push({
        storeId: store.id,
        name: store.name,
        ownerName: store.ownerName,
        balance: formatAmount(totalResult.value),
        transactionCount: inputs.length,
      });
    }
    return ok(balances);
  }
}
