import type { TransactionSign, TransactionType } from '@cnab-ingest/core';
import { SignLookupError } from '@cnab-ingest/core';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

export interface TransactionTypeSource {
  findAll(): Promise<Result<TransactionType[], Error>>;
}

export function toSign(type: TransactionType): Result<TransactionSign, SignLookupError> {
  switch (type.sign) {
    case '+':
      return ok(1);
    case '-':
      return ok(-1);
    default:
      return err(
        new SignLookupError(`Transaction type ${type.typeCode} has invalid sign '${type.sign}'`, {
          additionalContext: { typeCode: type.typeCode, sign: type.sign },
        })
      );
  }
}

/**
 * Maps type codes to +1/-1 from the transaction_types table. The table is read
 * once per instance.
 */
export class SignLookup {
  private types: Map<number, TransactionType> | undefined;

  constructor(private readonly source: TransactionTypeSource) {}

  async sign(typeCode: number): Promise<Result<TransactionSign, Error>> {
    const typesResult = await this.load();
    if (typesResult.isErr()) return err(typesResult.error);

    const type = typesResult.value.get(typeCode);
    if (!type) {
      return err(
        new SignLookupError(`Unknown transaction type ${typeCode}`, { additionalContext: { typeCode } })
      );
    }
    return toSign(type);
  }

  async signedAmount(typeCode: number, amount: Decimal): Promise<Result<Decimal, Error>> {
    const signResult = await this.sign(typeCode);
    if (signResult.isErr()) return err(signResult.error);
    return ok(amount.times(signResult.value));
  }

  private async load(): Promise<Result<Map<number, TransactionType>, Error>> {
    if (this.types) return ok(this.types);

    const result = await this.source.findAll();
    if (result.isErr()) return err(result.error);

    this.types = new Map(result.value.map((type) => [type.typeCode, type]));
    return ok(this.types);
  }
}
