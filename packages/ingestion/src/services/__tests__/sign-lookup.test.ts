import type { TransactionType } from '@cnab-ingest/core';
import { SignLookupError } from '@cnab-ingest/core';
import { Decimal } from 'decimal.js';
import { err, ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { SignLookup, toSign } from '../sign-lookup.js';

const TYPES: TransactionType[] = [
  { typeCode: 1, description: 'Debit', nature: 'Expense', sign: '-' },
  { typeCode: 4, description: 'Credit', nature: 'Income', sign: '+' },
  { typeCode: 9, description: 'Rent', nature: 'Expense', sign: '?' },
];

function createLookup() {
  const findAll = vi.fn().mockResolvedValue(ok(TYPES));
  return { findAll, lookup: new SignLookup({ findAll }) };
}

describe('SignLookup', () => {
  it('maps the stored sign to a multiplier', async () => {
    const { lookup } = createLookup();

    expect((await lookup.sign(1))._unsafeUnwrap()).toBe(-1);
    expect((await lookup.sign(4))._unsafeUnwrap()).toBe(1);
  });

  it('reads the type table once', async () => {
    const { findAll, lookup } = createLookup();

    await lookup.sign(1);
    await lookup.sign(4);
    await lookup.sign(1);

    expect(findAll).toHaveBeenCalledTimes(1);
  });

  it('fails for an unknown code', async () => {
    const { lookup } = createLookup();

    const error = (await lookup.sign(7))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(SignLookupError);
    expect(error.message).toBe('Unknown transaction type 7');
  });

  it('fails for a stored sign that is neither + nor -', async () => {
    const { lookup } = createLookup();

    expect((await lookup.sign(9))._unsafeUnwrapErr().message).toBe("Transaction type 9 has invalid sign '?'");
  });

  it('passes through a failure to load the table and retries on the next call', async () => {
    const findAll = vi
      .fn()
      .mockResolvedValueOnce(err(new Error('database is locked')))
      .mockResolvedValueOnce(ok(TYPES));
    const lookup = new SignLookup({ findAll });

    expect((await lookup.sign(1))._unsafeUnwrapErr().message).toBe('database is locked');
    expect((await lookup.sign(1))._unsafeUnwrap()).toBe(-1);
  });

  it('signs an amount', async () => {
    const { lookup } = createLookup();

    const signed = (await lookup.signedAmount(1, new Decimal('150.00')))._unsafeUnwrap();

    expect(signed.toFixed(2)).toBe('-150.00');
  });
});

describe('toSign', () => {
  it('reads + and -', () => {
    expect(toSign({ typeCode: 6, description: 'Sales', nature: 'Income', sign: '+' })._unsafeUnwrap()).toBe(1);
    expect(toSign({ typeCode: 2, description: 'Boleto', nature: 'Expense', sign: '-' })._unsafeUnwrap()).toBe(-1);
  });
});
