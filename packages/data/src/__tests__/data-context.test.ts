import { err, ok } from 'neverthrow';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { DataContext } from '../data-context.js';
import { buildNewFile, createTestDataContext } from '../testing/test-utils.js';

describe('DataContext.executeInTransaction', () => {
  let ctx: DataContext;

  beforeEach(async () => {
    ctx = await createTestDataContext();
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('commits every write when the callback returns ok', async () => {
    const file = buildNewFile();

    const result = await ctx.executeInTransaction(async (tx) => {
      await tx.files.create(file);
      await tx.stores.insertIgnoringConflicts([{ name: 'Acme', ownerName: 'Jane' }]);
      return ok('done');
    });

    expect(result._unsafeUnwrap()).toBe('done');
    expect((await ctx.files.findById(file.id))._unsafeUnwrap()?.id).toBe(file.id);
    expect((await ctx.stores.list())._unsafeUnwrap()).toHaveLength(1);
  });

  it('rolls back every write when the callback returns err', async () => {
    const file = buildNewFile();

    const result = await ctx.executeInTransaction(async (tx) => {
      await tx.files.create(file);
      await tx.stores.insertIgnoringConflicts([{ name: 'Acme', ownerName: 'Jane' }]);
      return err(new Error('bulk insert failed'));
    });

    expect(result._unsafeUnwrapErr().message).toBe('bulk insert failed');
    expect((await ctx.files.findById(file.id))._unsafeUnwrap()).toBeUndefined();
    expect((await ctx.stores.list())._unsafeUnwrap()).toEqual([]);
  });

  it('rolls back and wraps the error when the callback throws', async () => {
    const file = buildNewFile();

    const result = await ctx.executeInTransaction(async (tx) => {
      await tx.files.create(file);
      throw new Error('connection reset');
    });

    expect(result._unsafeUnwrapErr().message).toBe('Transaction failed: connection reset');
    expect((await ctx.files.findById(file.id))._unsafeUnwrap()).toBeUndefined();
  });
});
