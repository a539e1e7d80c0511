import { readFileSync } from 'node:fs';

import type { TransactionType } from '@cnab-ingest/core';
import { z } from 'zod';

const TransactionTypeSeedSchema = z.array(
  z.object({
    typeCode: z.number().int().min(1).max(9),
    description: z.string().min(1),
    nature: z.enum(['Income', 'Expense']),
    sign: z.enum(['+', '-']),
  })
);

export function loadTransactionTypeSeed(): TransactionType[] {
  const raw: unknown = JSON.parse(readFileSync(new URL('./transaction-types.json', import.meta.url), 'utf8'));
  return TransactionTypeSeedSchema.parse(raw);
}
