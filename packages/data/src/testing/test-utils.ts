import type { NewIngestFile } from '@cnab-ingest/core';

import { DataContext } from '../data-context.js';
import type { KyselyDB } from '../database.js';
import { initializeDatabase } from '../database.js';

/**
 * A fresh in-memory database with the schema and transaction types in place.
 */
export async function createTestDatabase(): Promise<KyselyDB> {
  const db = await initializeDatabase(':memory:');
  if (db.isErr()) throw db.error;
  return db.value;
}

export async function createTestDataContext(): Promise<DataContext> {
  return new DataContext(await createTestDatabase());
}

let fileSequence = 0;

export function buildNewFile(overrides: Partial<NewIngestFile> = {}): NewIngestFile {
  fileSequence += 1;
  const suffix = String(fileSequence).padStart(12, '0');
  return {
    id: `00000000-0000-4000-8000-${suffix}`,
    name: `CNAB-${fileSequence}.txt`,
    sizeBytes: 81,
    objectKey: `uploads/${suffix}/CNAB-${fileSequence}.txt`,
    uploadedAt: new Date('2024-03-01T12:00:00.000Z'),
    ...overrides,
  };
}
