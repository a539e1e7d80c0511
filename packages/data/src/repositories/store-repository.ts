import type { Store, StoreIdentity } from '@cnab-ingest/core';
import { wrapError } from '@cnab-ingest/core';
import type { Selectable } from '@cnab-ingest/sqlite';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import type { KyselyDB } from '../database.js';
import type { StoresTable } from '../schema/database-schema.js';
import { chunk } from '../utils/db-utils.js';

import { BaseRepository } from './base-repository.js';

// Two bound parameters per identity; stays far below SQLite's variable limit
const IDENTITY_CHUNK_SIZE = 200;

function toStore(row: Selectable<StoresTable>): Store {
  return {
    id: row.id,
    name: row.name,
    ownerName: row.owner_name,
    createdAt: new Date(row.created_at),
    updatedAt: row.updated_at ? new Date(row.updated_at) : undefined,
  };
}

export class StoreRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'StoreRepository');
  }

  async findById(id: number): Promise<Result<Store | undefined, Error>> {
    try {
      const row = await this.db.selectFrom('stores').selectAll().where('id', '=', id).executeTakeFirst();
      return ok(row ? toStore(row) : undefined);
    } catch (error) {
      return wrapError(error, `Failed to load store ${id}`);
    }
  }

  async list(): Promise<Result<Store[], Error>> {
    try {
      const rows = await this.db.selectFrom('stores').selectAll().orderBy('name').orderBy('owner_name').execute();
      return ok(rows.map(toStore));
    } catch (error) {
      return wrapError(error, 'Failed to list stores');
    }
  }

  async findByIdentities(identities: readonly StoreIdentity[]): Promise<Result<Store[], Error>> {
    if (identities.length === 0) return ok([]);

    try {
      const stores: Store[] = [];
      for (const batch of chunk(identities, IDENTITY_CHUNK_SIZE)) {
        const rows = await this.db
          .selectFrom('stores')
          .selectAll()
          .where((eb) =>
            eb.or(
              batch.map((identity) =>
                eb.and([eb('name', '=', identity.name), eb('owner_name', '=', identity.ownerName)])
              )
            )
          )
          .execute();
        stores.push(...rows.map(toStore));
      }
      return ok(stores);
    } catch (error) {
      return wrapError(error, 'Failed to look up stores');
    }
  }

  /**
   * Inserts the identities, skipping any that already exist. Only the rows this
   * call created are returned; a missing identity was created by someone else.
   */
  async insertIgnoringConflicts(identities: readonly StoreIdentity[]): Promise<Result<Store[], Error>> {
    if (identities.length === 0) return ok([]);

    try {
      const now = this.nowIso();
      const created: Store[] = [];
      for (const batch of chunk(identities, IDENTITY_CHUNK_SIZE)) {
        const rows = await this.db
          .insertInto('stores')
          .values(
            batch.map((identity) => ({
              name: identity.name,
              owner_name: identity.ownerName,
              created_at: now,
              updated_at: null,
            }))
          )
          .onConflict((oc) => oc.columns(['name', 'owner_name']).doNothing())
          .returningAll()
          .execute();
        created.push(...rows.map(toStore));
      }
      return ok(created);
    } catch (error) {
      return wrapError(error, 'Failed to create stores');
    }
  }

  /**
   * Marks stores as seen again by a newer file.
   */
  async touch(ids: readonly number[]): Promise<Result<void, Error>> {
    if (ids.length === 0) return ok();

    try {
      const now = this.nowIso();
      for (const batch of chunk(ids, IDENTITY_CHUNK_SIZE)) {
        await this.db.updateTable('stores').set({ updated_at: now }).where('id', 'in', batch).execute();
      }
      return ok();
    } catch (error) {
      return wrapError(error, 'Failed to refresh stores');
    }
  }
}
