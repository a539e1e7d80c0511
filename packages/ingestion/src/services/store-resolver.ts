import type { Store, StoreIdentity } from '@cnab-ingest/core';
import { PersistenceError, storeIdentityKey } from '@cnab-ingest/core';
import type { StoreRepository } from '@cnab-ingest/data';
import { getLogger } from '@cnab-ingest/logger';
import { isUniqueConstraintError } from '@cnab-ingest/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

const logger = getLogger('StoreResolver');

export type StoreStore = Pick<StoreRepository, 'findByIdentities' | 'insertIgnoringConflicts' | 'touch'>;

export interface StoreResolution {
  /** Store id by storeIdentityKey. */
  storeIds: Map<string, number>;
  created: number;
  reused: number;
}

function distinctIdentities(identities: readonly StoreIdentity[]): StoreIdentity[] {
  const byKey = new Map<string, StoreIdentity>();
  for (const identity of identities) {
    const key = storeIdentityKey(identity);
    if (!byKey.has(key)) {
      byKey.set(key, { name: identity.name, ownerName: identity.ownerName });
    }
  }
  return [...byKey.values()];
}

function indexByKey(stores: readonly Store[], into: Map<string, number>): void {
  for (const store of stores) {
    into.set(storeIdentityKey(store), store.id);
  }
}

/**
 * Resolves the store identities of one file to ids, creating the missing ones.
 * Concurrent creation of the same identity is settled by the unique index on
 * (name, owner_name): whoever loses reads the winner's row.
 *
 * Meant to run inside the file's persistence transaction.
 */
export class StoreResolver {
  constructor(private readonly stores: StoreStore) {}

  async resolve(identities: readonly StoreIdentity[]): Promise<Result<StoreResolution, Error>> {
    const wanted = distinctIdentities(identities);
    const storeIds = new Map<string, number>();

    const existingResult = await this.stores.findByIdentities(wanted);
    if (existingResult.isErr()) return err(existingResult.error);
    indexByKey(existingResult.value, storeIds);
    const existingIds = existingResult.value.map((store) => store.id);

    let missing = wanted.filter((identity) => !storeIds.has(storeIdentityKey(identity)));
    let created = 0;

    if (missing.length > 0) {
      const insertResult = await this.stores.insertIgnoringConflicts(missing);
      if (insertResult.isOk()) {
        created = insertResult.value.length;
        indexByKey(insertResult.value, storeIds);
      } else if (isUniqueConstraintError(insertResult.error.cause)) {
        logger.debug({ count: missing.length }, 'Store insert raced another writer, re-reading');
      } else {
        return err(insertResult.error);
      }

      missing = missing.filter((identity) => !storeIds.has(storeIdentityKey(identity)));
    }

    if (missing.length > 0) {
      // Created by a concurrent file between our lookup and insert
      const rereadResult = await this.stores.findByIdentities(missing);
      if (rereadResult.isErr()) return err(rereadResult.error);
      indexByKey(rereadResult.value, storeIds);

      const unresolved = missing.filter((identity) => !storeIds.has(storeIdentityKey(identity)));
      if (unresolved.length > 0) {
        return err(
          new PersistenceError(`Could not resolve ${unresolved.length} store(s)`, {
            additionalContext: { stores: unresolved },
          })
        );
      }
    }

    if (existingIds.length > 0) {
      const touchResult = await this.stores.touch(existingIds);
      if (touchResult.isErr()) return err(touchResult.error);
    }

    return ok({ storeIds, created, reused: wanted.length - created });
  }
}
