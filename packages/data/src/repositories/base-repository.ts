import { getLogger, type Logger } from '@cnab-ingest/logger';

import type { KyselyDB } from '../database.js';

/**
 * Shared plumbing for repositories. `db` is either the root connection or the
 * transaction a DataContext was scoped to, and every query must go through it.
 */
export abstract class BaseRepository {
  protected readonly logger: Logger;

  protected constructor(
    protected readonly db: KyselyDB,
    name: string
  ) {
    this.logger = getLogger(name);
  }

  /** Timestamps are stored as ISO-8601 UTC text. */
  protected nowIso(): string {
    return new Date().toISOString();
  }
}
