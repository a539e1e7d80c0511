import type { FileStatus, IngestFile, NewIngestFile, TerminalFileStatus } from '@cnab-ingest/core';
import { truncateErrorMessage, wrapError } from '@cnab-ingest/core';
import type { Selectable } from '@cnab-ingest/sqlite';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import type { KyselyDB } from '../database.js';
import type { FilesTable } from '../schema/database-schema.js';

import { BaseRepository } from './base-repository.js';

export interface FinalizeFileParams {
  status: TerminalFileStatus;
  processedAt: Date;
  errorMessage?: string | undefined;
}

function toIngestFile(row: Selectable<FilesTable>): IngestFile {
  return {
    id: row.id,
    name: row.name,
    sizeBytes: row.size_bytes,
    objectKey: row.object_key,
    status: row.status,
    errorMessage: row.error_message ?? undefined,
    uploadedAt: new Date(row.uploaded_at),
    processedAt: row.processed_at ? new Date(row.processed_at) : undefined,
  };
}

/**
 * File records. Status updates are conditional on the expected current status,
 * so a redelivered or duplicated message cannot move a file backwards.
 */
export class FileRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'FileRepository');
  }

  async create(file: NewIngestFile): Promise<Result<IngestFile, Error>> {
    try {
      const row = await this.db
        .insertInto('files')
        .values({
          id: file.id,
          name: file.name,
          size_bytes: file.sizeBytes,
          object_key: file.objectKey,
          status: 'Uploaded',
          error_message: null,
          uploaded_at: file.uploadedAt.toISOString(),
          processed_at: null,
          created_at: this.nowIso(),
          updated_at: null,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return ok(toIngestFile(row));
    } catch (error) {
      this.logger.error({ error, fileId: file.id }, 'Failed to create file record');
      return wrapError(error, 'Failed to create file record');
    }
  }

  async findById(id: string): Promise<Result<IngestFile | undefined, Error>> {
    try {
      const row = await this.db.selectFrom('files').selectAll().where('id', '=', id).executeTakeFirst();
      return ok(row ? toIngestFile(row) : undefined);
    } catch (error) {
      return wrapError(error, `Failed to load file ${id}`);
    }
  }

  async list(filters?: { status?: FileStatus | undefined }): Promise<Result<IngestFile[], Error>> {
    try {
      let query = this.db.selectFrom('files').selectAll();
      if (filters?.status) {
        query = query.where('status', '=', filters.status);
      }
      const rows = await query.orderBy('uploaded_at', 'desc').execute();
      return ok(rows.map(toIngestFile));
    } catch (error) {
      return wrapError(error, 'Failed to list files');
    }
  }

  /**
   * Uploaded -> Processing. Returns false when the file was not in Uploaded.
   */
  async markProcessing(id: string): Promise<Result<boolean, Error>> {
    try {
      const result = await this.db
        .updateTable('files')
        .set({ status: 'Processing', updated_at: this.nowIso() })
        .where('id', '=', id)
        .where('status', '=', 'Uploaded')
        .executeTakeFirst();
      return ok(Number(result.numUpdatedRows) > 0);
    } catch (error) {
      return wrapError(error, `Failed to mark file ${id} as processing`);
    }
  }

  /**
   * Processing -> Processed | Rejected. Returns false when the file was no longer in Processing.
   */
  async finalize(id: string, params: FinalizeFileParams): Promise<Result<boolean, Error>> {
    try {
      const result = await this.db
        .updateTable('files')
        .set({
          status: params.status,
          error_message: params.errorMessage === undefined ? null : truncateErrorMessage(params.errorMessage),
          processed_at: params.processedAt.toISOString(),
          updated_at: this.nowIso(),
        })
        .where('id', '=', id)
        .where('status', '=', 'Processing')
        .executeTakeFirst();
      return ok(Number(result.numUpdatedRows) > 0);
    } catch (error) {
      return wrapError(error, `Failed to finalize file ${id} as ${params.status}`);
    }
  }
}
