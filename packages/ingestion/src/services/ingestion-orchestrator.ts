import type { FileStatus, IngestFile, ParsedTransaction, StructuralIssue, ValidationIssue } from '@cnab-ingest/core';
import {
  assertTransition,
  getErrorMessage,
  isTerminalStatus,
  PersistenceError,
  storeIdentityKey,
  summarizeIssues,
  TransientInfrastructureError,
} from '@cnab-ingest/core';
import type { DataContext, TransactionInsert } from '@cnab-ingest/data';
import type { Logger } from '@cnab-ingest/logger';
import { getLogger } from '@cnab-ingest/logger';
import { isTransientError } from '@cnab-ingest/resilience';
import { isDatabaseBusyError } from '@cnab-ingest/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { IngestionObserver, RejectionReason } from '../app/ports/ingestion-observer.js';
import { noOpIngestionObserver } from '../app/ports/ingestion-observer.js';
import type { ObjectStorage } from '../app/ports/object-storage.js';
import { ObjectNotFoundError } from '../app/ports/object-storage.js';
import { parseLines, toIsoDate } from '../features/parsing/line-parser.js';
import type { StructuralSummary } from '../features/validation/structural-validator.js';
import { StructuralValidator } from '../features/validation/structural-validator.js';

import { StoreResolver } from './store-resolver.js';

export interface IngestionRequest {
  fileId: string;
  objectKey: string;
  correlationId: string;
}

export type IngestionOutcome =
  | {
      status: 'processed';
      fileId: string;
      transactionCount: number;
      storeCount: number;
      newStoreCount: number;
    }
  | {
      status: 'rejected';
      fileId: string;
      reason: RejectionReason;
      errorMessage: string;
      issues: ValidationIssue[];
    }
  | { status: 'skipped'; fileId: string; currentStatus: FileStatus }
  | { status: 'missing'; fileId: string };

export interface IngestionEffects {
  now: () => Date;
}

export interface IngestionOrchestratorOptions {
  validator?: StructuralValidator | undefined;
  observer?: IngestionObserver | undefined;
  effects?: Partial<IngestionEffects> | undefined;
}

type Claim = { kind: 'claimed'; file: IngestFile } | { kind: 'outcome'; outcome: IngestionOutcome };

/** Another delivery finalized the file while this one was persisting. */
class FileAlreadyFinalizedError extends Error {
  constructor(fileId: string) {
    super(`File ${fileId} is no longer in Processing`);
    this.name = 'FileAlreadyFinalizedError';
  }
}

function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;
  while (current !== undefined && chain.length < 10) {
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

function isRetryableStorageFailure(error: unknown): boolean {
  return causeChain(error).some(
    (entry) => entry instanceof TransientInfrastructureError || isDatabaseBusyError(entry) || isTransientError(entry)
  );
}

/**
 * Drives one file from Uploaded to Processed or Rejected.
 *
 * The ok channel carries a final outcome and the queue message can be dropped.
 * The err channel means nothing was decided and the message should come back:
 * the file is left in Processing and the next delivery resumes it.
 */
export class IngestionOrchestrator {
  private readonly logger: Logger;
  private readonly validator: StructuralValidator;
  private readonly observer: IngestionObserver;
  private readonly effects: IngestionEffects;

  constructor(
    private readonly data: DataContext,
    private readonly storage: ObjectStorage,
    options: IngestionOrchestratorOptions = {}
  ) {
    this.logger = getLogger('IngestionOrchestrator');
    this.validator = options.validator ?? new StructuralValidator();
    this.observer = options.observer ?? noOpIngestionObserver;
    this.effects = { now: () => new Date(), ...options.effects };
  }

  async process(request: IngestionRequest): Promise<Result<IngestionOutcome, Error>> {
    const { fileId, correlationId } = request;
    const log = this.logger.child({ fileId, correlationId });
    const startedAt = this.effects.now().getTime();

    const claimResult = await this.claim(fileId, log);
    if (claimResult.isErr()) return err(claimResult.error);
    const claim = claimResult.value;
    if (claim.kind === 'outcome') return ok(claim.outcome);

    const objectResult = await this.storage.getObject(request.objectKey);
    if (objectResult.isErr()) {
      if (objectResult.error instanceof ObjectNotFoundError) {
        return this.reject(claim.file, 'source', objectResult.error.message, [], log);
      }
      log.warn({ error: objectResult.error }, 'Could not fetch file content');
      return err(objectResult.error);
    }
    const object = objectResult.value;

    const lines: string[] = [];
    let structuralResult: Result<StructuralSummary, StructuralIssue[]>;
    try {
      structuralResult = await this.validator.validate(object.body, {
        declaredSizeBytes: object.contentLength,
        onLine: (line) => lines.push(line.toString('latin1')),
      });
    } catch (error) {
      log.warn({ error }, 'File content stream failed');
      return err(
        new TransientInfrastructureError(`Failed to read ${request.objectKey}: ${getErrorMessage(error)}`, 'storage.read', {
          cause: error,
          correlationId,
          fileId,
        })
      );
    } finally {
      object.dispose();
    }

    if (structuralResult.isErr()) {
      const issues = structuralResult.error;
      return this.reject(claim.file, 'structural', `Structural validation failed: ${summarizeIssues(issues)}`, issues, log);
    }

    const parseResult = parseLines(lines, toIsoDate(this.effects.now()));
    if (parseResult.isErr()) {
      const issues = parseResult.error;
      return this.reject(claim.file, 'content', `Content validation failed: ${summarizeIssues(issues)}`, issues, log);
    }

    const persisted = await this.persist(fileId, parseResult.value);
    if (persisted.isErr()) {
      return this.handlePersistenceFailure(claim.file, persisted.error, correlationId, log);
    }

    const summary = persisted.value;
    log.info(summary, 'File processed');
    this.observer.fileProcessed({
      fileId,
      transactionCount: summary.transactionCount,
      durationMs: this.effects.now().getTime() - startedAt,
    });
    return ok({ status: 'processed', fileId, ...summary });
  }

  /**
   * Moves the file into Processing, or explains why there is nothing to do.
   */
  private async claim(
    fileId: string,
    log: Logger
  ): Promise<Result<Claim, Error>> {
    const fileResult = await this.data.files.findById(fileId);
    if (fileResult.isErr()) return err(fileResult.error);

    const file = fileResult.value;
    if (!file) {
      log.warn('File record not found, dropping message');
      return ok({ kind: 'outcome', outcome: { status: 'missing', fileId } });
    }

    if (isTerminalStatus(file.status)) {
      log.info({ status: file.status }, 'File already finalized, skipping');
      this.observer.fileSkipped({ fileId, status: file.status });
      return ok({ kind: 'outcome', outcome: { status: 'skipped', fileId, currentStatus: file.status } });
    }

    if (file.status === 'Processing') {
      log.warn('File was left in Processing by an earlier delivery, resuming');
      return ok({ kind: 'claimed', file });
    }

    assertTransition(file.status, 'Processing', fileId);
    const markResult = await this.data.files.markProcessing(fileId);
    if (markResult.isErr()) return err(markResult.error);

    if (!markResult.value) {
      // Another consumer moved it first; re-read to see where it went
      return this.claimAfterLostRace(fileId, log);
    }

    log.info('File moved to Processing');
    return ok({ kind: 'claimed', file: { ...file, status: 'Processing' } });
  }

  private async claimAfterLostRace(
    fileId: string,
    log: Logger
  ): Promise<Result<Claim, Error>> {
    const reloaded = await this.data.files.findById(fileId);
    if (reloaded.isErr()) return err(reloaded.error);

    const file = reloaded.value;
    if (!file) return ok({ kind: 'outcome', outcome: { status: 'missing', fileId } });
    if (isTerminalStatus(file.status)) {
      this.observer.fileSkipped({ fileId, status: file.status });
      return ok({ kind: 'outcome', outcome: { status: 'skipped', fileId, currentStatus: file.status } });
    }

    log.warn({ status: file.status }, 'File claimed concurrently, continuing');
    return ok({ kind: 'claimed', file });
  }

  /**
   * Store resolution, transaction insert and the Processed transition commit together.
   */
  private async persist(
    fileId: string,
    transactions: readonly ParsedTransaction[]
  ): Promise<Result<{ newStoreCount: number; storeCount: number; transactionCount: number }, Error>> {
    return this.data.executeInTransaction(async (tx) => {
      const resolution = await new StoreResolver(tx.stores).resolve(transactions.map((transaction) => transaction.store));
      if (resolution.isErr()) return err(resolution.error);

      const inserts: TransactionInsert[] = [];
      for (const transaction of transactions) {
        const storeId = resolution.value.storeIds.get(storeIdentityKey(transaction.store));
        if (storeId === undefined) {
          return err(new PersistenceError(`No store resolved for line ${transaction.lineNumber}`, { fileId }));
        }
        inserts.push({ transaction, storeId });
      }

      const insertResult = await tx.transactions.insertMany(fileId, inserts);
      if (insertResult.isErr()) return err(insertResult.error);

      const finalized = await tx.files.finalize(fileId, { status: 'Processed', processedAt: this.effects.now() });
      if (finalized.isErr()) return err(finalized.error);
      if (!finalized.value) return err(new FileAlreadyFinalizedError(fileId));

      return ok({
        transactionCount: insertResult.value,
        storeCount: resolution.value.storeIds.size,
        newStoreCount: resolution.value.created,
      });
    });
  }

  private async handlePersistenceFailure(
    file: IngestFile,
    error: Error,
    correlationId: string,
    log: Logger
  ): Promise<Result<IngestionOutcome, Error>> {
    if (error instanceof FileAlreadyFinalizedError) {
      return this.skipFinalized(file.id, log);
    }

    if (isRetryableStorageFailure(error)) {
      log.warn({ error }, 'Persistence failed on a transient error, leaving file in Processing');
      return err(
        new TransientInfrastructureError(error.message, 'database.persist', { cause: error, correlationId, fileId: file.id })
      );
    }

    log.error({ error }, 'Persistence failed, rolled back');
    return this.reject(file, 'persistence', `Processing error: ${error.message}`, [], log);
  }

  private async reject(
    file: IngestFile,
    reason: RejectionReason,
    errorMessage: string,
    issues: ValidationIssue[],
    log: Logger
  ): Promise<Result<IngestionOutcome, Error>> {
    const finalized = await this.data.files.finalize(file.id, {
      status: 'Rejected',
      processedAt: this.effects.now(),
      errorMessage,
    });
    if (finalized.isErr()) {
      log.error({ error: finalized.error }, 'Failed to record rejection');
      return err(
        new PersistenceError(`Failed to mark file ${file.id} as Rejected: ${finalized.error.message}`, {
          cause: finalized.error,
          fileId: file.id,
        })
      );
    }
    if (!finalized.value) {
      return this.skipFinalized(file.id, log);
    }

    log.info({ reason, issueCount: issues.length, errorMessage }, 'File rejected');
    this.observer.fileRejected({ fileId: file.id, reason, issueCount: issues.length });
    return ok({ status: 'rejected', fileId: file.id, reason, errorMessage, issues });
  }

  private async skipFinalized(fileId: string, log: Logger): Promise<Result<IngestionOutcome, Error>> {
    const reloaded = await this.data.files.findById(fileId);
    if (reloaded.isErr()) return err(reloaded.error);

    const currentStatus = reloaded.value?.status;
    if (currentStatus === undefined) return ok({ status: 'missing', fileId });

    log.info({ status: currentStatus }, 'File was finalized by another delivery');
    this.observer.fileSkipped({ fileId, status: currentStatus });
    return ok({ status: 'skipped', fileId, currentStatus });
  }
}
