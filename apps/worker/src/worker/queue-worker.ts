import { getErrorMessage } from '@cnab-ingest/core';
import type { IngestionObserver, IngestionOrchestrator, IngestionOutcome } from '@cnab-ingest/ingestion';
import { noOpIngestionObserver } from '@cnab-ingest/ingestion';
import { getLogger, type Logger } from '@cnab-ingest/logger';
import type { NotificationChannel } from '@cnab-ingest/notifications';
import { parseFileProcessingMessage, QueueDefaults, type QueueClient, type QueueMessage } from '@cnab-ingest/queue';
import { delay, type DelayFn } from '@cnab-ingest/resilience';

/** Why a message is acknowledged: an ingestion outcome, or an unreadable body. */
export type AcknowledgeReason = IngestionOutcome | { status: 'poison'; error: string };

export type WorkerState =
  | { kind: 'idle' }
  | { kind: 'polling' }
  | { kind: 'dispatching'; batch: QueueMessage[] }
  | { kind: 'processing'; message: QueueMessage; rest: QueueMessage[] }
  | {
      kind: 'acknowledging';
      message: QueueMessage;
      rest: QueueMessage[];
      reason: AcknowledgeReason;
      correlationId: string | undefined;
    }
  | { kind: 'retaining'; message: QueueMessage; rest: QueueMessage[]; error: Error }
  | { kind: 'backoff'; delayMs: number }
  | { kind: 'stopped' };

export type WorkerStateKind = WorkerState['kind'];

export type OutcomeNotifier = Pick<NotificationChannel, 'notifyProcessingCompleted' | 'notifyProcessingFailed'>;

export interface QueueWorkerOptions {
  notifier?: OutcomeNotifier | undefined;
  observer?: IngestionObserver | undefined;
  emptyQueueDelayMs?: number | undefined;
  errorDelayMs?: number | undefined;
  interMessageDelayMs?: number | undefined;
  effects?: Partial<{ delay: DelayFn }> | undefined;
}

// Entering any of these after cancellation stops the loop instead
const STOPPABLE: ReadonlySet<WorkerStateKind> = new Set(['idle', 'polling', 'backoff']);

/**
 * Consumes file-processing messages one at a time.
 *
 * idle -> polling -> dispatching -> processing -> acknowledging | retaining -> dispatching ...
 * An empty batch or a failed poll goes through backoff back to idle. Cancellation is
 * checked on every transition: work already started runs to completion, messages of
 * the current batch that were not started are released, and no new poll begins.
 */
export class QueueWorker {
  private readonly logger: Logger;
  private readonly notifier: OutcomeNotifier | undefined;
  private readonly observer: IngestionObserver;
  private readonly emptyQueueDelayMs: number;
  private readonly errorDelayMs: number;
  private readonly interMessageDelayMs: number;
  private readonly delay: DelayFn;
  private current: WorkerState = { kind: 'idle' };

  constructor(
    private readonly queue: QueueClient,
    private readonly orchestrator: Pick<IngestionOrchestrator, 'process'>,
    options: QueueWorkerOptions = {}
  ) {
    this.logger = getLogger('QueueWorker');
    this.notifier = options.notifier;
    this.observer = options.observer ?? noOpIngestionObserver;
    this.emptyQueueDelayMs = options.emptyQueueDelayMs ?? 5000;
    this.errorDelayMs = options.errorDelayMs ?? 5000;
    this.interMessageDelayMs = options.interMessageDelayMs ?? 100;
    this.delay = options.effects?.delay ?? delay;
  }

  get state(): WorkerStateKind {
    return this.current.kind;
  }

  async run(signal: AbortSignal): Promise<void> {
    this.logger.info({ queue: this.queue.name }, 'Queue worker started');
    this.current = { kind: 'idle' };

    while (this.current.kind !== 'stopped') {
      let next: WorkerState;
      try {
        next = await this.step(this.current, signal);
      } catch (error) {
        // Unreachable in normal operation: every step returns its own failures
        this.logger.error({ error, state: this.current.kind }, 'Unexpected error in queue worker loop');
        next = { kind: 'backoff', delayMs: this.errorDelayMs };
      }
      this.current = this.transition(next, signal);
    }

    this.logger.info({ queue: this.queue.name }, 'Queue worker stopped');
  }

  private transition(next: WorkerState, signal: AbortSignal): WorkerState {
    if (signal.aborted && STOPPABLE.has(next.kind)) {
      return { kind: 'stopped' };
    }
    this.logger.trace({ from: this.current.kind, to: next.kind }, 'Worker state transition');
    return next;
  }

  private async step(state: WorkerState, signal: AbortSignal): Promise<WorkerState> {
    switch (state.kind) {
      case 'idle':
        return { kind: 'polling' };
      case 'polling':
        return this.poll(signal);
      case 'dispatching':
        return this.dispatch(state.batch, signal);
      case 'processing':
        return this.process(state.message, state.rest);
      case 'acknowledging':
        await this.acknowledge(state.message, state.reason, state.correlationId);
        return this.afterMessage(state.rest, signal);
      case 'retaining':
        this.retain(state.message, state.error);
        return this.afterMessage(state.rest, signal);
      case 'backoff':
        await this.delay(state.delayMs, signal);
        return { kind: 'idle' };
      case 'stopped':
        return state;
    }
  }

  private async poll(signal: AbortSignal): Promise<WorkerState> {
    const received = await this.queue.receive({
      maxMessages: QueueDefaults.MAX_MESSAGES,
      visibilityTimeoutSeconds: QueueDefaults.VISIBILITY_TIMEOUT_SECONDS,
      waitTimeSeconds: QueueDefaults.WAIT_TIME_SECONDS,
      signal,
    });

    if (received.isErr()) {
      this.logger.error({ error: received.error.message, queue: this.queue.name }, 'Failed to receive messages');
      return { kind: 'backoff', delayMs: this.errorDelayMs };
    }

    this.observer.pollCompleted({ queue: this.queue.name, received: received.value.length });
    if (received.value.length === 0) {
      return { kind: 'backoff', delayMs: this.emptyQueueDelayMs };
    }

    this.logger.debug({ count: received.value.length }, 'Received messages');
    return { kind: 'dispatching', batch: received.value };
  }

  private async dispatch(batch: QueueMessage[], signal: AbortSignal): Promise<WorkerState> {
    if (signal.aborted) {
      await this.releaseAll(batch);
      return { kind: 'stopped' };
    }

    const [message, ...rest] = batch;
    if (!message) return { kind: 'idle' };
    return { kind: 'processing', message, rest };
  }

  private async process(message: QueueMessage, rest: QueueMessage[]): Promise<WorkerState> {
    const parsed = parseFileProcessingMessage(message.body);
    if (parsed.isErr()) {
      this.logger.error(
        { messageId: message.messageId, receiveCount: message.receiveCount, error: parsed.error.message },
        'Deleting poison message'
      );
      return {
        kind: 'acknowledging',
        message,
        rest,
        reason: { status: 'poison', error: parsed.error.message },
        correlationId: undefined,
      };
    }

    const { fileId, objectKey, fileName, correlationId } = parsed.value;
    this.logger.info({ messageId: message.messageId, fileId, fileName, correlationId }, 'Processing file');

    try {
      const result = await this.orchestrator.process({ fileId, objectKey, correlationId });
      if (result.isErr()) {
        return { kind: 'retaining', message, rest, error: result.error };
      }
      return { kind: 'acknowledging', message, rest, reason: result.value, correlationId };
    } catch (error) {
      return {
        kind: 'retaining',
        message,
        rest,
        error: error instanceof Error ? error : new Error(getErrorMessage(error)),
      };
    }
  }

  private async acknowledge(
    message: QueueMessage,
    reason: AcknowledgeReason,
    correlationId: string | undefined
  ): Promise<void> {
    const deleted = await this.queue.delete(message);
    if (deleted.isErr()) {
      // The file is already terminal, so a redelivery is skipped
      this.logger.error({ messageId: message.messageId, error: deleted.error.message }, 'Failed to delete message');
    } else {
      this.observer.messageAcknowledged({ messageId: message.messageId, outcome: reason.status, queue: this.queue.name });
    }

    if (correlationId !== undefined) {
      await this.notify(reason, correlationId);
    }
  }

  private retain(message: QueueMessage, error: Error): void {
    this.logger.warn(
      { messageId: message.messageId, receiveCount: message.receiveCount, error: error.message },
      'Leaving message for redelivery'
    );
    this.observer.messageRetained({ error: error.message, messageId: message.messageId, queue: this.queue.name });
  }

  private async notify(reason: AcknowledgeReason, correlationId: string): Promise<void> {
    if (!this.notifier) return;
    if (reason.status !== 'processed' && reason.status !== 'rejected') return;

    const result =
      reason.status === 'processed'
        ? await this.notifier.notifyProcessingCompleted(
            reason.fileId,
            `${reason.transactionCount} transactions across ${reason.storeCount} stores (${reason.newStoreCount} new)`,
            correlationId
          )
        : await this.notifier.notifyProcessingFailed(reason.fileId, reason.errorMessage, correlationId);

    if (result.isErr()) {
      this.logger.warn({ fileId: reason.fileId, error: result.error.message }, 'Notification not delivered');
    }
  }

  private async afterMessage(rest: QueueMessage[], signal: AbortSignal): Promise<WorkerState> {
    if (rest.length > 0 && !signal.aborted) {
      await this.delay(this.interMessageDelayMs, signal);
    }
    return { kind: 'dispatching', batch: rest };
  }

  private async releaseAll(batch: QueueMessage[]): Promise<void> {
    if (batch.length === 0) return;
    this.logger.info({ count: batch.length }, 'Releasing unstarted messages on shutdown');
    for (const message of batch) {
      const released = await this.queue.release(message);
      if (released.isErr()) {
        this.logger.warn({ messageId: message.messageId, error: released.error.message }, 'Failed to release message');
      }
    }
  }
}
