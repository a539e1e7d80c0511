import { getLogger, type Logger } from '@cnab-ingest/logger';
import { QueueDefaults, type QueueClient, type QueueMessage } from '@cnab-ingest/queue';
import { delay, type DelayFn } from '@cnab-ingest/resilience';

import type { NotificationChannel } from '../notification-channel.js';

import { parseNotificationDlqPayload } from './dlq-payload.js';

export const DLQ_CYCLE_INTERVAL_MS = 60_000;

/**
 * One retry cycle can take four timed-out sends plus 14 s of backoff (about 54 s),
 * so a batch has to finish well inside the visibility timeout.
 */
export const DLQ_MAX_MESSAGES = 4;

export interface DlqCycleSummary {
  received: number;
  resolved: number;
  failed: number;
  /** Handed back to the queue because shutdown cut the cycle short. */
  released: number;
}

export interface NotificationDlqWorkerOptions {
  intervalMs?: number | undefined;
  effects?: Partial<{ delay: DelayFn }> | undefined;
}

/**
 * Drains the notification dead-letter queue on a timer. Each message gets one
 * retry cycle and is then deleted whatever happened, so nothing circulates forever.
 * On shutdown, messages not yet retried, or whose retry was interrupted, are
 * released instead.
 */
export class NotificationDlqWorker {
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly delay: DelayFn;

  constructor(
    private readonly deadLetterQueue: QueueClient,
    private readonly channel: Pick<NotificationChannel, 'retryFailedNotification'>,
    options: NotificationDlqWorkerOptions = {}
  ) {
    this.logger = getLogger('NotificationDlqWorker');
    this.intervalMs = options.intervalMs ?? DLQ_CYCLE_INTERVAL_MS;
    this.delay = options.effects?.delay ?? delay;
  }

  async run(signal: AbortSignal): Promise<void> {
    this.logger.info({ queue: this.deadLetterQueue.name, intervalMs: this.intervalMs }, 'Notification DLQ worker started');

    while (!signal.aborted) {
      const summary = await this.runCycle(signal);
      this.logger.info(summary, 'Notification DLQ cycle summary');

      if (signal.aborted) break;
      await this.delay(this.intervalMs, signal);
    }

    this.logger.info('Notification DLQ worker stopped');
  }

  async runCycle(signal?: AbortSignal): Promise<DlqCycleSummary> {
    const summary: DlqCycleSummary = { received: 0, resolved: 0, failed: 0, released: 0 };

    const received = await this.deadLetterQueue.receive({
      maxMessages: DLQ_MAX_MESSAGES,
      visibilityTimeoutSeconds: QueueDefaults.VISIBILITY_TIMEOUT_SECONDS,
      waitTimeSeconds: QueueDefaults.WAIT_TIME_SECONDS,
      signal,
    });
    if (received.isErr()) {
      this.logger.error({ error: received.error.message }, 'Failed to poll notification DLQ');
      return summary;
    }

    if (received.value.length === 0) {
      this.logger.debug('Notification DLQ is empty');
      return summary;
    }

    const batch = received.value;
    for (const [index, message] of batch.entries()) {
      if (signal?.aborted) {
        summary.released += await this.releaseAll(batch.slice(index));
        break;
      }

      summary.received += 1;
      if (await this.retry(message)) {
        summary.resolved += 1;
        await this.remove(message);
      } else if (signal?.aborted) {
        // The retry was interrupted rather than exhausted
        summary.released += await this.releaseAll([message]);
      } else {
        summary.failed += 1;
        await this.remove(message);
      }
    }

    return summary;
  }

  private async retry(message: QueueMessage): Promise<boolean> {
    const payload = parseNotificationDlqPayload(message.body);
    if (payload.isErr()) {
      this.logger.error({ messageId: message.messageId, error: payload.error.message }, 'Dropping unreadable DLQ message');
      return false;
    }

    const { notificationId, fileId } = payload.value;
    const result = await this.channel.retryFailedNotification(payload.value);
    if (result.isErr()) {
      this.logger.error(
        { messageId: message.messageId, notificationId, fileId, error: result.error.message },
        'DLQ retry failed, notification needs manual review'
      );
      return false;
    }

    this.logger.info({ notificationId, fileId, attempts: result.value.attemptCount }, 'DLQ notification resolved');
    return true;
  }

  private async releaseAll(messages: QueueMessage[]): Promise<number> {
    this.logger.info({ count: messages.length }, 'Releasing DLQ messages on shutdown');
    let released = 0;
    for (const message of messages) {
      const result = await this.deadLetterQueue.release(message);
      if (result.isErr()) {
        this.logger.warn({ messageId: message.messageId, error: result.error.message }, 'Failed to release DLQ message');
      } else {
        released += 1;
      }
    }
    return released;
  }

  private async remove(message: QueueMessage): Promise<void> {
    const deleted = await this.deadLetterQueue.delete(message);
    if (deleted.isErr()) {
      this.logger.error({ messageId: message.messageId, error: deleted.error.message }, 'Failed to delete DLQ message');
    }
  }
}
