import { NotificationDeliveryError } from '@cnab-ingest/core';
import type { IngestionObserver } from '@cnab-ingest/ingestion';
import { noOpIngestionObserver } from '@cnab-ingest/ingestion';
import { getLogger, type Logger } from '@cnab-ingest/logger';
import type { QueueClient } from '@cnab-ingest/queue';
import { delay, retryWithBackoff, type DelayFn, type RetryPolicy } from '@cnab-ingest/resilience';
import { err, ok, type Result } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';

import type { NotificationDlqPayload } from './dlq/dlq-payload.js';
import { fromDlqPayload, toDlqPayload } from './dlq/dlq-payload.js';
import type { Notification, NotificationDelivery, NotificationSender, NotificationType } from './types.js';

/** One send, then retries after 2s, 4s and 8s. */
export const NOTIFICATION_RETRY_POLICY: RetryPolicy = { retries: 3, baseDelayMs: 2000 };

export interface NotificationEffects {
  delay: DelayFn;
  now: () => Date;
  newId: () => string;
}

export interface NotificationChannelOptions {
  recipientEmail: string;
  retryPolicy?: RetryPolicy | undefined;
  observer?: IngestionObserver | undefined;
  /** Cuts retry sleeps short on shutdown. */
  signal?: AbortSignal | undefined;
  effects?: Partial<NotificationEffects> | undefined;
}

/**
 * Best-effort status notifications. A notification that still fails after the
 * retry budget is parked on the dead-letter queue; the caller gets an err but
 * nothing about the file depends on it.
 */
export class NotificationChannel {
  private readonly logger: Logger;
  private readonly recipientEmail: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly observer: IngestionObserver;
  private readonly signal: AbortSignal | undefined;
  private readonly effects: NotificationEffects;

  constructor(
    private readonly sender: NotificationSender,
    private readonly deadLetterQueue: QueueClient,
    options: NotificationChannelOptions
  ) {
    this.logger = getLogger('NotificationChannel');
    this.recipientEmail = options.recipientEmail;
    this.retryPolicy = options.retryPolicy ?? NOTIFICATION_RETRY_POLICY;
    this.observer = options.observer ?? noOpIngestionObserver;
    this.signal = options.signal;
    this.effects = {
      delay,
      now: () => new Date(),
      newId: () => uuidv4(),
      ...options.effects,
    };
  }

  get policy(): RetryPolicy {
    return this.retryPolicy;
  }

  async notifyProcessingCompleted(
    fileId: string,
    details: string,
    correlationId: string
  ): Promise<Result<NotificationDelivery, NotificationDeliveryError>> {
    const notification = this.build(fileId, 'ProcessingCompleted', correlationId, { status: 'Processed', details });
    return this.deliver(notification, true);
  }

  async notifyProcessingFailed(
    fileId: string,
    errorMessage: string,
    correlationId: string
  ): Promise<Result<NotificationDelivery, NotificationDeliveryError>> {
    const notification = this.build(fileId, 'ProcessingFailed', correlationId, { status: 'Rejected', errorMessage });
    return this.deliver(notification, true);
  }

  /**
   * Retries a notification taken from the dead-letter queue. Never re-parks it.
   */
  async retryFailedNotification(
    payload: NotificationDlqPayload
  ): Promise<Result<NotificationDelivery, NotificationDeliveryError>> {
    return this.deliver(fromDlqPayload(payload), false);
  }

  private build(
    fileId: string,
    notificationType: NotificationType,
    correlationId: string,
    context: Record<string, string>
  ): Notification {
    return {
      notificationId: this.effects.newId(),
      fileId,
      notificationType,
      recipientEmail: this.recipientEmail,
      correlationId,
      context,
    };
  }

  private async deliver(
    notification: Notification,
    deadLetterOnFailure: boolean
  ): Promise<Result<NotificationDelivery, NotificationDeliveryError>> {
    const { notificationId, notificationType, fileId, correlationId } = notification;
    const log = this.logger.child({ notificationId, fileId, correlationId });
    log.debug({ notificationType, sender: this.sender.name }, 'Sending notification');

    const send = (attempt: number): Promise<Result<void, Error>> => {
      log.debug({ attempt }, 'Notification attempt');
      return this.sender.send(notification, this.signal);
    };
    const outcome = await retryWithBackoff(send, {
      policy: this.retryPolicy,
      signal: this.signal,
      effects: { delay: this.effects.delay },
      onRetry: ({ attempt, delayMs, error }) =>
        log.warn({ attempt, delayMs, error: error.message }, 'Notification attempt failed, retrying'),
    });

    if (outcome.result.isOk()) {
      log.info({ notificationType, attempts: outcome.attempts }, 'Notification sent');
      this.observer.notificationSent({ notificationType, attempts: outcome.attempts });
      return ok({ notificationId, attemptCount: outcome.attempts });
    }

    const lastError = outcome.result.error;
    const message = `Notification failed after ${outcome.attempts} attempts: ${lastError.message}`;

    if (deadLetterOnFailure) {
      await this.park(notification, outcome.attempts, lastError.message, log);
    } else {
      log.error({ attempts: outcome.attempts, error: lastError.message }, 'Notification retry failed, needs manual review');
    }

    return err(
      new NotificationDeliveryError(message, {
        cause: lastError,
        correlationId,
        fileId,
        additionalContext: { notificationId, attempts: outcome.attempts },
      })
    );
  }

  private async park(notification: Notification, attemptCount: number, errorMessage: string, log: Logger): Promise<void> {
    const payload = toDlqPayload(notification, { attemptCount, errorMessage, lastAttemptAt: this.effects.now() });
    const sent = await this.deadLetterQueue.send(JSON.stringify(payload));

    if (sent.isErr()) {
      // Nothing left to fall back on
      log.error({ error: sent.error.message, payload }, 'Failed to publish notification to dead-letter queue');
      return;
    }

    log.warn({ attempts: attemptCount, dlqMessageId: sent.value }, 'Notification published to dead-letter queue');
    this.observer.notificationDeadLettered({ notificationType: notification.notificationType, attempts: attemptCount });
  }
}
