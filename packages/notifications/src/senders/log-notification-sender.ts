import { getLogger, type Logger } from '@cnab-ingest/logger';
import { ok, type Result } from 'neverthrow';

import type { Notification, NotificationSender } from '../types.js';

/**
 * Writes notifications to the log. Used when no webhook is configured.
 */
export class LogNotificationSender implements NotificationSender {
  readonly name = 'log';

  constructor(private readonly logger: Logger = getLogger('notifications')) {}

  send(notification: Notification): Promise<Result<void, Error>> {
    this.logger.info(
      {
        notificationId: notification.notificationId,
        fileId: notification.fileId,
        notificationType: notification.notificationType,
        recipientEmail: notification.recipientEmail,
        correlationId: notification.correlationId,
        context: notification.context,
      },
      `Notification ${notification.notificationType} for file ${notification.fileId}`
    );
    return Promise.resolve(ok());
  }
}
