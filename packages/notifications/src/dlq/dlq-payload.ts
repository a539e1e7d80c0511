import { parseJsonMessage } from '@cnab-ingest/queue';
import type { Result } from 'neverthrow';
import { z } from 'zod';

import type { Notification } from '../types.js';
import { NOTIFICATION_TYPES } from '../types.js';

/**
 * What is parked on the notification dead-letter queue after the last send failed.
 */
export const NotificationDlqPayloadSchema = z.object({
  notificationId: z.string().uuid(),
  fileId: z.string().uuid(),
  notificationType: z.enum(NOTIFICATION_TYPES),
  recipientEmail: z.string().email(),
  attemptCount: z.number().int().nonnegative(),
  lastAttemptAt: z.string().datetime({ offset: true }),
  errorMessage: z.string().optional(),
  context: z.record(z.string(), z.string()).default({}),
  correlationId: z.string().min(1).optional(),
});

export type NotificationDlqPayload = z.infer<typeof NotificationDlqPayloadSchema>;

export function parseNotificationDlqPayload(body: string | undefined): Result<NotificationDlqPayload, Error> {
  return parseJsonMessage(body, NotificationDlqPayloadSchema, 'notification DLQ payload');
}

export function toDlqPayload(
  notification: Notification,
  failure: { attemptCount: number; errorMessage: string; lastAttemptAt: Date }
): NotificationDlqPayload {
  return {
    notificationId: notification.notificationId,
    fileId: notification.fileId,
    notificationType: notification.notificationType,
    recipientEmail: notification.recipientEmail,
    attemptCount: failure.attemptCount,
    lastAttemptAt: failure.lastAttemptAt.toISOString(),
    errorMessage: failure.errorMessage,
    context: notification.context,
    correlationId: notification.correlationId,
  };
}

export function fromDlqPayload(payload: NotificationDlqPayload): Notification {
  return {
    notificationId: payload.notificationId,
    fileId: payload.fileId,
    notificationType: payload.notificationType,
    recipientEmail: payload.recipientEmail,
    correlationId: payload.correlationId ?? payload.notificationId,
    context: payload.context,
  };
}
