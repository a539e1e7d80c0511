import type { Result } from 'neverthrow';

export const NOTIFICATION_TYPES = ['ProcessingCompleted', 'ProcessingFailed'] as const;

export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export interface Notification {
  notificationId: string;
  fileId: string;
  notificationType: NotificationType;
  recipientEmail: string;
  correlationId: string;
  /** Status details shown to the recipient. */
  context: Record<string, string>;
}

export interface NotificationDelivery {
  notificationId: string;
  /** Sends made, including the first. */
  attemptCount: number;
}

/**
 * One delivery attempt. Retrying is the channel's job, not the sender's.
 */
export interface NotificationSender {
  readonly name: string;
  send(notification: Notification, signal?: AbortSignal): Promise<Result<void, Error>>;
}
