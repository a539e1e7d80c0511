export {
  fromDlqPayload,
  NotificationDlqPayloadSchema,
  parseNotificationDlqPayload,
  toDlqPayload,
  type NotificationDlqPayload,
} from './dlq/dlq-payload.js';
export {
  DLQ_CYCLE_INTERVAL_MS,
  DLQ_MAX_MESSAGES,
  NotificationDlqWorker,
  type DlqCycleSummary,
  type NotificationDlqWorkerOptions,
} from './dlq/notification-dlq-worker.js';
export {
  NOTIFICATION_RETRY_POLICY,
  NotificationChannel,
  type NotificationChannelOptions,
  type NotificationEffects,
} from './notification-channel.js';
export { LogNotificationSender } from './senders/log-notification-sender.js';
export {
  WebhookNotificationSender,
  type WebhookEffects,
  type WebhookNotificationSenderConfig,
  type WebhookRequest,
  type WebhookResponse,
} from './senders/webhook-notification-sender.js';
export {
  NOTIFICATION_TYPES,
  type Notification,
  type NotificationDelivery,
  type NotificationSender,
  type NotificationType,
} from './types.js';
