import type { Logger } from '@cnab-ingest/logger';

export type RejectionReason = 'structural' | 'content' | 'persistence' | 'source';

/**
 * Counters and timings reported by the orchestrator, the queue worker and the
 * notification channel. Implementations must not throw.
 */
export interface IngestionObserver {
  fileProcessed(event: { durationMs: number; fileId: string; transactionCount: number }): void;
  fileRejected(event: { fileId: string; issueCount: number; reason: RejectionReason }): void;
  fileSkipped(event: { fileId: string; status: string }): void;
  messageAcknowledged(event: { messageId: string; outcome: string; queue: string }): void;
  messageRetained(event: { error: string; messageId: string; queue: string }): void;
  pollCompleted(event: { queue: string; received: number }): void;
  notificationSent(event: { attempts: number; notificationType: string }): void;
  notificationDeadLettered(event: { attempts: number; notificationType: string }): void;
}

export const noOpIngestionObserver: IngestionObserver = {
  fileProcessed: () => undefined,
  fileRejected: () => undefined,
  fileSkipped: () => undefined,
  messageAcknowledged: () => undefined,
  messageRetained: () => undefined,
  pollCompleted: () => undefined,
  notificationSent: () => undefined,
  notificationDeadLettered: () => undefined,
};

// For development: every event becomes a debug line
export function createLoggingIngestionObserver(logger: Logger): IngestionObserver {
  return {
    fileProcessed: (event) => logger.debug(event, 'metric: file processed'),
    fileRejected: (event) => logger.debug(event, 'metric: file rejected'),
    fileSkipped: (event) => logger.debug(event, 'metric: file skipped'),
    messageAcknowledged: (event) => logger.debug(event, 'metric: message acknowledged'),
    messageRetained: (event) => logger.debug(event, 'metric: message retained'),
    pollCompleted: (event) => logger.debug(event, 'metric: poll completed'),
    notificationSent: (event) => logger.debug(event, 'metric: notification sent'),
    notificationDeadLettered: (event) => logger.debug(event, 'metric: notification dead-lettered'),
  };
}
