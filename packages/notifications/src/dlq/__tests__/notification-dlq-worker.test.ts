import { NotificationDeliveryError } from '@cnab-ingest/core';
import { InMemoryQueueClient, transientQueueError } from '@cnab-ingest/queue';
import { err, ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import type { NotificationDlqPayload } from '../dlq-payload.js';
import { DLQ_MAX_MESSAGES, NotificationDlqWorker } from '../notification-dlq-worker.js';

function payload(notificationId: string): NotificationDlqPayload {
  return {
    notificationId,
    fileId: '00000000-0000-4000-8000-000000000001',
    notificationType: 'ProcessingCompleted',
    recipientEmail: 'ops@example.com',
    attemptCount: 4,
    lastAttemptAt: '2024-03-01T12:00:00.000Z',
    errorMessage: 'smtp down',
    context: { status: 'Processed' },
    correlationId: 'corr-1',
  };
}

describe('NotificationDlqWorker', () => {
  it('deletes every message it receives, whatever the retry outcome', async () => {
    const dlq = new InMemoryQueueClient('notification-dlq');
    dlq.enqueue(JSON.stringify(payload('11111111-1111-4111-8111-111111111111')));
    dlq.enqueue('{not json');
    dlq.enqueue(JSON.stringify(payload('22222222-2222-4222-8222-222222222222')));
    const retryFailedNotification = vi
      .fn()
      .mockResolvedValueOnce(ok({ notificationId: '11111111-1111-4111-8111-111111111111', attemptCount: 1 }))
      .mockResolvedValueOnce(err(new NotificationDeliveryError('Notification failed after 4 attempts: smtp down')));

    const summary = await new NotificationDlqWorker(dlq, { retryFailedNotification }).runCycle();

    expect(summary).toEqual({ received: 3, resolved: 1, failed: 2, released: 0 });
    expect(retryFailedNotification).toHaveBeenCalledTimes(2);
    expect(dlq.deleted.map((message) => message.messageId)).toEqual(['msg-1', 'msg-2', 'msg-3']);
    expect(dlq.size).toBe(0);
  });

  it('reports an empty cycle when the poll fails', async () => {
    const dlq = new InMemoryQueueClient('notification-dlq');
    dlq.enqueue(JSON.stringify(payload('11111111-1111-4111-8111-111111111111')));
    dlq.failNext('receive', transientQueueError('sqs.receive'));
    const retryFailedNotification = vi.fn();

    const summary = await new NotificationDlqWorker(dlq, { retryFailedNotification }).runCycle();

    expect(summary).toEqual({ received: 0, resolved: 0, failed: 0, released: 0 });
    expect(retryFailedNotification).not.toHaveBeenCalled();
    expect(dlq.visibleCount).toBe(1);
  });

  it('releases interrupted and unstarted messages instead of deleting them on shutdown', async () => {
    const dlq = new InMemoryQueueClient('notification-dlq');
    dlq.enqueue(JSON.stringify(payload('11111111-1111-4111-8111-111111111111')));
    dlq.enqueue(JSON.stringify(payload('22222222-2222-4222-8222-222222222222')));
    const controller = new AbortController();
    const retryFailedNotification = vi.fn().mockImplementation(() => {
      controller.abort();
      return Promise.resolve(err(new NotificationDeliveryError('Notification failed after 1 attempts: aborted')));
    });

    const summary = await new NotificationDlqWorker(dlq, { retryFailedNotification }).runCycle(controller.signal);

    expect(summary).toEqual({ received: 1, resolved: 0, failed: 0, released: 2 });
    expect(retryFailedNotification).toHaveBeenCalledTimes(1);
    expect(dlq.deleted).toEqual([]);
    expect(dlq.released.map((message) => message.messageId)).toEqual(['msg-1', 'msg-2']);
    expect(dlq.visibleCount).toBe(2);
  });

  it('still deletes a notification resolved while shutdown was requested', async () => {
    const dlq = new InMemoryQueueClient('notification-dlq');
    dlq.enqueue(JSON.stringify(payload('11111111-1111-4111-8111-111111111111')));
    dlq.enqueue(JSON.stringify(payload('22222222-2222-4222-8222-222222222222')));
    const controller = new AbortController();
    const retryFailedNotification = vi.fn().mockImplementation(() => {
      controller.abort();
      return Promise.resolve(ok({ notificationId: '11111111-1111-4111-8111-111111111111', attemptCount: 1 }));
    });

    const summary = await new NotificationDlqWorker(dlq, { retryFailedNotification }).runCycle(controller.signal);

    expect(summary).toEqual({ received: 1, resolved: 1, failed: 0, released: 1 });
    expect(dlq.deleted.map((message) => message.messageId)).toEqual(['msg-1']);
    expect(dlq.released.map((message) => message.messageId)).toEqual(['msg-2']);
  });

  it('takes a small batch per cycle so retries finish inside the visibility timeout', async () => {
    const dlq = new InMemoryQueueClient('notification-dlq');
    for (let i = 0; i < 6; i++) dlq.enqueue('{not json');

    const summary = await new NotificationDlqWorker(dlq, { retryFailedNotification: vi.fn() }).runCycle();

    expect(summary).toEqual({ received: DLQ_MAX_MESSAGES, resolved: 0, failed: DLQ_MAX_MESSAGES, released: 0 });
    expect(dlq.visibleCount).toBe(6 - DLQ_MAX_MESSAGES);
  });

  it('waits the cycle interval between polls and stops on abort', async () => {
    const dlq = new InMemoryQueueClient('notification-dlq');
    const controller = new AbortController();
    const delay = vi.fn().mockImplementation(() => {
      controller.abort();
      return Promise.resolve();
    });
    const worker = new NotificationDlqWorker(dlq, { retryFailedNotification: vi.fn() }, { effects: { delay } });

    await worker.run(controller.signal);

    expect(dlq.receiveCalls).toBe(1);
    expect(delay).toHaveBeenCalledWith(60_000, controller.signal);
  });
});
