import { NotificationDeliveryError } from '@cnab-ingest/core';
import type { Logger } from '@cnab-ingest/logger';
import { afterEach, describe, expect, it, vi } from 'vitest';

import type { Notification } from '../../types.js';
import { LogNotificationSender } from '../log-notification-sender.js';
import { WebhookNotificationSender } from '../webhook-notification-sender.js';

const NOTIFICATION: Notification = {
  notificationId: '11111111-1111-4111-8111-111111111111',
  fileId: '00000000-0000-4000-8000-000000000001',
  notificationType: 'ProcessingCompleted',
  recipientEmail: 'ops@example.com',
  correlationId: 'corr-1',
  context: { status: 'Processed', details: '3 transactions' },
};

function response(status: number, text = '') {
  return { ok: status >= 200 && status < 300, status, text: () => Promise.resolve(text) };
}

describe('WebhookNotificationSender', () => {
  let sender: WebhookNotificationSender | undefined;

  afterEach(async () => {
    await sender?.close();
    sender = undefined;
  });

  it('posts the notification as JSON with the correlation id header', async () => {
    const fetch = vi.fn().mockResolvedValue(response(204));
    sender = new WebhookNotificationSender({ url: 'http://hooks.test/cnab' }, { fetch });

    const result = await sender.send(NOTIFICATION);

    expect(result.isOk()).toBe(true);
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe('http://hooks.test/cnab');
    expect(init).toMatchObject({
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-Correlation-Id': 'corr-1' },
    });
    expect(JSON.parse(init.body)).toEqual({
      notificationId: NOTIFICATION.notificationId,
      fileId: NOTIFICATION.fileId,
      notificationType: 'ProcessingCompleted',
      recipientEmail: 'ops@example.com',
      context: { status: 'Processed', details: '3 transactions' },
    });
  });

  it('reads the body of a successful response to the end', async () => {
    const text = vi.fn().mockResolvedValue('accepted');
    sender = new WebhookNotificationSender(
      { url: 'http://hooks.test/cnab' },
      { fetch: vi.fn().mockResolvedValue({ ok: true, status: 202, text }) }
    );

    const result = await sender.send(NOTIFICATION);

    expect(result.isOk()).toBe(true);
    expect(text).toHaveBeenCalledTimes(1);
  });

  it('still succeeds when the body of a delivered notification cannot be read', async () => {
    const text = vi.fn().mockRejectedValue(new Error('other side closed'));
    sender = new WebhookNotificationSender(
      { url: 'http://hooks.test/cnab' },
      { fetch: vi.fn().mockResolvedValue({ ok: true, status: 200, text }) }
    );

    expect((await sender.send(NOTIFICATION)).isOk()).toBe(true);
  });

  it('fails on a non-2xx response', async () => {
    sender = new WebhookNotificationSender(
      { url: 'http://hooks.test/cnab' },
      { fetch: vi.fn().mockResolvedValue(response(503, 'unavailable')) }
    );

    const error = (await sender.send(NOTIFICATION))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(NotificationDeliveryError);
    expect(error.message).toBe('Webhook responded 503: unavailable');
  });

  it('fails when the request cannot be made', async () => {
    sender = new WebhookNotificationSender(
      { url: 'http://hooks.test/cnab' },
      { fetch: vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:80')) }
    );

    const error = (await sender.send(NOTIFICATION))._unsafeUnwrapErr();

    expect(error.message).toBe('Webhook request failed: connect ECONNREFUSED 127.0.0.1:80');
  });
});

describe('LogNotificationSender', () => {
  it('logs the notification and succeeds', async () => {
    const info = vi.fn();
    const sender = new LogNotificationSender({ info } as unknown as Logger);

    const result = await sender.send(NOTIFICATION);

    expect(result.isOk()).toBe(true);
    expect(info).toHaveBeenCalledWith(
      expect.objectContaining({ notificationId: NOTIFICATION.notificationId, notificationType: 'ProcessingCompleted' }),
      `Notification ProcessingCompleted for file ${NOTIFICATION.fileId}`
    );
  });
});
