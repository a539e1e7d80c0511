import { describe, expect, it } from 'vitest';

import { fromDlqPayload, parseNotificationDlqPayload } from '../dlq-payload.js';

const VALID = {
  notificationId: '11111111-1111-4111-8111-111111111111',
  fileId: '00000000-0000-4000-8000-000000000001',
  notificationType: 'ProcessingFailed',
  recipientEmail: 'ops@example.com',
  attemptCount: 4,
  lastAttemptAt: '2024-03-01T12:00:00Z',
};

describe('parseNotificationDlqPayload', () => {
  it('accepts a payload without context or correlation id', () => {
    const payload = parseNotificationDlqPayload(JSON.stringify(VALID))._unsafeUnwrap();

    expect(payload.context).toEqual({});
    expect(fromDlqPayload(payload).correlationId).toBe(VALID.notificationId);
  });

  it('rejects an unknown notification type', () => {
    const result = parseNotificationDlqPayload(JSON.stringify({ ...VALID, notificationType: 'Other' }));

    expect(result._unsafeUnwrapErr().message).toMatch(/^Invalid notification DLQ payload: notificationType: /);
  });

  it('rejects an empty body', () => {
    expect(parseNotificationDlqPayload(undefined)._unsafeUnwrapErr().message).toBe('Message body is empty');
  });
});
