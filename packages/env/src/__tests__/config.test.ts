import { describe, expect, it } from 'vitest';

import { loadWorkerConfig } from '../config.js';

const requiredEnv = {
  NOTIFICATION_DLQ_URL: 'http://localhost:4566/000000000000/notifications-dlq',
  OBJECT_STORAGE_BUCKET: 'cnab-uploads',
  PROCESSING_QUEUE_URL: 'http://localhost:4566/000000000000/file-processing',
};

describe('loadWorkerConfig', () => {
  it('applies defaults for optional settings', () => {
    const config = loadWorkerConfig(requiredEnv)._unsafeUnwrap();

    expect(config.aws).toEqual({ endpoint: undefined, region: 'us-east-1' });
    expect(config.worker).toEqual({ emptyQueueDelayMs: 5000, errorDelayMs: 5000, interMessageDelayMs: 100 });
    expect(config.notifications).toEqual({
      dlqIntervalMs: 60000,
      recipientEmail: 'notifications@cnab-ingest.local',
      webhookUrl: undefined,
    });
    expect(config.queues.processingUrl).toBe(requiredEnv.PROCESSING_QUEUE_URL);
  });

  it('coerces numeric settings and keeps overrides', () => {
    const config = loadWorkerConfig({
      ...requiredEnv,
      AWS_ENDPOINT_URL: 'http://localhost:4566',
      DATABASE_PATH: ':memory:',
      NOTIFICATION_WEBHOOK_URL: 'https://hooks.example.test/cnab',
      WORKER_EMPTY_QUEUE_DELAY_MS: '250',
    })._unsafeUnwrap();

    expect(config.databasePath).toBe(':memory:');
    expect(config.aws.endpoint).toBe('http://localhost:4566');
    expect(config.notifications.webhookUrl).toBe('https://hooks.example.test/cnab');
    expect(config.worker.emptyQueueDelayMs).toBe(250);
  });

  it('treats an empty optional URL as unset', () => {
    const config = loadWorkerConfig({ ...requiredEnv, NOTIFICATION_WEBHOOK_URL: '' })._unsafeUnwrap();

    expect(config.notifications.webhookUrl).toBeUndefined();
  });

  it('lists every missing required variable', () => {
    const result = loadWorkerConfig({});

    expect(result.isErr()).toBe(true);
    const message = result._unsafeUnwrapErr().message;
    expect(message).toContain('PROCESSING_QUEUE_URL');
    expect(message).toContain('NOTIFICATION_DLQ_URL');
    expect(message).toContain('OBJECT_STORAGE_BUCKET');
  });

  it('rejects a non-positive delay', () => {
    expect(loadWorkerConfig({ ...requiredEnv, WORKER_ERROR_DELAY_MS: '0' }).isErr()).toBe(true);
  });
});
