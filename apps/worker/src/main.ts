#!/usr/bin/env node
import { S3Client } from '@aws-sdk/client-s3';
import { SQSClient } from '@aws-sdk/client-sqs';
import { DataContext } from '@cnab-ingest/data';
import { loadWorkerConfig } from '@cnab-ingest/env';
import { createLoggingIngestionObserver, IngestionOrchestrator } from '@cnab-ingest/ingestion';
import { getLogger } from '@cnab-ingest/logger';
import {
  LogNotificationSender,
  NotificationChannel,
  NotificationDlqWorker,
  WebhookNotificationSender,
} from '@cnab-ingest/notifications';
import { SqsQueueClient } from '@cnab-ingest/queue';

import { S3ObjectStorage } from './storage/s3-object-storage.js';
import { QueueWorker } from './worker/queue-worker.js';

const logger = getLogger('worker');

async function main(): Promise<number> {
  const configResult = loadWorkerConfig();
  if (configResult.isErr()) {
    logger.error(configResult.error.message);
    return 1;
  }
  const config = configResult.value;

  const dataResult = await DataContext.initialize(config.databasePath);
  if (dataResult.isErr()) {
    logger.error({ error: dataResult.error.message, databasePath: config.databasePath }, 'Failed to open database');
    return 1;
  }
  const data = dataResult.value;

  const endpoint = config.aws.endpoint;
  const sqs = new SQSClient({ region: config.aws.region, ...(endpoint ? { endpoint } : {}) });
  const s3 = new S3Client({ region: config.aws.region, ...(endpoint ? { endpoint, forcePathStyle: true } : {}) });

  const processingQueue = new SqsQueueClient(sqs, { name: 'file-processing', queueUrl: config.queues.processingUrl });
  const notificationDlq = new SqsQueueClient(sqs, {
    name: 'notification-dlq',
    queueUrl: config.queues.notificationDlqUrl,
  });

  const controller = new AbortController();
  const observer = createLoggingIngestionObserver(getLogger('metrics'));
  const webhook = config.notifications.webhookUrl
    ? new WebhookNotificationSender({ url: config.notifications.webhookUrl })
    : undefined;
  const channel = new NotificationChannel(webhook ?? new LogNotificationSender(), notificationDlq, {
    recipientEmail: config.notifications.recipientEmail,
    observer,
    signal: controller.signal,
  });

  const orchestrator = new IngestionOrchestrator(data, new S3ObjectStorage(s3, { bucket: config.objectStorage.bucket }), {
    observer,
  });
  const worker = new QueueWorker(processingQueue, orchestrator, {
    notifier: channel,
    observer,
    emptyQueueDelayMs: config.worker.emptyQueueDelayMs,
    errorDelayMs: config.worker.errorDelayMs,
    interMessageDelayMs: config.worker.interMessageDelayMs,
  });
  const dlqWorker = new NotificationDlqWorker(notificationDlq, channel, {
    intervalMs: config.notifications.dlqIntervalMs,
  });

  const shutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    logger.info({ signal }, 'Shutdown requested, finishing in-flight work');
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  logger.info(
    {
      nodeEnv: config.nodeEnv,
      sender: webhook ? webhook.name : 'log',
      bucket: config.objectStorage.bucket,
    },
    'Starting CNAB ingestion worker'
  );

  let exitCode = 0;
  const supervise = (name: string, loop: Promise<void>) =>
    loop.catch((error: unknown) => {
      logger.error({ error, loop: name }, 'Worker loop crashed, shutting down');
      exitCode = 1;
      controller.abort();
    });

  try {
    await Promise.all([
      supervise('file-processing', worker.run(controller.signal)),
      supervise('notification-dlq', dlqWorker.run(controller.signal)),
    ]);
  } finally {
    await webhook?.close();
    sqs.destroy();
    s3.destroy();
    const closed = await data.close();
    if (closed.isErr()) {
      logger.error({ error: closed.error.message }, 'Failed to close database');
    }
  }

  logger.info('Worker stopped');
  return exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, 'Worker failed to start');
    process.exitCode = 1;
  });
