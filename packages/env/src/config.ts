import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const positiveMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalUrl = z
  .string()
  .trim()
  .transform((val) => (val === '' ? undefined : val))
  .pipe(z.string().url().optional())
  .optional();

export const workerEnvSchema = z.object({
  AWS_ENDPOINT_URL: optionalUrl,
  AWS_REGION: z.string().trim().min(1).default('us-east-1'),
  DATABASE_PATH: z.string().trim().min(1).default(path.join('data', 'cnab-ingest.db')),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  NOTIFICATION_DLQ_INTERVAL_MS: positiveMs(60_000),
  NOTIFICATION_DLQ_URL: z.string().trim().url({ message: 'NOTIFICATION_DLQ_URL must be a queue URL' }),
  NOTIFICATION_RECIPIENT_EMAIL: z.string().trim().email().default('notifications@cnab-ingest.local'),
  NOTIFICATION_WEBHOOK_URL: optionalUrl,
  OBJECT_STORAGE_BUCKET: z.string().trim().min(1, { message: 'OBJECT_STORAGE_BUCKET is required' }),
  PROCESSING_QUEUE_URL: z.string().trim().url({ message: 'PROCESSING_QUEUE_URL must be a queue URL' }),
  WORKER_EMPTY_QUEUE_DELAY_MS: positiveMs(5_000),
  WORKER_ERROR_DELAY_MS: positiveMs(5_000),
  WORKER_INTER_MESSAGE_DELAY_MS: positiveMs(100),
});

export type WorkerEnv = z.infer<typeof workerEnvSchema>;

export interface WorkerConfig {
  nodeEnv: WorkerEnv['NODE_ENV'];
  databasePath: string;
  aws: {
    region: string;
    endpoint: string | undefined;
  };
  queues: {
    processingUrl: string;
    notificationDlqUrl: string;
  };
  objectStorage: {
    bucket: string;
  };
  notifications: {
    webhookUrl: string | undefined;
    recipientEmail: string;
    dlqIntervalMs: number;
  };
  worker: {
    emptyQueueDelayMs: number;
    errorDelayMs: number;
    interMessageDelayMs: number;
  };
}

/**
 * Validates the worker environment. Does not cache: callers load once at startup.
 */
export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): Result<WorkerConfig, Error> {
  const result = workerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    return err(new Error(`Environment validation failed:\n${errors}`));
  }

  const data = result.data;
  return ok({
    nodeEnv: data.NODE_ENV,
    databasePath: data.DATABASE_PATH,
    aws: {
      region: data.AWS_REGION,
      endpoint: data.AWS_ENDPOINT_URL,
    },
    queues: {
      processingUrl: data.PROCESSING_QUEUE_URL,
      notificationDlqUrl: data.NOTIFICATION_DLQ_URL,
    },
    objectStorage: {
      bucket: data.OBJECT_STORAGE_BUCKET,
    },
    notifications: {
      webhookUrl: data.NOTIFICATION_WEBHOOK_URL,
      recipientEmail: data.NOTIFICATION_RECIPIENT_EMAIL,
      dlqIntervalMs: data.NOTIFICATION_DLQ_INTERVAL_MS,
    },
    worker: {
      emptyQueueDelayMs: data.WORKER_EMPTY_QUEUE_DELAY_MS,
      errorDelayMs: data.WORKER_ERROR_DELAY_MS,
      interMessageDelayMs: data.WORKER_INTER_MESSAGE_DELAY_MS,
    },
  });
}
