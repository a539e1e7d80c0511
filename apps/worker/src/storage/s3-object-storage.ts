import { Readable } from 'node:stream';

import { GetObjectCommand, NoSuchKey, type S3Client } from '@aws-sdk/client-s3';
import { getErrorMessage, hasNumberProperty, hasProperty, TransientInfrastructureError } from '@cnab-ingest/core';
import { ObjectNotFoundError, type ObjectStorage, type StoredObject } from '@cnab-ingest/ingestion';
import { getLogger, type Logger } from '@cnab-ingest/logger';
import { isTransientError, retryWithBackoff, type RetryEffects, type RetryPolicy } from '@cnab-ingest/resilience';
import { err, ok, type Result } from 'neverthrow';

export const DEFAULT_S3_RETRY_POLICY: RetryPolicy = { baseDelayMs: 200, maxDelayMs: 5000, retries: 3 };

export interface S3ObjectStorageOptions {
  bucket: string;
  retryPolicy?: RetryPolicy | undefined;
  effects?: Partial<RetryEffects> | undefined;
}

function isNotFound(error: unknown): boolean {
  if (error instanceof NoSuchKey) return true;
  if (error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound')) return true;
  return hasProperty(error, '$metadata') && hasNumberProperty(error.$metadata, 'httpStatusCode')
    ? error.$metadata.httpStatusCode === 404
    : false;
}

async function* bytesOf(stream: Readable): AsyncGenerator<Uint8Array> {
  for await (const chunk of stream) {
    if (chunk instanceof Uint8Array) {
      yield chunk;
    } else if (typeof chunk === 'string') {
      yield Buffer.from(chunk, 'latin1');
    }
  }
}

/**
 * Reads uploaded files from an S3 bucket. Only the GetObject call is retried;
 * a body that breaks mid-stream is reported by whoever consumes it.
 */
export class S3ObjectStorage implements ObjectStorage {
  private readonly bucket: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly effects: Partial<RetryEffects> | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly s3: S3Client,
    options: S3ObjectStorageOptions
  ) {
    this.bucket = options.bucket;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_S3_RETRY_POLICY;
    this.effects = options.effects;
    this.logger = getLogger('S3ObjectStorage');
  }

  async getObject(key: string): Promise<Result<StoredObject, Error>> {
    const outcome = await retryWithBackoff(
      async (): Promise<Result<StoredObject, Error>> => {
        try {
          const response = await this.s3.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
          if (!(response.Body instanceof Readable)) {
            return err(new Error(`S3 returned no readable body for ${key}`));
          }
          const stream = response.Body;
          return ok({ body: bytesOf(stream), contentLength: response.ContentLength, dispose: () => stream.destroy() });
        } catch (error) {
          if (isNotFound(error)) return err(new ObjectNotFoundError(key));
          return err(error instanceof Error ? error : new Error(getErrorMessage(error)));
        }
      },
      {
        effects: this.effects,
        onRetry: ({ attempt, delayMs, error }) =>
          this.logger.warn({ attempt, delayMs, error: error.message, key }, 'Retrying S3 GetObject'),
        policy: this.retryPolicy,
        shouldRetry: isTransientError,
      }
    );

    if (outcome.result.isOk()) return ok(outcome.result.value);

    const error = outcome.result.error;
    if (error instanceof ObjectNotFoundError) return err(error);
    if (isTransientError(error)) {
      return err(
        new TransientInfrastructureError(`S3 GetObject failed for ${key}: ${error.message}`, 's3.getObject', {
          additionalContext: { attempts: outcome.attempts, bucket: this.bucket },
          cause: error,
        })
      );
    }
    return err(new Error(`S3 GetObject failed for ${key}: ${error.message}`, { cause: error }));
  }
}
