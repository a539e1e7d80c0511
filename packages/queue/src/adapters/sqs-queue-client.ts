import {
  ChangeMessageVisibilityCommand,
  DeleteMessageCommand,
  ReceiveMessageCommand,
  SendMessageCommand,
  type SQSClient,
} from '@aws-sdk/client-sqs';
import { getErrorMessage, TransientInfrastructureError } from '@cnab-ingest/core';
import { getLogger, type Logger } from '@cnab-ingest/logger';
import { isTransientError, retryWithBackoff, type RetryEffects, type RetryPolicy } from '@cnab-ingest/resilience';
import { err, ok, type Result } from 'neverthrow';

import type { QueueClient, QueueMessage, ReceiveOptions, SendOptions } from '../port.js';

export const DEFAULT_SQS_RETRY_POLICY: RetryPolicy = { baseDelayMs: 200, maxDelayMs: 5000, retries: 3 };

export interface SqsQueueClientOptions {
  name: string;
  queueUrl: string;
  retryPolicy?: RetryPolicy | undefined;
  effects?: Partial<RetryEffects> | undefined;
}

/**
 * QueueClient over Amazon SQS. Transient SDK failures are retried here; anything
 * still failing is surfaced as TransientInfrastructureError, other failures as-is.
 */
export class SqsQueueClient implements QueueClient {
  readonly name: string;
  private readonly queueUrl: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly effects: Partial<RetryEffects> | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly sqs: SQSClient,
    options: SqsQueueClientOptions
  ) {
    this.name = options.name;
    this.queueUrl = options.queueUrl;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_SQS_RETRY_POLICY;
    this.effects = options.effects;
    this.logger = getLogger(`SqsQueueClient:${options.name}`);
  }

  async receive(options: ReceiveOptions): Promise<Result<QueueMessage[], Error>> {
    return this.call(
      'receive',
      async () => {
        const response = await this.sqs.send(
          new ReceiveMessageCommand({
            QueueUrl: this.queueUrl,
            MaxNumberOfMessages: options.maxMessages,
            VisibilityTimeout: options.visibilityTimeoutSeconds,
            WaitTimeSeconds: options.waitTimeSeconds,
            MessageSystemAttributeNames: ['ApproximateReceiveCount'],
          }),
          options.signal ? { abortSignal: options.signal } : {}
        );

        const messages: QueueMessage[] = [];
        for (const message of response.Messages ?? []) {
          if (!message.ReceiptHandle) {
            this.logger.warn({ messageId: message.MessageId }, 'Received message without receipt handle');
            continue;
          }
          messages.push({
            messageId: message.MessageId ?? message.ReceiptHandle,
            receiptHandle: message.ReceiptHandle,
            body: message.Body,
            receiveCount: Number(message.Attributes?.ApproximateReceiveCount ?? '1'),
          });
        }
        return messages;
      },
      options.signal
    );
  }

  async delete(message: QueueMessage): Promise<Result<void, Error>> {
    return this.call('delete', async () => {
      await this.sqs.send(new DeleteMessageCommand({ QueueUrl: this.queueUrl, ReceiptHandle: message.receiptHandle }));
    });
  }

  async release(message: QueueMessage): Promise<Result<void, Error>> {
    return this.call('release', async () => {
      await this.sqs.send(
        new ChangeMessageVisibilityCommand({
          QueueUrl: this.queueUrl,
          ReceiptHandle: message.receiptHandle,
          VisibilityTimeout: 0,
        })
      );
    });
  }

  async send(body: string, options?: SendOptions): Promise<Result<string, Error>> {
    return this.call('send', async () => {
      const response = await this.sqs.send(
        new SendMessageCommand({
          QueueUrl: this.queueUrl,
          MessageBody: body,
          MessageAttributes: Object.fromEntries(
            Object.entries(options?.attributes ?? {}).map(([key, value]) => [
              key,
              { DataType: 'String', StringValue: value },
            ])
          ),
        })
      );
      return response.MessageId ?? '';
    });
  }

  private async call<T>(operation: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<Result<T, Error>> {
    const outcome = await retryWithBackoff(
      async (): Promise<Result<T, Error>> => {
        try {
          return ok(await fn());
        } catch (error) {
          return err(error instanceof Error ? error : new Error(getErrorMessage(error)));
        }
      },
      {
        effects: this.effects,
        onRetry: ({ attempt, delayMs, error }) =>
          this.logger.warn({ attempt, delayMs, error: error.message, operation }, 'Retrying SQS call'),
        policy: this.retryPolicy,
        shouldRetry: isTransientError,
        signal,
      }
    );

    if (outcome.result.isOk()) return ok(outcome.result.value);

    const error = outcome.result.error;
    if (isTransientError(error)) {
      return err(
        new TransientInfrastructureError(`SQS ${operation} failed on ${this.name}: ${error.message}`, `sqs.${operation}`, {
          additionalContext: { attempts: outcome.attempts },
          cause: error,
        })
      );
    }
    return err(new Error(`SQS ${operation} failed on ${this.name}: ${error.message}`, { cause: error }));
  }
}
