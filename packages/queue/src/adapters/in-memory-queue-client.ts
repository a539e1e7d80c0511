import { TransientInfrastructureError } from '@cnab-ingest/core';
import { err, ok, type Result } from 'neverthrow';

import type { QueueClient, QueueMessage, ReceiveOptions, SendOptions } from '../port.js';

interface StoredMessage {
  messageId: string;
  body: string | undefined;
  attributes: Record<string, string>;
  receiveCount: number;
  /** Receipt handle of the current delivery, while in flight. */
  inFlightHandle: string | undefined;
}

export interface InMemoryQueueOptions {
  /** Redeliveries beyond this move the message to deadLetterQueue on expireInFlight(). */
  maxReceiveCount?: number | undefined;
  deadLetterQueue?: InMemoryQueueClient | undefined;
}

/**
 * In-process QueueClient with visibility semantics: received messages stay hidden
 * until deleted, released, or expired. Records every acknowledgement for assertions.
 */
export class InMemoryQueueClient implements QueueClient {
  readonly deleted: QueueMessage[] = [];
  readonly released: QueueMessage[] = [];
  readonly sent: { body: string; attributes: Record<string, string> }[] = [];
  receiveCalls = 0;

  private readonly messages: StoredMessage[] = [];
  private readonly pendingFailures: { operation: 'receive' | 'delete' | 'send'; error: Error }[] = [];
  private sequence = 0;

  constructor(
    readonly name = 'in-memory',
    private readonly options: InMemoryQueueOptions = {}
  ) {}

  /** Adds a message as an external producer would. */
  enqueue(body: string | undefined, attributes: Record<string, string> = {}): string {
    this.sequence += 1;
    const messageId = `msg-${this.sequence}`;
    this.messages.push({ attributes, body, inFlightHandle: undefined, messageId, receiveCount: 0 });
    return messageId;
  }

  /** The next call of the given operation fails with this error. */
  failNext(operation: 'receive' | 'delete' | 'send', error: Error): void {
    this.pendingFailures.push({ error, operation });
  }

  get visibleCount(): number {
    return this.messages.filter((m) => m.inFlightHandle === undefined).length;
  }

  get inFlightCount(): number {
    return this.messages.filter((m) => m.inFlightHandle !== undefined).length;
  }

  get size(): number {
    return this.messages.length;
  }

  /**
   * Simulates the visibility timeout elapsing for every in-flight message.
   */
  expireInFlight(): void {
    const { deadLetterQueue, maxReceiveCount } = this.options;
    for (const message of [...this.messages]) {
      if (message.inFlightHandle === undefined) continue;
      message.inFlightHandle = undefined;
      if (deadLetterQueue && maxReceiveCount !== undefined && message.receiveCount >= maxReceiveCount) {
        this.messages.splice(this.messages.indexOf(message), 1);
        deadLetterQueue.enqueue(message.body, message.attributes);
      }
    }
  }

  receive(options: ReceiveOptions): Promise<Result<QueueMessage[], Error>> {
    this.receiveCalls += 1;
    const failure = this.takeFailure('receive');
    if (failure) return Promise.resolve(err(failure));

    const batch = this.messages.filter((m) => m.inFlightHandle === undefined).slice(0, options.maxMessages);
    return Promise.resolve(
      ok(
        batch.map((message) => {
          message.receiveCount += 1;
          message.inFlightHandle = `${message.messageId}#${message.receiveCount}`;
          return {
            body: message.body,
            messageId: message.messageId,
            receiptHandle: message.inFlightHandle,
            receiveCount: message.receiveCount,
          };
        })
      )
    );
  }

  delete(message: QueueMessage): Promise<Result<void, Error>> {
    const failure = this.takeFailure('delete');
    if (failure) return Promise.resolve(err(failure));

    const index = this.messages.findIndex((m) => m.inFlightHandle === message.receiptHandle);
    if (index === -1) {
      return Promise.resolve(err(new Error(`Receipt handle ${message.receiptHandle} is not in flight`)));
    }
    this.messages.splice(index, 1);
    this.deleted.push(message);
    return Promise.resolve(ok());
  }

  release(message: QueueMessage): Promise<Result<void, Error>> {
    const stored = this.messages.find((m) => m.inFlightHandle === message.receiptHandle);
    if (stored) {
      stored.inFlightHandle = undefined;
    }
    this.released.push(message);
    return Promise.resolve(ok());
  }

  send(body: string, options?: SendOptions): Promise<Result<string, Error>> {
    const failure = this.takeFailure('send');
    if (failure) return Promise.resolve(err(failure));

    const attributes = options?.attributes ?? {};
    this.sent.push({ attributes, body });
    return Promise.resolve(ok(this.enqueue(body, attributes)));
  }

  private takeFailure(operation: 'receive' | 'delete' | 'send'): Error | undefined {
    const index = this.pendingFailures.findIndex((f) => f.operation === operation);
    if (index === -1) return undefined;
    const [failure] = this.pendingFailures.splice(index, 1);
    return failure?.error;
  }
}

export function transientQueueError(operation: string): TransientInfrastructureError {
  return new TransientInfrastructureError(`Simulated ${operation} outage`, operation);
}
