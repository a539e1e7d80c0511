import type { Result } from 'neverthrow';

/** Receive limits used by every consumer in this system. */
export const QueueDefaults = {
  MAX_MESSAGES: 10,
  VISIBILITY_TIMEOUT_SECONDS: 300,
  WAIT_TIME_SECONDS: 20,
} as const;

export interface QueueMessage {
  messageId: string;
  receiptHandle: string;
  /** Absent when the transport delivered no body. */
  body: string | undefined;
  /** Deliveries so far, including this one. */
  receiveCount: number;
}

export interface ReceiveOptions {
  maxMessages: number;
  visibilityTimeoutSeconds: number;
  waitTimeSeconds: number;
  /** Aborts an in-flight long poll. */
  signal?: AbortSignal | undefined;
}

export interface SendOptions {
  /** String attributes carried beside the body. */
  attributes?: Record<string, string> | undefined;
}

/**
 * One queue. Errors are TransientInfrastructureError once client-layer retries are exhausted.
 */
export interface QueueClient {
  readonly name: string;
  receive(options: ReceiveOptions): Promise<Result<QueueMessage[], Error>>;
  /** Acknowledge: the message will not be delivered again. */
  delete(message: QueueMessage): Promise<Result<void, Error>>;
  /** Make the message visible to other consumers now instead of after its timeout. */
  release(message: QueueMessage): Promise<Result<void, Error>>;
  send(body: string, options?: SendOptions): Promise<Result<string, Error>>;
}
