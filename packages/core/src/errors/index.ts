/**
 * Error hierarchy for the ingestion pipeline.
 *
 * Business outcomes (structural or content problems in a file) are not errors here:
 * they travel as ValidationIssue data. These classes cover the failures that decide
 * whether a queue message is retained or acknowledged.
 */

export interface DomainErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  cause?: unknown;
  correlationId?: string | undefined;
  fileId?: string | undefined;
}

export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly correlationId?: string | undefined;
  readonly fileId?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: DomainErrorContext) {
    super(message, context?.cause === undefined ? undefined : { cause: context.cause });
    this.timestamp = new Date().toISOString();
    this.correlationId = context?.correlationId;
    this.fileId = context?.fileId;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      correlationId: this.correlationId,
      fileId: this.fileId,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Storage or transaction failure inside the atomic persistence scope.
 */
export class PersistenceError extends DomainError {
  readonly code = 'PERSISTENCE_ERROR';
  readonly severity = 'error' as const;
}

/**
 * Network, timeout or availability failure talking to the queue, object store or database.
 * Never mapped to a rejected file: the message is left for redelivery.
 */
export class TransientInfrastructureError extends DomainError {
  readonly code = 'TRANSIENT_INFRASTRUCTURE_ERROR';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly operation: string,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

export class InvalidStatusTransitionError extends DomainError {
  readonly code = 'INVALID_STATUS_TRANSITION';
  readonly severity = 'error' as const;

  constructor(
    public readonly from: string,
    public readonly to: string,
    context?: DomainErrorContext
  ) {
    super(`Invalid file status transition: ${from} -> ${to}`, context);
  }
}

export class SignLookupError extends DomainError {
  readonly code = 'SIGN_LOOKUP_ERROR';
  readonly severity = 'error' as const;
}

export class NotificationDeliveryError extends DomainError {
  readonly code = 'NOTIFICATION_DELIVERY_ERROR';
  readonly severity = 'warning' as const;
}

export function isTransientInfrastructureError(error: unknown): error is TransientInfrastructureError {
  return error instanceof TransientInfrastructureError;
}
