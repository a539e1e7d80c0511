import { getErrorMessage, NotificationDeliveryError } from '@cnab-ingest/core';
import { getLogger, type Logger } from '@cnab-ingest/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';

import type { Notification, NotificationSender } from '../types.js';

export interface WebhookRequest {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

export interface WebhookResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export interface WebhookEffects {
  fetch: (url: string, init: WebhookRequest) => Promise<WebhookResponse>;
}

export interface WebhookNotificationSenderConfig {
  url: string;
  timeoutMs?: number | undefined;
}

/**
 * POSTs each notification as JSON. Anything but a 2xx response is a failed send.
 */
export class WebhookNotificationSender implements NotificationSender {
  readonly name = 'webhook';
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly agent: Agent;
  private readonly effects: WebhookEffects;
  private readonly logger: Logger;

  constructor(config: WebhookNotificationSenderConfig, effects?: Partial<WebhookEffects>) {
    this.url = config.url;
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.logger = getLogger('WebhookNotificationSender');

    this.agent = new Agent({
      keepAliveTimeout: 10000,
      keepAliveMaxTimeout: 60000,
      pipelining: 1,
    });

    this.effects = {
      fetch: (url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }),
      ...effects,
    };
  }

  async send(notification: Notification, signal?: AbortSignal): Promise<Result<void, Error>> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const requestSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

    try {
      const response = await this.effects.fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-Correlation-Id': notification.correlationId,
        },
        body: JSON.stringify({
          notificationId: notification.notificationId,
          fileId: notification.fileId,
          notificationType: notification.notificationType,
          recipientEmail: notification.recipientEmail,
          context: notification.context,
        }),
        signal: requestSignal,
      });

      if (!response.ok) {
        const text = await response.text();
        return err(
          new NotificationDeliveryError(`Webhook responded ${response.status}: ${text.slice(0, 200)}`, {
            correlationId: notification.correlationId,
            fileId: notification.fileId,
            additionalContext: { status: response.status },
          })
        );
      }

      await this.drain(response, notification.notificationId);
      this.logger.debug({ notificationId: notification.notificationId, status: response.status }, 'Webhook delivered');
      return ok();
    } catch (error) {
      return err(
        new NotificationDeliveryError(`Webhook request failed: ${getErrorMessage(error)}`, {
          cause: error,
          correlationId: notification.correlationId,
          fileId: notification.fileId,
        })
      );
    }
  }

  /** Reads the body to its end so the connection returns to the keep-alive pool. */
  private async drain(response: WebhookResponse, notificationId: string): Promise<void> {
    try {
      await response.text();
    } catch (error) {
      // Already delivered; only the connection is lost
      this.logger.debug({ notificationId, error: getErrorMessage(error) }, 'Could not read webhook response body');
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}
