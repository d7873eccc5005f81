import axios, { AxiosInstance } from 'axios';
import crypto from 'crypto';
import {
  DeliveryAttempt,
  DeliveryProvider,
  DeliveryResult,
  DeliveryStatus,
  Notification,
  NotificationChannel,
} from '../../types/notification';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { confirmAccepted, deliveryFailure, deliverySuccess, errorProperty, statusFromHttpCode } from './deliveryResult';

export interface WebhookProviderConfig {
  timeout?: number;
  userAgent?: string;
  signatureHeader?: string;
  signatureSecret?: string;
  sandbox?: boolean;
}

interface WebhookPayload {
  id: string;
  type: string;
  timestamp: number;
  correlationId?: string;
  data: {
    subject?: string;
    body?: string;
    html?: string;
    metadata?: Record<string, unknown>;
  };
}

const SUPPORTED_CHANNELS = [
  NotificationChannel.WEBHOOK,
  NotificationChannel.SLACK,
  NotificationChannel.TEAMS,
  NotificationChannel.DISCORD,
];

/** Plain HTTP webhooks plus the chat platforms that accept incoming-webhook URLs. */
export class WebhookProvider implements DeliveryProvider {
  private config: WebhookProviderConfig;
  private http: AxiosInstance;
  private logger = logger.child({ provider: 'webhook' });

  constructor(config: WebhookProviderConfig = {}, http?: AxiosInstance) {
    this.config = config;
    this.http =
      http ||
      axios.create({
        timeout: config.timeout || 30000,
        headers: {
          'User-Agent': config.userAgent || 'Notification-Webhook/1.0',
          'Content-Type': 'application/json',
        },
      });
  }

  getProviderName(): string {
    return 'WEBHOOK';
  }

  getSupportedChannels(): NotificationChannel[] {
    return SUPPORTED_CHANNELS;
  }

  canHandle(notification: Notification): boolean {
    return (
      SUPPORTED_CHANNELS.includes(notification.channel) &&
      !!notification.recipientAddress &&
      this.isValidUrl(notification.recipientAddress)
    );
  }

  isAvailable(): boolean {
    return true;
  }

  async deliver(notification: Notification): Promise<DeliveryResult> {
    const url = notification.recipientAddress;
    if (!url || !this.isValidUrl(url)) {
      return deliveryFailure(DeliveryStatus.INVALID_RECIPIENT, 'Invalid webhook URL');
    }

    const body = this.buildBody(notification);

    if (this.config.sandbox) {
      this.logger.info('Webhook sent (sandbox mode)', {
        notificationId: notification.id,
        channel: notification.channel,
        host: new URL(url).host,
      });
      return deliverySuccess(`sandbox-webhook-${notification.id}`, undefined, {
        providerResponse: { sandbox: true },
      });
    }

    const headers: Record<string, string> = {
      'X-Notification-Id': notification.id,
    };
    if (notification.channel === NotificationChannel.WEBHOOK && this.config.signatureSecret) {
      headers[this.config.signatureHeader || 'X-Signature'] = this.sign(JSON.stringify(body));
    }

    try {
      const response = await this.http.post(url, body, { headers });

      return deliverySuccess(notification.id, notification.id, {
        responseCode: String(response.status),
        responseMessage: response.statusText,
      });
    } catch (error) {
      const result = this.failureFromError(error);
      this.logger.error('Webhook delivery failed', {
        notificationId: notification.id,
        channel: notification.channel,
        status: result.status,
        error: errorMessage(error),
      });
      return result;
    }
  }

  async checkStatus(attempt: DeliveryAttempt): Promise<DeliveryResult> {
    return confirmAccepted(attempt);
  }

  sign(payload: string): string {
    const secret = this.config.signatureSecret || '';
    const digest = crypto.createHmac('sha256', secret).update(payload).digest('hex');
    return `sha256=${digest}`;
  }

  private buildBody(notification: Notification): WebhookPayload | Record<string, unknown> {
    const text = notification.subject
      ? `*${notification.subject}*\n${notification.content || ''}`
      : notification.content || '';

    switch (notification.channel) {
      case NotificationChannel.SLACK:
        return { text };
      case NotificationChannel.DISCORD:
        return { content: text.substring(0, 2000) };
      case NotificationChannel.TEAMS:
        return {
          '@type': 'MessageCard',
          '@context': 'http://schema.org/extensions',
          summary: notification.subject || notification.type,
          title: notification.subject,
          text: notification.content || '',
        };
      default:
        return {
          id: notification.id,
          type: notification.type,
          timestamp: Date.now(),
          correlationId: notification.correlationId,
          data: {
            subject: notification.subject,
            body: notification.content,
            html: notification.htmlContent,
            metadata: notification.metadata,
          },
        };
    }
  }

  private failureFromError(error: unknown): DeliveryResult {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        return deliveryFailure(
          statusFromHttpCode(error.response.status),
          `Webhook responded with ${error.response.status}`,
          { responseCode: String(error.response.status), responseMessage: error.response.statusText }
        );
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return deliveryFailure(DeliveryStatus.TIMEOUT, 'Webhook request timed out', { responseCode: error.code });
      }
    }

    const code = errorProperty(error, 'code');
    return deliveryFailure(DeliveryStatus.FAILED, `Webhook request failed: ${errorMessage(error)}`, {
      responseCode: code !== undefined ? String(code) : undefined,
    });
  }

  private isValidUrl(url: string): boolean {
    try {
      const parsed = new URL(url);
      return parsed.protocol === 'http:' || parsed.protocol === 'https:';
    } catch {
      return false;
    }
  }
}
