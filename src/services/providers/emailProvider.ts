import { MailService } from '@sendgrid/mail';
import { randomUUID } from 'crypto';
import {
  DeliveryAttempt,
  DeliveryProvider,
  DeliveryResult,
  DeliveryStatus,
  Notification,
  NotificationChannel,
} from '../../types/notification';
import { errorMessage } from '../../utils/errors';
import { logger, maskAddress } from '../../utils/logger';
import {
  confirmAccepted,
  deliveryAccepted,
  deliveryFailure,
  errorProperty,
  statusFromHttpCode,
} from './deliveryResult';

export interface EmailProviderConfig {
  apiKey?: string;
  from: {
    email: string;
    name: string;
  };
  replyTo?: string;
  trackingSettings?: {
    clickTracking?: boolean;
    openTracking?: boolean;
  };
  sandbox?: boolean;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class EmailProvider implements DeliveryProvider {
  private config: EmailProviderConfig;
  private sendgrid?: MailService;
  private logger = logger.child({ provider: 'email' });

  constructor(config: EmailProviderConfig, client?: MailService) {
    this.config = config;

    if (client) {
      this.sendgrid = client;
    } else if (config.apiKey) {
      this.sendgrid = new MailService();
      this.sendgrid.setApiKey(config.apiKey);
    }
  }

  getProviderName(): string {
    return 'SENDGRID';
  }

  getSupportedChannels(): NotificationChannel[] {
    return [NotificationChannel.EMAIL];
  }

  canHandle(notification: Notification): boolean {
    return (
      notification.channel === NotificationChannel.EMAIL &&
      !!notification.recipientAddress &&
      EMAIL_PATTERN.test(notification.recipientAddress)
    );
  }

  isAvailable(): boolean {
    return !!this.config.sandbox || !!this.sendgrid;
  }

  async deliver(notification: Notification): Promise<DeliveryResult> {
    const to = notification.recipientAddress;
    if (!to) {
      return deliveryFailure(DeliveryStatus.INVALID_RECIPIENT, 'Email recipient not specified');
    }

    if (this.config.sandbox) {
      const messageId = `sandbox-${randomUUID()}`;
      this.logger.info('Email sent (sandbox mode)', {
        notificationId: notification.id,
        to: maskAddress(to),
        subject: notification.subject,
      });
      return deliveryAccepted(messageId, messageId, { responseCode: '202', providerResponse: { sandbox: true } });
    }

    if (!this.sendgrid) {
      return deliveryFailure(DeliveryStatus.PROVIDER_ERROR, 'SendGrid not configured');
    }

    try {
      const [response] = await this.sendgrid.send({
        to,
        from: notification.senderAddress
          ? { email: notification.senderAddress, name: this.config.from.name }
          : this.config.from,
        subject: notification.subject || 'Notification',
        text: notification.content || '',
        html: notification.htmlContent || notification.content || '',
        replyTo: this.config.replyTo,
        trackingSettings: {
          clickTracking: { enable: this.config.trackingSettings?.clickTracking ?? true },
          openTracking: { enable: this.config.trackingSettings?.openTracking ?? true },
        },
        customArgs: {
          notificationId: notification.id,
          correlationId: notification.correlationId || '',
        },
      });

      const headerId = response.headers['x-message-id'];
      const messageId = typeof headerId === 'string' ? headerId : `sg-${randomUUID()}`;

      if (response.statusCode < 200 || response.statusCode >= 300) {
        return deliveryFailure(statusFromHttpCode(response.statusCode), 'SendGrid rejected the message', {
          responseCode: String(response.statusCode),
        });
      }

      // SendGrid only acknowledges acceptance; opens and bounces arrive through its event webhook.
      return deliveryAccepted(messageId, messageId, { responseCode: String(response.statusCode) });
    } catch (error) {
      const code = errorProperty(error, 'code');
      const status = typeof code === 'number' ? statusFromHttpCode(code) : DeliveryStatus.FAILED;

      this.logger.error('Failed to send email', {
        notificationId: notification.id,
        to: maskAddress(to),
        error: errorMessage(error),
        code,
      });

      return deliveryFailure(status, `Failed to send email: ${errorMessage(error)}`, {
        responseCode: code !== undefined ? String(code) : undefined,
      });
    }
  }

  async checkStatus(attempt: DeliveryAttempt): Promise<DeliveryResult> {
    // No status endpoint; acceptance without a bounce event by now counts as delivered.
    return confirmAccepted(attempt);
  }
}
