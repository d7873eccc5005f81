import twilio from 'twilio';
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
  deliveryPending,
  deliverySuccess,
  errorProperty,
  statusFromHttpCode,
} from './deliveryResult';

export interface SmsProviderConfig {
  accountSid?: string;
  authToken?: string;
  fromNumber?: string;
  statusCallbackUrl?: string;
  maxLength?: number;
  sandbox?: boolean;
}

const PHONE_PATTERN = /^\+[1-9]\d{7,14}$/;

// Twilio error codes for numbers that can never receive the message.
const INVALID_NUMBER_CODES = new Set([21211, 21214, 21610, 21614]);

export class SmsProvider implements DeliveryProvider {
  private config: SmsProviderConfig;
  private twilioClient?: twilio.Twilio;
  private logger = logger.child({ provider: 'sms' });

  constructor(config: SmsProviderConfig, client?: twilio.Twilio) {
    this.config = config;

    if (client) {
      this.twilioClient = client;
    } else if (config.accountSid && config.authToken) {
      this.twilioClient = twilio(config.accountSid, config.authToken);
    }
  }

  getProviderName(): string {
    return 'TWILIO';
  }

  getSupportedChannels(): NotificationChannel[] {
    return [NotificationChannel.SMS];
  }

  canHandle(notification: Notification): boolean {
    return (
      notification.channel === NotificationChannel.SMS &&
      !!notification.recipientAddress &&
      PHONE_PATTERN.test(notification.recipientAddress)
    );
  }

  isAvailable(): boolean {
    if (this.config.sandbox) {
      return true;
    }
    return !!this.twilioClient && !!this.config.fromNumber;
  }

  async deliver(notification: Notification): Promise<DeliveryResult> {
    const to = notification.recipientAddress;
    if (!to) {
      return deliveryFailure(DeliveryStatus.INVALID_RECIPIENT, 'Phone number not specified');
    }

    const body = this.truncate(notification.content || notification.subject || '');

    if (this.config.sandbox) {
      const messageId = `sandbox-sms-${randomUUID()}`;
      this.logger.info('SMS sent (sandbox mode)', {
        notificationId: notification.id,
        to: maskAddress(to),
        length: body.length,
      });
      return deliverySuccess(messageId, messageId, { providerResponse: { sandbox: true } });
    }

    if (!this.twilioClient || !this.config.fromNumber) {
      return deliveryFailure(DeliveryStatus.PROVIDER_ERROR, 'Twilio client not configured');
    }

    try {
      const result = await this.twilioClient.messages.create({
        to,
        from: notification.senderAddress || this.config.fromNumber,
        body,
        statusCallback: this.config.statusCallbackUrl,
      });

      if (result.status === 'failed' || result.status === 'undelivered') {
        return deliveryFailure(DeliveryStatus.FAILED, result.errorMessage || `Twilio status ${result.status}`, {
          externalId: result.sid,
          providerMessageId: result.sid,
          responseCode: result.errorCode !== null ? String(result.errorCode) : undefined,
        });
      }

      return deliveryAccepted(result.sid, result.sid, {
        responseCode: '201',
        responseMessage: result.status,
        costCents: this.toCents(result.price),
        providerResponse: { numSegments: result.numSegments, direction: result.direction },
      });
    } catch (error) {
      this.logger.error('Failed to send SMS', {
        notificationId: notification.id,
        to: maskAddress(to),
        error: errorMessage(error),
      });
      return this.failureFromError(error);
    }
  }

  async checkStatus(attempt: DeliveryAttempt): Promise<DeliveryResult> {
    const sid = attempt.providerMessageId || attempt.externalId;
    if (!sid) {
      return deliveryPending(`Attempt ${attempt.id} has no Twilio message SID`);
    }
    if (this.config.sandbox) {
      return confirmAccepted(attempt);
    }

    const externalId = attempt.externalId || sid;

    if (!this.twilioClient) {
      return deliveryFailure(DeliveryStatus.PROVIDER_ERROR, 'Twilio client not configured');
    }

    try {
      const message = await this.twilioClient.messages(sid).fetch();

      if (message.errorCode !== null) {
        return deliveryFailure(DeliveryStatus.FAILED, `Twilio error: ${message.errorMessage}`, {
          externalId,
          providerMessageId: message.sid,
          responseCode: String(message.errorCode),
          responseMessage: message.errorMessage,
        });
      }

      if (message.status === 'delivered') {
        return deliverySuccess(externalId, message.sid, { costCents: this.toCents(message.price) });
      }

      if (message.status === 'failed' || message.status === 'undelivered') {
        return deliveryFailure(DeliveryStatus.FAILED, `Twilio status ${message.status}`, {
          externalId,
          providerMessageId: message.sid,
        });
      }

      return deliveryAccepted(externalId, message.sid, { responseMessage: message.status });
    } catch (error) {
      return this.failureFromError(error);
    }
  }

  private failureFromError(error: unknown): DeliveryResult {
    const code = errorProperty(error, 'code');
    const httpStatus = errorProperty(error, 'status');

    let status = DeliveryStatus.FAILED;
    if (typeof code === 'number' && INVALID_NUMBER_CODES.has(code)) {
      status = DeliveryStatus.INVALID_RECIPIENT;
    } else if (typeof httpStatus === 'number') {
      status = statusFromHttpCode(httpStatus);
    }

    return deliveryFailure(status, `Failed to send SMS: ${errorMessage(error)}`, {
      responseCode: code !== undefined ? String(code) : undefined,
    });
  }

  private truncate(body: string): string {
    const maxLength = this.config.maxLength || 160;
    if (body.length <= maxLength) {
      return body;
    }
    return body.substring(0, maxLength - 3) + '...';
  }

  private toCents(price: string | null): number | undefined {
    if (price === null) {
      return undefined;
    }
    const amount = Math.abs(parseFloat(price));
    return Number.isNaN(amount) ? undefined : Math.round(amount * 100);
  }
}
