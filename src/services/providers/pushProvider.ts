import * as admin from 'firebase-admin';
import { randomUUID } from 'crypto';
import {
  DeliveryAttempt,
  DeliveryProvider,
  DeliveryResult,
  DeliveryStatus,
  Notification,
  NotificationChannel,
  NotificationPriority,
} from '../../types/notification';
import { errorMessage } from '../../utils/errors';
import { logger, maskAddress } from '../../utils/logger';
import { confirmAccepted, deliveryFailure, deliverySuccess, errorProperty } from './deliveryResult';

export interface PushProviderConfig {
  firebase?: {
    projectId: string;
    privateKey: string;
    clientEmail: string;
  };
  defaultSound?: string;
  sandbox?: boolean;
}

export type PushSender = (message: admin.messaging.Message) => Promise<string>;

const FCM_STATUS: Record<string, DeliveryStatus> = {
  'messaging/registration-token-not-registered': DeliveryStatus.INVALID_RECIPIENT,
  'messaging/invalid-registration-token': DeliveryStatus.INVALID_RECIPIENT,
  'messaging/invalid-recipient': DeliveryStatus.INVALID_RECIPIENT,
  'messaging/invalid-argument': DeliveryStatus.REJECTED,
  'messaging/message-rate-exceeded': DeliveryStatus.RATE_LIMITED,
  'messaging/device-message-rate-exceeded': DeliveryStatus.RATE_LIMITED,
  'messaging/server-unavailable': DeliveryStatus.PROVIDER_ERROR,
  'messaging/internal-error': DeliveryStatus.PROVIDER_ERROR,
  'messaging/unavailable': DeliveryStatus.PROVIDER_ERROR,
};

export class PushProvider implements DeliveryProvider {
  private config: PushProviderConfig;
  private send?: PushSender;
  private logger = logger.child({ provider: 'push' });

  constructor(config: PushProviderConfig, sender?: PushSender) {
    this.config = config;

    if (sender) {
      this.send = sender;
    } else if (config.firebase && !config.sandbox) {
      const app = admin.initializeApp(
        {
          credential: admin.credential.cert({
            projectId: config.firebase.projectId,
            privateKey: config.firebase.privateKey,
            clientEmail: config.firebase.clientEmail,
          }),
        },
        `push-${config.firebase.projectId}`
      );
      const messaging = admin.messaging(app);
      this.send = (message) => messaging.send(message);
    }
  }

  getProviderName(): string {
    return 'FCM';
  }

  getSupportedChannels(): NotificationChannel[] {
    return [NotificationChannel.PUSH];
  }

  canHandle(notification: Notification): boolean {
    return (
      notification.channel === NotificationChannel.PUSH &&
      !!notification.recipientAddress &&
      notification.recipientAddress.trim().length > 0
    );
  }

  isAvailable(): boolean {
    return !!this.config.sandbox || !!this.send;
  }

  async deliver(notification: Notification): Promise<DeliveryResult> {
    const token = notification.recipientAddress;
    if (!token) {
      return deliveryFailure(DeliveryStatus.INVALID_RECIPIENT, 'Device token not specified');
    }

    if (this.config.sandbox) {
      const messageId = `sandbox-push-${randomUUID()}`;
      this.logger.info('Push notification sent (sandbox mode)', {
        notificationId: notification.id,
        token: maskAddress(token),
        title: notification.subject,
      });
      return deliverySuccess(messageId, messageId, { providerResponse: { sandbox: true } });
    }

    if (!this.send) {
      return deliveryFailure(DeliveryStatus.PROVIDER_ERROR, 'Firebase not configured');
    }

    const urgent =
      notification.priority === NotificationPriority.CRITICAL ||
      notification.priority === NotificationPriority.URGENT ||
      notification.priority === NotificationPriority.HIGH;

    try {
      const messageId = await this.send({
        token,
        notification: {
          title: notification.subject || 'Notification',
          body: notification.content || '',
        },
        data: {
          notificationId: notification.id,
          type: notification.type,
          correlationId: notification.correlationId || '',
        },
        android: {
          priority: urgent ? 'high' : 'normal',
          notification: { sound: this.config.defaultSound || 'default' },
        },
        apns: {
          payload: { aps: { sound: this.config.defaultSound || 'default' } },
        },
      });

      // FCM hands the message to the device transport synchronously; there is no later receipt.
      return deliverySuccess(messageId, messageId, { responseCode: '200' });
    } catch (error) {
      const code = errorProperty(error, 'code');
      const status = typeof code === 'string' && FCM_STATUS[code] ? FCM_STATUS[code] : DeliveryStatus.FAILED;

      this.logger.error('Failed to send push notification', {
        notificationId: notification.id,
        token: maskAddress(token),
        error: errorMessage(error),
        code,
      });

      return deliveryFailure(status, `Failed to send push notification: ${errorMessage(error)}`, {
        responseCode: code !== undefined ? String(code) : undefined,
      });
    }
  }

  async checkStatus(attempt: DeliveryAttempt): Promise<DeliveryResult> {
    return confirmAccepted(attempt);
  }
}
