import { confirmAccepted, deliveryFailure, deliverySuccess } from '../../services/providers/deliveryResult';
import {
  DeliveryAttempt,
  DeliveryProvider,
  DeliveryResult,
  DeliveryStatus,
  Notification,
  NotificationChannel,
} from '../../types/notification';

type Responder = (notification: Notification) => DeliveryResult | Promise<DeliveryResult>;

export interface FakeProviderOptions {
  name?: string;
  channels?: NotificationChannel[];
  available?: boolean;
  respond?: Responder;
  checkStatus?: (attempt: DeliveryAttempt) => DeliveryResult | Promise<DeliveryResult>;
}

/** Scriptable provider that records every call. */
export class FakeProvider implements DeliveryProvider {
  readonly delivered: Notification[] = [];
  readonly checked: DeliveryAttempt[] = [];
  available: boolean;
  private name: string;
  private channels: NotificationChannel[];
  private respond: Responder;
  private statusResponder: (attempt: DeliveryAttempt) => DeliveryResult | Promise<DeliveryResult>;

  constructor(options: FakeProviderOptions = {}) {
    this.name = options.name || 'FAKE';
    this.channels = options.channels || [NotificationChannel.EMAIL];
    this.available = options.available ?? true;
    this.respond = options.respond || ((notification) => deliverySuccess(`ext-${notification.id}`));
    this.statusResponder = options.checkStatus || confirmAccepted;
  }

  getProviderName(): string {
    return this.name;
  }

  getSupportedChannels(): NotificationChannel[] {
    return this.channels;
  }

  canHandle(notification: Notification): boolean {
    return this.channels.includes(notification.channel);
  }

  isAvailable(): boolean {
    return this.available;
  }

  async deliver(notification: Notification): Promise<DeliveryResult> {
    this.delivered.push(notification);
    return this.respond(notification);
  }

  async checkStatus(attempt: DeliveryAttempt): Promise<DeliveryResult> {
    this.checked.push(attempt);
    return this.statusResponder(attempt);
  }

  respondWith(respond: Responder): void {
    this.respond = respond;
  }

  failWith(status: DeliveryStatus, message = `provider returned ${status}`): void {
    this.respond = () => deliveryFailure(status, message);
  }
}
