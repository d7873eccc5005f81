import { DeliveryProvider, Notification } from '../../types/notification';

/**
 * Ordered set of delivery providers. Selection is a linear scan: the first
 * provider whose `canHandle` accepts the notification wins, so registration
 * order expresses preference.
 */
export class ProviderRegistry {
  private providers: DeliveryProvider[] = [];

  constructor(providers: DeliveryProvider[] = []) {
    providers.forEach((provider) => this.register(provider));
  }

  register(provider: DeliveryProvider): this {
    if (this.findByName(provider.getProviderName())) {
      throw new Error(`Provider already registered: ${provider.getProviderName()}`);
    }
    this.providers.push(provider);
    return this;
  }

  select(notification: Notification): DeliveryProvider | undefined {
    return this.providers.find((provider) => provider.canHandle(notification));
  }

  findByName(name: string): DeliveryProvider | undefined {
    return this.providers.find((provider) => provider.getProviderName() === name);
  }
}
