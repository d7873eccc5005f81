import { DeliveryAttempt, DeliveryStatus, TimeRange } from '../types/notification';

export interface DeliveryAttemptRepository {
  save(attempt: DeliveryAttempt): Promise<DeliveryAttempt>;
  findById(id: string): Promise<DeliveryAttempt | null>;
  /** Ordered by attempt number. */
  findByNotificationId(notificationId: string): Promise<DeliveryAttempt[]>;
  /** Attempts in one of `statuses` last touched before `olderThan`. */
  findStale(statuses: readonly DeliveryStatus[], olderThan: Date): Promise<DeliveryAttempt[]>;
  findInRange(range: TimeRange): Promise<DeliveryAttempt[]>;
}

export class InMemoryDeliveryAttemptRepository implements DeliveryAttemptRepository {
  private records = new Map<string, DeliveryAttempt>();

  async save(attempt: DeliveryAttempt): Promise<DeliveryAttempt> {
    this.records.set(attempt.id, structuredClone(attempt));
    return structuredClone(attempt);
  }

  async findById(id: string): Promise<DeliveryAttempt | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async findByNotificationId(notificationId: string): Promise<DeliveryAttempt[]> {
    return this.all()
      .filter((attempt) => attempt.notificationId === notificationId)
      .sort((a, b) => a.attemptNumber - b.attemptNumber);
  }

  async findStale(statuses: readonly DeliveryStatus[], olderThan: Date): Promise<DeliveryAttempt[]> {
    return this.all().filter(
      (attempt) => statuses.includes(attempt.status) && attempt.updatedAt.getTime() < olderThan.getTime()
    );
  }

  async findInRange(range: TimeRange): Promise<DeliveryAttempt[]> {
    return this.all().filter(
      (attempt) =>
        attempt.createdAt.getTime() >= range.start.getTime() && attempt.createdAt.getTime() <= range.end.getTime()
    );
  }

  private all(): DeliveryAttempt[] {
    return [...this.records.values()].map((attempt) => structuredClone(attempt));
  }
}
