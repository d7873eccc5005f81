import { Notification, NotificationStatus, TimeRange } from '../types/notification';

export type NotificationPatch = Partial<Omit<Notification, 'id' | 'version' | 'createdAt'>>;

export interface NotificationRepository {
  findById(id: string): Promise<Notification | null>;
  save(notification: Notification): Promise<Notification>;
  /** PENDING or QUEUED, and either unscheduled or scheduled at or before `now`. */
  findReadyForDelivery(now: Date, limit?: number): Promise<Notification[]>;
  /** RETRY with `nextRetryAt` at or before `now`. */
  findReadyForRetry(now: Date, limit?: number): Promise<Notification[]>;
  /** SENT before `sentBefore` and still waiting for the provider's confirmation. */
  findAwaitingConfirmation(sentBefore: Date, limit?: number): Promise<Notification[]>;
  /**
   * Compare-and-set: applies `patch` only if the stored status is one of
   * `from` and, when given, the stored version equals `expectedVersion`.
   * Bumps the version on success and returns the updated record, or null
   * when another writer got there first.
   */
  claim(
    id: string,
    from: readonly NotificationStatus[],
    patch: NotificationPatch,
    expectedVersion?: number
  ): Promise<Notification | null>;
  countByStatus(range: TimeRange): Promise<Partial<Record<NotificationStatus, number>>>;
  findCreatedBetween(range: TimeRange): Promise<Notification[]>;
}

function inRange(date: Date, range: TimeRange): boolean {
  return date.getTime() >= range.start.getTime() && date.getTime() <= range.end.getTime();
}

export class InMemoryNotificationRepository implements NotificationRepository {
  private records = new Map<string, Notification>();

  async findById(id: string): Promise<Notification | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async save(notification: Notification): Promise<Notification> {
    this.records.set(notification.id, structuredClone(notification));
    return structuredClone(notification);
  }

  async findReadyForDelivery(now: Date, limit = 100): Promise<Notification[]> {
    return this.select(
      (n) =>
        (n.status === NotificationStatus.PENDING || n.status === NotificationStatus.QUEUED) &&
        (!n.scheduledAt || n.scheduledAt.getTime() <= now.getTime()),
      limit
    );
  }

  async findReadyForRetry(now: Date, limit = 100): Promise<Notification[]> {
    return this.select(
      (n) =>
        n.status === NotificationStatus.RETRY &&
        !!n.nextRetryAt &&
        n.nextRetryAt.getTime() <= now.getTime(),
      limit
    );
  }

  async findAwaitingConfirmation(sentBefore: Date, limit = 100): Promise<Notification[]> {
    return this.select(
      (n) => n.status === NotificationStatus.SENT && !!n.sentAt && n.sentAt.getTime() < sentBefore.getTime(),
      limit
    );
  }

  async claim(
    id: string,
    from: readonly NotificationStatus[],
    patch: NotificationPatch,
    expectedVersion?: number
  ): Promise<Notification | null> {
    const current = this.records.get(id);
    if (!current || !from.includes(current.status)) {
      return null;
    }
    if (expectedVersion !== undefined && current.version !== expectedVersion) {
      return null;
    }

    const updated: Notification = {
      ...current,
      ...patch,
      version: current.version + 1,
      updatedAt: patch.updatedAt || new Date(),
    };
    this.records.set(id, updated);
    return structuredClone(updated);
  }

  async countByStatus(range: TimeRange): Promise<Partial<Record<NotificationStatus, number>>> {
    const counts: Partial<Record<NotificationStatus, number>> = {};
    for (const record of this.records.values()) {
      if (inRange(record.createdAt, range)) {
        counts[record.status] = (counts[record.status] || 0) + 1;
      }
    }
    return counts;
  }

  async findCreatedBetween(range: TimeRange): Promise<Notification[]> {
    return this.select((n) => inRange(n.createdAt, range));
  }

  private select(predicate: (notification: Notification) => boolean, limit?: number): Notification[] {
    const matches = [...this.records.values()]
      .filter(predicate)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    return (limit === undefined ? matches : matches.slice(0, limit)).map((n) => structuredClone(n));
  }
}
