import { DeliveryStatus, NotificationStatus } from '../types/notification';
import { InvalidTransitionError } from '../utils/errors';

const TRANSITIONS: Record<NotificationStatus, NotificationStatus[]> = {
  [NotificationStatus.DRAFT]: [NotificationStatus.PENDING, NotificationStatus.FAILED],
  // Pre-attempt rejections (no provider, rate limits, cancellation, expiry) fail straight from the waiting states.
  [NotificationStatus.PENDING]: [NotificationStatus.QUEUED, NotificationStatus.PROCESSING, NotificationStatus.FAILED],
  [NotificationStatus.QUEUED]: [NotificationStatus.PROCESSING, NotificationStatus.FAILED],
  [NotificationStatus.PROCESSING]: [
    NotificationStatus.SENT,
    NotificationStatus.DELIVERED,
    NotificationStatus.RETRY,
    NotificationStatus.FAILED,
  ],
  [NotificationStatus.RETRY]: [NotificationStatus.PROCESSING, NotificationStatus.FAILED],
  // A provider can still report a bounce after accepting the message.
  [NotificationStatus.SENT]: [NotificationStatus.DELIVERED, NotificationStatus.FAILED],
  [NotificationStatus.DELIVERED]: [NotificationStatus.READ],
  [NotificationStatus.READ]: [],
  [NotificationStatus.FAILED]: [],
};

/** Statuses from which the orchestrator may start a delivery attempt. */
export const DELIVERABLE_STATUSES: readonly NotificationStatus[] = [
  NotificationStatus.PENDING,
  NotificationStatus.QUEUED,
  NotificationStatus.RETRY,
];

export function canTransition(from: NotificationStatus, to: NotificationStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: NotificationStatus, to: NotificationStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function isDeliverable(status: NotificationStatus): boolean {
  return DELIVERABLE_STATUSES.includes(status);
}

interface DeliveryStatusPolicy {
  isSuccess: boolean;
  isFailure: boolean;
  retryable: boolean;
  baseDelaySeconds: number;
}

const DELIVERY_STATUS_POLICY: Record<DeliveryStatus, DeliveryStatusPolicy> = {
  [DeliveryStatus.PENDING]: { isSuccess: false, isFailure: false, retryable: false, baseDelaySeconds: 0 },
  [DeliveryStatus.IN_PROGRESS]: { isSuccess: false, isFailure: false, retryable: false, baseDelaySeconds: 0 },
  [DeliveryStatus.SUCCESS]: { isSuccess: true, isFailure: false, retryable: false, baseDelaySeconds: 0 },
  [DeliveryStatus.FAILED]: { isSuccess: false, isFailure: true, retryable: true, baseDelaySeconds: 60 },
  [DeliveryStatus.TIMEOUT]: { isSuccess: false, isFailure: true, retryable: true, baseDelaySeconds: 120 },
  [DeliveryStatus.RATE_LIMITED]: { isSuccess: false, isFailure: true, retryable: true, baseDelaySeconds: 180 },
  [DeliveryStatus.PROVIDER_ERROR]: { isSuccess: false, isFailure: true, retryable: true, baseDelaySeconds: 240 },
  [DeliveryStatus.BOUNCED]: { isSuccess: false, isFailure: true, retryable: false, baseDelaySeconds: 0 },
  [DeliveryStatus.REJECTED]: { isSuccess: false, isFailure: true, retryable: false, baseDelaySeconds: 0 },
  [DeliveryStatus.INVALID_RECIPIENT]: { isSuccess: false, isFailure: true, retryable: false, baseDelaySeconds: 0 },
  [DeliveryStatus.CANCELLED]: { isSuccess: false, isFailure: true, retryable: false, baseDelaySeconds: 0 },
  [DeliveryStatus.EXPIRED]: { isSuccess: false, isFailure: true, retryable: false, baseDelaySeconds: 0 },
};

export function deliveryStatusPolicy(status: DeliveryStatus): DeliveryStatusPolicy {
  return DELIVERY_STATUS_POLICY[status];
}

export interface BackoffOptions {
  capMs: number;
}

/**
 * Delay before the next attempt: min(base(status) * 2^retryCount, cap).
 * `retryCount` is the count before this failure is recorded. Returns null
 * for statuses that must not be retried.
 */
export function computeRetryDelayMs(
  status: DeliveryStatus,
  retryCount: number,
  options: BackoffOptions
): number | null {
  const policy = DELIVERY_STATUS_POLICY[status];
  if (!policy.isFailure || !policy.retryable) {
    return null;
  }

  const delay = policy.baseDelaySeconds * 1000 * Math.pow(2, Math.max(0, retryCount));
  return Math.min(delay, options.capMs);
}
