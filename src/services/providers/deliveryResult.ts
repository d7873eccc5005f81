import { DeliveryAttempt, DeliveryStatus, DeliveryResult } from '../../types/notification';

/** Provider confirmed the message reached the recipient. */
export function deliverySuccess(
  externalId: string,
  providerMessageId: string = externalId,
  extra: Partial<DeliveryResult> = {}
): DeliveryResult {
  return {
    success: true,
    status: DeliveryStatus.SUCCESS,
    externalId,
    providerMessageId,
    deliveredAt: new Date(),
    ...extra,
  };
}

/** Provider accepted the message; final state arrives asynchronously. */
export function deliveryAccepted(
  externalId: string,
  providerMessageId: string = externalId,
  extra: Partial<DeliveryResult> = {}
): DeliveryResult {
  return {
    success: true,
    status: DeliveryStatus.IN_PROGRESS,
    externalId,
    providerMessageId,
    ...extra,
  };
}

export function deliveryFailure(
  status: DeliveryStatus,
  errorMessage: string,
  extra: Partial<DeliveryResult> = {}
): DeliveryResult {
  return {
    success: false,
    status,
    errorMessage,
    ...extra,
  };
}

/** No answer yet; the caller keeps waiting. */
export function deliveryPending(reason: string): DeliveryResult {
  return {
    success: false,
    status: DeliveryStatus.PENDING,
    errorMessage: reason,
  };
}

/**
 * Status check for providers without a receipt endpoint: an attempt the
 * provider accepted counts as delivered once it is past the staleness
 * threshold. Attempts with no provider id were never accepted.
 */
export function confirmAccepted(attempt: DeliveryAttempt): DeliveryResult {
  if (!attempt.externalId) {
    return deliveryPending(`Attempt ${attempt.id} has no provider message id`);
  }
  return deliverySuccess(attempt.externalId, attempt.providerMessageId || attempt.externalId);
}

export function statusFromHttpCode(code: number): DeliveryStatus {
  if (code === 408) return DeliveryStatus.TIMEOUT;
  if (code === 429) return DeliveryStatus.RATE_LIMITED;
  if (code === 404 || code === 410) return DeliveryStatus.INVALID_RECIPIENT;
  if (code >= 500) return DeliveryStatus.PROVIDER_ERROR;
  if (code >= 400) return DeliveryStatus.REJECTED;
  return DeliveryStatus.FAILED;
}

/** Reads a numeric or string `code`/`status` off an unknown error object. */
export function errorProperty(error: unknown, name: string): string | number | undefined {
  if (typeof error !== 'object' || error === null || !(name in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, name);
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}
