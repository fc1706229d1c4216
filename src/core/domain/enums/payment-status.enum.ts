/**
 * Canonical payment states
 * The only vocabulary that leaves the status normalizer for a known token
 */
export enum PaymentStatus {
  /**
   * Funds captured by the provider
   */
  SUCCESS = 'success',

  /**
   * Payment rejected, declined or expired
   */
  FAILED = 'failed',

  /**
   * Awaiting payer action or provider settlement
   */
  PENDING = 'pending',

  /**
   * Payment voided or cancelled before capture
   */
  CANCELLED = 'cancelled',
}

const CANONICAL_STATUSES = new Set<string>(Object.values(PaymentStatus));

/**
 * Check whether a value is already one of the canonical states
 */
export function isCanonicalStatus(value: string): value is PaymentStatus {
  return CANONICAL_STATUSES.has(value);
}
