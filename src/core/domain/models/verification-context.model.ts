/**
 * Where a verification context was resolved from
 */
export type VerificationContextSource = 'explicit' | 'cache' | 'store' | 'heuristic';

/**
 * Provider and provider-side id needed to re-check a reference.
 * Rebuilt on every verify call.
 */
export interface VerificationContext {
  provider: string;
  providerId: string | null;
  source: VerificationContextSource;
}

/**
 * Shape cached per reference after a successful charge
 */
export interface PaymentSession {
  provider: string;
  providerId: string | null;
}
