import {
  ChargeRequest,
  ChargeResponse,
  VerificationResponse,
} from '../domain/models';
import { WebhookHeaders, WebhookPayload } from './common.types';

/**
 * Payment driver contract
 *
 * One implementation per provider. Drivers talk to the provider API,
 * authenticate its webhooks and know where its payloads keep the
 * reference, status and channel.
 */
export interface PaymentDriver {
  /**
   * Provider name this driver was registered under (e.g. 'paystack')
   */
  readonly name: string;

  /**
   * Initialize a charge and return the payer's authorization URL.
   * Throws ChargeError on failure.
   */
  charge(request: ChargeRequest): Promise<ChargeResponse>;

  /**
   * Re-check a payment with the provider. `id` is whatever
   * resolveVerificationId returned for the reference.
   * Throws VerificationError on failure.
   */
  verify(id: string): Promise<VerificationResponse>;

  /**
   * Authenticate an inbound webhook: signature first, then the replay window.
   * Never throws for an invalid delivery; returns false instead.
   */
  validateWebhook(headers: WebhookHeaders, rawBody: Buffer): Promise<boolean>;

  /**
   * Call the provider API. Any response below 500 counts as healthy.
   */
  healthCheck(): Promise<boolean>;

  /**
   * healthCheck memoized for the configured TTL
   */
  getCachedHealthCheck(): Promise<boolean>;

  getSupportedCurrencies(): string[];

  isCurrencySupported(currency: string): boolean;

  /**
   * False for deliveries that only test the endpoint (pings); those are
   * acknowledged but never queued. Treated as true when absent.
   */
  isActionableWebhook?(payload: WebhookPayload): boolean;

  /**
   * Payload the processor extracts fields from. Drivers that cannot
   * authenticate the body itself return the provider's own record instead.
   * The inbound payload is used when absent.
   */
  resolveWebhookPayload?(payload: WebhookPayload): Promise<WebhookPayload>;

  extractWebhookReference(payload: WebhookPayload): string | null;

  extractWebhookStatus(payload: WebhookPayload): string;

  extractWebhookChannel(payload: WebhookPayload): string | null;

  /**
   * Pick the identifier this provider's verify call expects.
   * Some providers verify by merchant reference, others by the
   * session/order/payment id issued at charge time.
   */
  resolveVerificationId(reference: string, providerId: string | null): string;
}
