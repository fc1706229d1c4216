import { Logger } from '@nestjs/common';
import {
  ChargeError,
  ChargeRequest,
  ChargeResponse,
  DriverContext,
  PaymentDriver,
  ProviderConfig,
  VerificationError,
  VerificationResponse,
  WebhookHeaders,
  WebhookPayload,
  errorMessage,
  isJsonObject,
} from '../../../core';
import {
  DriverToolkit,
  headerValue,
  hmacHex,
  parseJsonObject,
  readNumber,
  readPath,
  readString,
  safeEqual,
} from '../shared';

export const NOWPAYMENTS_SIGNATURE_HEADER = 'x-nowpayments-sig';

/**
 * Copy of a decoded JSON value with every object's keys in sorted order
 */
export function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (isJsonObject(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeysDeep(value[key])]),
    );
  }
  return value;
}

/**
 * NOWPayments driver (crypto invoices)
 *
 * Charges create a hosted invoice priced in the request currency, amounts in
 * major units. Verification looks the payment up by provider id.
 *
 * IPN deliveries are signed with HMAC-SHA512 hex under the IPN secret, sent
 * in `x-nowpayments-sig`. NOWPayments signs the key-sorted JSON of the body;
 * the raw body is accepted as well.
 *
 * Settings: apiKey (required), ipnSecret, ipnCallbackUrl, callbackUrl
 */
export class NowPaymentsDriver implements PaymentDriver {
  private readonly logger = new Logger(NowPaymentsDriver.name);
  private readonly toolkit: DriverToolkit;

  constructor(
    readonly name: string,
    config: ProviderConfig,
    context: DriverContext,
  ) {
    const apiKey = typeof config.apiKey === 'string' ? config.apiKey : '';
    this.toolkit = new DriverToolkit(name, config, context, {
      defaultBaseUrl: 'https://api.nowpayments.io',
      defaultCurrencies: ['USD', 'EUR', 'GBP', 'NGN'],
      defaultHeaders: { 'x-api-key': apiKey },
      requiredSettings: ['apiKey'],
    });
  }

  async charge(request: ChargeRequest): Promise<ChargeResponse> {
    const reference = request.reference ?? this.toolkit.generateReference('NOWPAYMENTS');
    const returnUrl = this.toolkit.appendQueryParam(this.toolkit.callbackUrl(request), 'reference', reference);
    const ipnCallbackUrl = this.toolkit.optionalSetting('ipnCallbackUrl');

    try {
      const { data } = await this.toolkit.http.post('/v1/invoice', {
        headers: this.toolkit.idempotencyHeaders(request),
        json: {
          price_amount: request.amount,
          price_currency: request.currency.toLowerCase(),
          order_id: reference,
          order_description: request.description ?? 'Payment',
          customer_email: request.email,
          ...(ipnCallbackUrl ? { ipn_callback_url: ipnCallbackUrl } : {}),
          ...(returnUrl ? { success_url: returnUrl, cancel_url: returnUrl } : {}),
        },
      });

      const invoiceId = readString(data, 'id');
      const invoiceUrl = readString(data, 'invoice_url');
      if (!invoiceId || !invoiceUrl) {
        throw new ChargeError(
          readString(data, 'message') ?? 'No invoice URL returned by NOWPayments',
          this.name,
        );
      }

      this.logger.log(`Charge initialized: ${reference} (invoice ${invoiceId})`);

      return new ChargeResponse({
        reference,
        authorizationUrl: invoiceUrl,
        accessCode: invoiceId,
        status: 'pending',
        metadata: { ...request.metadata, invoice_id: invoiceId, payment_status: 'waiting' },
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof ChargeError) {
        throw error;
      }
      this.logger.error(`Charge failed: ${errorMessage(error)}`);
      throw new ChargeError(`NOWPayments charge failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async verify(paymentId: string): Promise<VerificationResponse> {
    try {
      const { data } = await this.toolkit.http.get(`/v1/payment/${encodeURIComponent(paymentId)}`);

      const confirmedId = readString(data, 'payment_id');
      if (!confirmedId) {
        throw new VerificationError(
          readString(data, 'message') ?? 'Failed to verify NOWPayments payment',
          this.name,
        );
      }

      const updatedAt = readPath(data, 'updated_at');
      const paidAt =
        typeof updatedAt === 'string' || typeof updatedAt === 'number' ? new Date(updatedAt) : null;

      return new VerificationResponse({
        reference: readString(data, 'order_id') ?? paymentId,
        status: this.toolkit.normalizeStatus(readString(data, 'payment_status') ?? 'unknown'),
        amount: readNumber(data, 'price_amount') ?? 0,
        currency: (readString(data, 'price_currency') ?? 'USD').toUpperCase(),
        paidAt: paidAt && !Number.isNaN(paidAt.getTime()) ? paidAt.toISOString() : null,
        channel: readString(data, 'pay_currency'),
        metadata: {
          payment_id: confirmedId,
          pay_currency: readString(data, 'pay_currency'),
          pay_amount: readNumber(data, 'pay_amount'),
          actually_paid: readNumber(data, 'actually_paid', 'amount_received'),
          outcome_amount: readNumber(data, 'outcome_amount'),
          outcome_currency: readString(data, 'outcome_currency'),
          pay_address: readString(data, 'pay_address'),
          network: readString(data, 'network'),
        },
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof VerificationError) {
        throw error;
      }
      this.logger.error(`Verification failed for ${paymentId}: ${errorMessage(error)}`);
      throw new VerificationError(`NOWPayments verification failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async validateWebhook(headers: WebhookHeaders, rawBody: Buffer): Promise<boolean> {
    const signature = headerValue(headers, NOWPAYMENTS_SIGNATURE_HEADER);
    if (!signature) {
      this.logger.warn('Webhook signature missing');
      return false;
    }

    const secret = this.toolkit.optionalSetting('ipnSecret');
    if (!secret) {
      this.logger.warn('IPN secret not configured; webhook rejected');
      return false;
    }

    const payload = parseJsonObject(rawBody);
    const candidates = [hmacHex('sha512', secret, rawBody)];
    if (payload) {
      candidates.push(hmacHex('sha512', secret, JSON.stringify(sortKeysDeep(payload))));
    }

    if (!candidates.some((expected) => safeEqual(signature.toLowerCase(), expected))) {
      this.logger.warn('Webhook signature mismatch');
      return false;
    }

    return this.toolkit.passesReplayGuard(payload && readPath(payload, 'updated_at'));
  }

  async healthCheck(): Promise<boolean> {
    return this.toolkit.isReachable(() => this.toolkit.http.get('/v1/status'));
  }

  async getCachedHealthCheck(): Promise<boolean> {
    return this.toolkit.cachedHealthCheck(() => this.healthCheck());
  }

  getSupportedCurrencies(): string[] {
    return this.toolkit.getSupportedCurrencies();
  }

  isCurrencySupported(currency: string): boolean {
    return this.toolkit.isCurrencySupported(currency);
  }

  extractWebhookReference(payload: WebhookPayload): string | null {
    return readString(payload, 'order_id', 'payment_id');
  }

  extractWebhookStatus(payload: WebhookPayload): string {
    return readString(payload, 'payment_status') ?? 'unknown';
  }

  extractWebhookChannel(payload: WebhookPayload): string | null {
    return readString(payload, 'pay_currency');
  }

  resolveVerificationId(reference: string, providerId: string | null): string {
    return providerId ?? reference;
  }
}
