import { Logger } from '@nestjs/common';
import {
  ChargeError,
  ChargeRequest,
  ChargeResponse,
  ConfigurationError,
  DriverContext,
  PaymentDriver,
  ProviderConfig,
  VerificationError,
  VerificationResponse,
  WebhookHeaders,
  WebhookPayload,
  errorMessage,
  fromMinorUnits,
} from '../../../core';
import {
  DriverToolkit,
  headerValue,
  hmacHex,
  readArray,
  readNumber,
  readObject,
  readString,
  safeEqual,
} from '../shared';

export const STRIPE_SIGNATURE_HEADER = 'stripe-signature';

const SIGNATURE_SCHEME = 'v1';

/**
 * Parsed `Stripe-Signature` header: `t=<unix seconds>,v1=<hex>[,v1=<hex>...]`
 */
export interface StripeSignatureHeader {
  timestamp: string | null;
  signatures: string[];
}

export function parseStripeSignature(header: string): StripeSignatureHeader {
  const parsed: StripeSignatureHeader = { timestamp: null, signatures: [] };

  for (const part of header.split(',')) {
    const separator = part.indexOf('=');
    if (separator < 0) {
      continue;
    }
    const key = part.slice(0, separator).trim();
    const value = part.slice(separator + 1).trim();
    if (key === 't') {
      parsed.timestamp = value;
    } else if (key === SIGNATURE_SCHEME && value.length > 0) {
      parsed.signatures.push(value);
    }
  }

  return parsed;
}

/**
 * Stripe driver
 *
 * Charges open a hosted Checkout Session; the API takes form-encoded bodies
 * and amounts in minor units. Verification accepts a Checkout Session id
 * (cs_), a PaymentIntent id (pi_) or a merchant reference, the latter found
 * through the PaymentIntent search API.
 *
 * Webhooks carry `Stripe-Signature`; each v1 entry is HMAC-SHA256 hex of
 * `{t}.{raw body}` under the endpoint secret, and `t` feeds the replay window.
 *
 * Settings: secretKey (required), webhookSecret, callbackUrl
 */
export class StripeDriver implements PaymentDriver {
  private readonly logger = new Logger(StripeDriver.name);
  private readonly toolkit: DriverToolkit;

  constructor(
    readonly name: string,
    config: ProviderConfig,
    context: DriverContext,
  ) {
    const secretKey = typeof config.secretKey === 'string' ? config.secretKey : '';
    this.toolkit = new DriverToolkit(name, config, context, {
      defaultBaseUrl: 'https://api.stripe.com',
      defaultCurrencies: ['USD', 'EUR', 'GBP', 'CAD', 'AUD'],
      defaultHeaders: { Authorization: `Bearer ${secretKey}` },
      requiredSettings: ['secretKey'],
    });
  }

  async charge(request: ChargeRequest): Promise<ChargeResponse> {
    const reference = request.reference ?? this.toolkit.generateReference('STRIPE');
    const callback = this.toolkit.callbackUrl(request);
    if (!callback) {
      // hosted checkout cannot redirect anywhere without it
      throw ConfigurationError.missingSetting(this.name, 'callbackUrl');
    }

    const successUrl = this.toolkit.appendQueryParam(
      this.toolkit.appendQueryParam(callback, 'status', 'success'),
      'reference',
      reference,
    );
    const cancelUrl = this.toolkit.appendQueryParam(
      this.toolkit.appendQueryParam(callback, 'status', 'cancelled'),
      'reference',
      reference,
    );
    const methods = this.toolkit.mapChannels(request) ?? ['card'];

    const form: Record<string, string> = {
      mode: 'payment',
      client_reference_id: reference,
      customer_email: request.email,
      'line_items[0][quantity]': '1',
      'line_items[0][price_data][currency]': request.currency.toLowerCase(),
      'line_items[0][price_data][unit_amount]': String(request.amountInMinorUnits()),
      'line_items[0][price_data][product_data][name]': request.description ?? 'Payment',
      'payment_intent_data[metadata][reference]': reference,
    };
    if (successUrl && cancelUrl) {
      form.success_url = successUrl;
      form.cancel_url = cancelUrl;
    }
    methods.forEach((method, index) => {
      form[`payment_method_types[${index}]`] = method;
    });
    for (const [key, value] of Object.entries({ ...request.metadata, reference })) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        form[`metadata[${key}]`] = String(value);
      }
    }

    try {
      const { data } = await this.toolkit.http.post('/v1/checkout/sessions', {
        headers: this.toolkit.idempotencyHeaders(request),
        form,
      });

      const sessionId = readString(data, 'id');
      const checkoutUrl = readString(data, 'url');
      if (!sessionId || !checkoutUrl) {
        throw new ChargeError('No checkout URL returned by Stripe', this.name);
      }

      this.logger.log(`Charge initialized: ${reference} (session ${sessionId})`);

      return new ChargeResponse({
        reference,
        authorizationUrl: checkoutUrl,
        accessCode: sessionId,
        status: 'pending',
        metadata: { session_id: sessionId },
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof ChargeError) {
        throw error;
      }
      this.logger.error(`Charge failed: ${errorMessage(error)}`);
      throw new ChargeError(`Stripe charge failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async verify(id: string): Promise<VerificationResponse> {
    try {
      if (id.startsWith('cs_')) {
        const { data } = await this.toolkit.http.get(`/v1/checkout/sessions/${encodeURIComponent(id)}`, {
          query: { 'expand[]': 'payment_intent' },
        });
        return this.fromCheckoutSession(data, id);
      }

      if (id.startsWith('pi_')) {
        const { data } = await this.toolkit.http.get(`/v1/payment_intents/${encodeURIComponent(id)}`);
        return this.fromPaymentIntent(data, id);
      }

      const { data } = await this.toolkit.http.get('/v1/payment_intents/search', {
        query: { query: `metadata['reference']:'${id.replace(/'/g, "\\'")}'`, limit: 1 },
      });
      const [intent] = readArray(data, 'data');
      if (intent === undefined) {
        throw new VerificationError(`Payment not found for reference [${id}]`, this.name);
      }
      return this.fromPaymentIntent(intent, id);
    } catch (error) {
      if (error instanceof VerificationError) {
        throw error;
      }
      this.logger.error(`Verification failed for ${id}: ${errorMessage(error)}`);
      throw new VerificationError(`Stripe verification failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async validateWebhook(headers: WebhookHeaders, rawBody: Buffer): Promise<boolean> {
    const header = headerValue(headers, STRIPE_SIGNATURE_HEADER);
    const secret = this.toolkit.optionalSetting('webhookSecret');
    if (!header || !secret) {
      this.logger.warn('Webhook signature or secret missing');
      return false;
    }

    const { timestamp, signatures } = parseStripeSignature(header);
    if (!timestamp || signatures.length === 0) {
      this.logger.warn('Webhook signature header malformed');
      return false;
    }

    const expected = hmacHex('sha256', secret, `${timestamp}.${rawBody.toString()}`);
    if (!signatures.some((signature) => safeEqual(signature.toLowerCase(), expected))) {
      this.logger.warn('Webhook signature mismatch');
      return false;
    }

    return this.toolkit.passesReplayGuard(timestamp);
  }

  async healthCheck(): Promise<boolean> {
    return this.toolkit.isReachable(() => this.toolkit.http.get('/v1/balance'));
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
    return readString(payload, 'data.object.client_reference_id', 'data.object.metadata.reference');
  }

  /**
   * Checkout sessions report payment_status; an expired session reports only its own status
   */
  extractWebhookStatus(payload: WebhookPayload): string {
    const object = readObject(payload, 'data.object');
    if (readString(object, 'object') === 'checkout.session') {
      return readString(object, 'status') === 'expired'
        ? 'expired'
        : (readString(object, 'payment_status') ?? 'unknown');
    }
    return readString(object, 'status') ?? 'unknown';
  }

  extractWebhookChannel(payload: WebhookPayload): string | null {
    return readString(payload, 'data.object.payment_method_types.0');
  }

  resolveVerificationId(reference: string, providerId: string | null): string {
    return providerId ?? reference;
  }

  private fromCheckoutSession(session: unknown, id: string): VerificationResponse {
    const currency = (readString(session, 'currency') ?? '').toUpperCase();
    const paymentStatus = readString(session, 'payment_status') ?? 'unknown';
    const status = readString(session, 'status') === 'expired' ? 'expired' : paymentStatus;
    const created = readNumber(session, 'created');

    return new VerificationResponse({
      reference: readString(session, 'client_reference_id', 'metadata.reference') ?? id,
      status: this.toolkit.normalizeStatus(status),
      amount: fromMinorUnits(readNumber(session, 'amount_total', 'payment_intent.amount') ?? 0, currency),
      currency,
      paidAt: paymentStatus === 'paid' && created !== null ? new Date(created * 1000).toISOString() : null,
      channel: readString(session, 'payment_intent.payment_method_types.0', 'payment_method_types.0'),
      customer: { email: readString(session, 'customer_details.email', 'customer_email') },
      metadata: readObject(session, 'metadata'),
      provider: this.name,
    });
  }

  private fromPaymentIntent(intent: unknown, id: string): VerificationResponse {
    const currency = (readString(intent, 'currency') ?? '').toUpperCase();
    const status = readString(intent, 'status') ?? 'unknown';
    const created = readNumber(intent, 'created');

    return new VerificationResponse({
      reference: readString(intent, 'metadata.reference') ?? id,
      status: this.toolkit.normalizeStatus(status),
      amount: fromMinorUnits(readNumber(intent, 'amount') ?? 0, currency),
      currency,
      paidAt: status === 'succeeded' && created !== null ? new Date(created * 1000).toISOString() : null,
      channel: readString(intent, 'payment_method_types.0'),
      customer: { email: readString(intent, 'receipt_email') },
      metadata: readObject(intent, 'metadata'),
      provider: this.name,
    });
  }
}
