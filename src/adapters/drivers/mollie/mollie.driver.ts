import { Logger } from '@nestjs/common';
import {
  ChargeError,
  ChargeRequest,
  ChargeResponse,
  DriverContext,
  JsonObject,
  PaymentDriver,
  ProviderConfig,
  VerificationError,
  VerificationResponse,
  WebhookHeaders,
  WebhookPayload,
  errorMessage,
  formatMajorAmount,
  isJsonObject,
} from '../../../core';
import {
  DriverToolkit,
  HttpError,
  headerValue,
  hmacHex,
  parseJsonObject,
  readNumber,
  readObject,
  readString,
  safeEqual,
} from '../shared';

export const MOLLIE_SIGNATURE_HEADER = 'x-mollie-signature';
export const MOLLIE_PING_EVENT = 'hook.ping';

/**
 * Mollie driver
 *
 * Amounts travel as decimal strings. Verification is by Mollie payment id.
 * With a webhookSecret configured, webhooks must carry an HMAC-SHA256 hex
 * signature; without one, only the payment id in the body is trusted and the
 * payment itself is fetched from the API before anything is applied.
 *
 * Settings: apiKey (required), webhookSecret
 */
export class MollieDriver implements PaymentDriver {
  private readonly logger = new Logger(MollieDriver.name);
  private readonly toolkit: DriverToolkit;

  constructor(
    readonly name: string,
    config: ProviderConfig,
    context: DriverContext,
  ) {
    const apiKey = typeof config.apiKey === 'string' ? config.apiKey : '';
    this.toolkit = new DriverToolkit(name, config, context, {
      defaultBaseUrl: 'https://api.mollie.com',
      defaultCurrencies: ['EUR', 'USD', 'GBP', 'CHF', 'SEK', 'NOK', 'DKK', 'PLN'],
      defaultHeaders: { Authorization: `Bearer ${apiKey}` },
      requiredSettings: ['apiKey'],
    });
  }

  async charge(request: ChargeRequest): Promise<ChargeResponse> {
    const reference = request.reference ?? this.toolkit.generateReference('MOLLIE');
    const methods = this.toolkit.mapChannels(request);

    try {
      const { data } = await this.toolkit.http.post('/v2/payments', {
        headers: this.toolkit.idempotencyHeaders(request),
        json: {
          amount: { currency: request.currency, value: formatMajorAmount(request.amount, request.currency) },
          description: request.description ?? 'Payment',
          redirectUrl: this.toolkit.appendQueryParam(
            this.toolkit.callbackUrl(request),
            'reference',
            reference,
          ),
          metadata: { ...request.metadata, reference },
          ...(methods ? { method: methods } : {}),
        },
      });

      const paymentId = readString(data, 'id');
      const checkoutUrl = readString(data, '_links.checkout.href');
      if (!paymentId || !checkoutUrl) {
        throw new ChargeError('No checkout URL returned by Mollie', this.name);
      }

      this.logger.log(`Charge initialized: ${reference} (payment ${paymentId})`);

      return new ChargeResponse({
        reference,
        authorizationUrl: checkoutUrl,
        accessCode: paymentId,
        status: readString(data, 'status') ?? 'open',
        metadata: { ...request.metadata, mollie_id: paymentId, reference },
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof ChargeError) {
        throw error;
      }
      this.logger.error(`Charge failed: ${errorMessage(error)}`);
      throw new ChargeError(`Mollie charge failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async verify(paymentId: string): Promise<VerificationResponse> {
    try {
      const { data } = await this.toolkit.http.get(`/v2/payments/${encodeURIComponent(paymentId)}`);
      return new VerificationResponse({
        reference: readString(data, 'metadata.reference') ?? paymentId,
        status: this.toolkit.normalizeStatus(readString(data, 'status') ?? 'unknown'),
        amount: readNumber(data, 'amount.value') ?? 0,
        currency: readString(data, 'amount.currency') ?? '',
        paidAt: readString(data, 'paidAt'),
        channel: readString(data, 'method'),
        cardType: readString(data, 'details.cardLabel'),
        bank: readString(data, 'details.consumerName'),
        customer: {
          email: readString(data, 'billingAddress.email'),
          name: readString(data, 'billingAddress.givenName'),
        },
        metadata: readObject(data, 'metadata'),
        provider: this.name,
      });
    } catch (error) {
      this.logger.error(`Verification failed for ${paymentId}: ${errorMessage(error)}`);
      throw new VerificationError(`Mollie verification failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async validateWebhook(headers: WebhookHeaders, rawBody: Buffer): Promise<boolean> {
    const payload = parseJsonObject(rawBody);
    const secret = this.toolkit.optionalSetting('webhookSecret');

    if (payload && !this.isActionableWebhook(payload)) {
      this.logger.log('hook.ping test event received');
      return secret ? this.hasValidSignature(headers, rawBody, secret) : true;
    }

    const authentic = secret
      ? this.hasValidSignature(headers, rawBody, secret)
      : (await this.fetchWebhookPayment(payload)) !== null;
    if (!authentic) {
      return false;
    }

    return this.toolkit.passesReplayGuard(payload && readString(payload, 'createdAt'));
  }

  async healthCheck(): Promise<boolean> {
    return this.toolkit.isReachable(() => this.toolkit.http.get('/v2/methods'));
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

  isActionableWebhook(payload: WebhookPayload): boolean {
    return readString(payload, 'type') !== MOLLIE_PING_EVENT;
  }

  /**
   * Unsigned deliveries are replaced by the payment as the API reports it
   */
  async resolveWebhookPayload(payload: WebhookPayload): Promise<WebhookPayload> {
    if (this.toolkit.optionalSetting('webhookSecret')) {
      return payload;
    }

    const payment = await this.fetchWebhookPayment(payload);
    if (!payment) {
      throw new VerificationError('Webhook payment could not be fetched from Mollie', this.name);
    }
    return payment;
  }

  extractWebhookReference(payload: WebhookPayload): string | null {
    return readString(payload, 'metadata.reference', 'id');
  }

  extractWebhookStatus(payload: WebhookPayload): string {
    return readString(payload, 'status') ?? 'unknown';
  }

  extractWebhookChannel(payload: WebhookPayload): string | null {
    return readString(payload, 'method');
  }

  resolveVerificationId(reference: string, providerId: string | null): string {
    return providerId ?? reference;
  }

  private hasValidSignature(headers: WebhookHeaders, rawBody: Buffer, secret: string): boolean {
    const signature = headerValue(headers, MOLLIE_SIGNATURE_HEADER);
    if (!signature) {
      this.logger.warn('Webhook signature missing');
      return false;
    }

    if (!safeEqual(signature.toLowerCase(), hmacHex('sha256', secret, rawBody))) {
      this.logger.warn('Webhook signature mismatch');
      return false;
    }
    return true;
  }

  /**
   * The payment a delivery names, or null when the API does not know it
   */
  private async fetchWebhookPayment(payload: JsonObject | null): Promise<JsonObject | null> {
    const paymentId = payload && readString(payload, 'id');
    if (!paymentId) {
      this.logger.warn('Webhook names no payment id');
      return null;
    }

    try {
      const { data } = await this.toolkit.http.get(`/v2/payments/${encodeURIComponent(paymentId)}`);
      return isJsonObject(data) && readString(data, 'id') === paymentId ? data : null;
    } catch (error) {
      const status = error instanceof HttpError ? error.status : 'n/a';
      this.logger.warn(`Webhook payment lookup failed (${status}): ${errorMessage(error)}`);
      return null;
    }
  }
}
