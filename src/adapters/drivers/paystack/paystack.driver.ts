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
} from '../../../core';
import {
  DriverToolkit,
  hmacHex,
  headerValue,
  parseJsonObject,
  readNumber,
  readObject,
  readPath,
  readString,
  safeEqual,
} from '../shared';

export const PAYSTACK_SIGNATURE_HEADER = 'x-paystack-signature';

/**
 * Paystack driver
 *
 * Webhooks are signed with HMAC-SHA512 over the raw body, hex encoded,
 * keyed with the secret key. Verification is by merchant reference.
 *
 * Settings: secretKey (required), webhookSecret, previousWebhookSecrets
 */
export class PaystackDriver implements PaymentDriver {
  private readonly logger = new Logger(PaystackDriver.name);
  private readonly toolkit: DriverToolkit;
  private readonly secretKey: string;

  constructor(
    readonly name: string,
    config: ProviderConfig,
    context: DriverContext,
  ) {
    this.toolkit = new DriverToolkit(name, config, context, {
      defaultBaseUrl: 'https://api.paystack.co',
      defaultCurrencies: ['NGN', 'GHS', 'ZAR', 'USD'],
      requiredSettings: ['secretKey'],
    });
    this.secretKey = this.toolkit.requireSetting('secretKey');
  }

  async charge(request: ChargeRequest): Promise<ChargeResponse> {
    const reference = request.reference ?? this.toolkit.generateReference();
    const channels = this.toolkit.mapChannels(request);

    try {
      const { data } = await this.toolkit.http.post('/transaction/initialize', {
        headers: { ...this.authHeaders(), ...this.toolkit.idempotencyHeaders(request) },
        json: {
          email: request.email,
          amount: request.amountInMinorUnits(),
          currency: request.currency,
          reference,
          callback_url: this.toolkit.callbackUrl(request),
          metadata: request.metadata,
          ...(channels ? { channels } : {}),
        },
      });

      if (readPath(data, 'status') !== true) {
        throw new ChargeError(
          readString(data, 'message') ?? 'Failed to initialize Paystack transaction',
          this.name,
        );
      }

      const confirmedReference = readString(data, 'data.reference') ?? reference;
      this.logger.log(`Charge initialized: ${confirmedReference}`);

      return new ChargeResponse({
        reference: confirmedReference,
        authorizationUrl: readString(data, 'data.authorization_url') ?? '',
        accessCode: readString(data, 'data.access_code') ?? '',
        status: 'pending',
        metadata: request.metadata,
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof ChargeError) {
        throw error;
      }
      this.logger.error(`Charge failed: ${errorMessage(error)}`);
      throw new ChargeError(`Paystack charge failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async verify(reference: string): Promise<VerificationResponse> {
    try {
      const { data } = await this.toolkit.http.get(
        `/transaction/verify/${encodeURIComponent(reference)}`,
        { headers: this.authHeaders() },
      );

      if (readPath(data, 'status') !== true) {
        throw new VerificationError(
          readString(data, 'message') ?? 'Failed to verify Paystack transaction',
          this.name,
        );
      }

      const result = readObject(data, 'data');
      const status = readString(result, 'status') ?? 'unknown';

      return new VerificationResponse({
        reference: readString(result, 'reference') ?? reference,
        status: this.toolkit.normalizeStatus(status),
        amount: (readNumber(result, 'amount') ?? 0) / 100,
        currency: readString(result, 'currency') ?? '',
        paidAt: readString(result, 'paid_at', 'paidAt'),
        channel: readString(result, 'channel'),
        cardType: readString(result, 'authorization.card_type'),
        bank: readString(result, 'authorization.bank'),
        customer: {
          email: readString(result, 'customer.email'),
          code: readString(result, 'customer.customer_code'),
        },
        metadata: readObject(result, 'metadata'),
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof VerificationError) {
        throw error;
      }
      this.logger.error(`Verification failed for ${reference}: ${errorMessage(error)}`);
      throw new VerificationError(
        `Paystack verification failed: ${errorMessage(error)}`,
        this.name,
        error,
      );
    }
  }

  async validateWebhook(headers: WebhookHeaders, rawBody: Buffer): Promise<boolean> {
    const signature = headerValue(headers, PAYSTACK_SIGNATURE_HEADER);
    if (!signature) {
      this.logger.warn('Webhook signature missing');
      return false;
    }

    const secrets = [
      this.toolkit.optionalSetting('webhookSecret') ?? this.secretKey,
      ...this.toolkit.listSetting('previousWebhookSecrets'),
    ];
    const matched = secrets.some((secret) =>
      safeEqual(signature.toLowerCase(), hmacHex('sha512', secret, rawBody)),
    );

    if (!matched) {
      this.logger.warn('Webhook signature mismatch');
      return false;
    }

    const payload = parseJsonObject(rawBody);
    return this.toolkit.passesReplayGuard(
      payload && readString(payload, 'data.paid_at', 'data.paidAt', 'data.created_at', 'data.createdAt'),
    );
  }

  async healthCheck(): Promise<boolean> {
    // an unknown reference answers 4xx, which still proves the API is up
    return this.toolkit.isReachable(() =>
      this.toolkit.http.get('/transaction/verify/invalid_ref_test', {
        headers: this.authHeaders(),
      }),
    );
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
    return readString(payload, 'data.reference');
  }

  extractWebhookStatus(payload: WebhookPayload): string {
    return readString(payload, 'data.status') ?? 'unknown';
  }

  extractWebhookChannel(payload: WebhookPayload): string | null {
    return readString(payload, 'data.channel');
  }

  resolveVerificationId(reference: string): string {
    return reference;
  }

  private authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.secretKey}` };
  }
}
