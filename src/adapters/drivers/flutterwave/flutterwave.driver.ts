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
  headerValue,
  parseJsonObject,
  readNumber,
  readObject,
  readString,
  safeEqual,
} from '../shared';

export const FLUTTERWAVE_SIGNATURE_HEADER = 'verif-hash';

/**
 * Flutterwave driver
 *
 * Webhooks carry the configured secret hash verbatim in `verif-hash`.
 * Verification is by merchant reference (tx_ref).
 */
export class FlutterwaveDriver implements PaymentDriver {
  private readonly logger = new Logger(FlutterwaveDriver.name);
  private readonly toolkit: DriverToolkit;
  private readonly secretKey: string;

  constructor(
    readonly name: string,
    config: ProviderConfig,
    context: DriverContext,
  ) {
    this.toolkit = new DriverToolkit(name, config, context, {
      defaultBaseUrl: 'https://api.flutterwave.com/v3/',
      defaultCurrencies: ['NGN', 'USD', 'EUR', 'GBP', 'KES', 'UGX', 'TZS'],
      requiredSettings: ['secretKey'],
    });
    this.secretKey = this.toolkit.requireSetting('secretKey');
  }

  async charge(request: ChargeRequest): Promise<ChargeResponse> {
    const reference = request.reference ?? this.toolkit.generateReference('FLW');
    const channels = this.toolkit.mapChannels(request);

    try {
      const { data } = await this.toolkit.http.post('payments', {
        headers: { ...this.authHeaders(), ...this.toolkit.idempotencyHeaders(request) },
        json: {
          tx_ref: reference,
          amount: request.amount,
          currency: request.currency,
          redirect_url: this.toolkit.callbackUrl(request),
          customer: {
            email: request.email,
            name: request.customer?.name,
            phonenumber: request.customer?.phone,
          },
          customizations: {
            title: this.toolkit.optionalSetting('title') ?? 'Payment',
            description: request.description,
          },
          meta: request.metadata,
          ...(channels ? { payment_options: channels.join(',') } : {}),
        },
      });

      if (readString(data, 'status') !== 'success') {
        throw new ChargeError(
          readString(data, 'message') ?? 'Failed to initialize Flutterwave payment',
          this.name,
        );
      }

      this.logger.log(`Charge initialized: ${reference}`);

      return new ChargeResponse({
        reference,
        authorizationUrl: readString(data, 'data.link') ?? '',
        accessCode: reference,
        status: 'pending',
        metadata: request.metadata,
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof ChargeError) {
        throw error;
      }
      this.logger.error(`Charge failed: ${errorMessage(error)}`);
      throw new ChargeError(`Flutterwave charge failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async verify(reference: string): Promise<VerificationResponse> {
    try {
      const { data } = await this.toolkit.http.get('transactions/verify_by_reference', {
        headers: this.authHeaders(),
        query: { tx_ref: reference },
      });

      if (readString(data, 'status') !== 'success') {
        throw new VerificationError(
          readString(data, 'message') ?? 'Failed to verify Flutterwave transaction',
          this.name,
        );
      }

      const result = readObject(data, 'data');

      return new VerificationResponse({
        reference: readString(result, 'tx_ref') ?? reference,
        status: this.toolkit.normalizeStatus(readString(result, 'status') ?? 'unknown'),
        amount: readNumber(result, 'amount') ?? 0,
        currency: readString(result, 'currency') ?? '',
        paidAt: readString(result, 'created_at'),
        channel: readString(result, 'payment_type'),
        cardType: readString(result, 'card.type'),
        bank: readString(result, 'card.issuer'),
        customer: {
          email: readString(result, 'customer.email'),
          name: readString(result, 'customer.name'),
        },
        metadata: readObject(result, 'meta'),
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof VerificationError) {
        throw error;
      }
      this.logger.error(`Verification failed for ${reference}: ${errorMessage(error)}`);
      throw new VerificationError(
        `Flutterwave verification failed: ${errorMessage(error)}`,
        this.name,
        error,
      );
    }
  }

  async validateWebhook(headers: WebhookHeaders, rawBody: Buffer): Promise<boolean> {
    const signature = headerValue(headers, FLUTTERWAVE_SIGNATURE_HEADER);
    if (!signature) {
      this.logger.warn('Webhook verif-hash missing');
      return false;
    }

    const expected = this.toolkit.optionalSetting('webhookSecret') ?? this.secretKey;
    if (!safeEqual(signature, expected)) {
      this.logger.warn('Webhook verif-hash mismatch');
      return false;
    }

    const payload = parseJsonObject(rawBody);
    return this.toolkit.passesReplayGuard(payload && readString(payload, 'data.created_at'));
  }

  async healthCheck(): Promise<boolean> {
    return this.toolkit.isReachable(() => this.toolkit.http.get('banks/NG', { headers: this.authHeaders() }));
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
    return readString(payload, 'data.tx_ref', 'data.txRef', 'txRef');
  }

  extractWebhookStatus(payload: WebhookPayload): string {
    return readString(payload, 'data.status', 'status') ?? 'unknown';
  }

  extractWebhookChannel(payload: WebhookPayload): string | null {
    return readString(payload, 'data.payment_type', 'event.type');
  }

  resolveVerificationId(reference: string): string {
    return reference;
  }

  private authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.secretKey}` };
  }
}
