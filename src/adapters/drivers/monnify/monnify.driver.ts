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

export const MONNIFY_SIGNATURE_HEADER = 'monnify-signature';

// refresh the bearer token this long before Monnify expires it
const TOKEN_EXPIRY_BUFFER_SECONDS = 60;
const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

interface AccessToken {
  value: string;
  expiresAt: number;
}

/**
 * Monnify driver
 *
 * Basic credentials are exchanged for a bearer token, cached until shortly
 * before expiry. Webhooks are HMAC-SHA512 hex over the raw body with the secret key.
 *
 * Settings: apiKey, secretKey, contractCode (all required)
 */
export class MonnifyDriver implements PaymentDriver {
  private readonly logger = new Logger(MonnifyDriver.name);
  private readonly toolkit: DriverToolkit;
  private readonly apiKey: string;
  private readonly secretKey: string;
  private readonly contractCode: string;
  private token: AccessToken | null = null;
  private pendingToken: Promise<string> | null = null;

  constructor(
    readonly name: string,
    config: ProviderConfig,
    context: DriverContext,
  ) {
    this.toolkit = new DriverToolkit(name, config, context, {
      defaultBaseUrl: 'https://api.monnify.com',
      defaultCurrencies: ['NGN'],
      requiredSettings: ['apiKey', 'secretKey', 'contractCode'],
    });
    this.apiKey = this.toolkit.requireSetting('apiKey');
    this.secretKey = this.toolkit.requireSetting('secretKey');
    this.contractCode = this.toolkit.requireSetting('contractCode');
  }

  async charge(request: ChargeRequest): Promise<ChargeResponse> {
    const reference = request.reference ?? this.toolkit.generateReference('MON');

    try {
      const token = await this.getAccessToken();
      const { data } = await this.toolkit.http.post('/api/v1/merchant/transactions/init-transaction', {
        headers: {
          Authorization: `Bearer ${token}`,
          ...this.toolkit.idempotencyHeaders(request),
        },
        json: {
          amount: request.amount,
          customerName: request.customer?.name ?? 'Customer',
          customerEmail: request.email,
          paymentReference: reference,
          paymentDescription: request.description ?? 'Payment',
          currencyCode: request.currency,
          contractCode: this.contractCode,
          redirectUrl: this.toolkit.callbackUrl(request),
          paymentMethods: this.toolkit.mapChannels(request) ?? ['CARD', 'ACCOUNT_TRANSFER'],
          metadata: request.metadata,
        },
      });

      if (readPath(data, 'requestSuccessful') !== true) {
        throw new ChargeError(
          readString(data, 'responseMessage') ?? 'Failed to initialize Monnify transaction',
          this.name,
        );
      }

      this.logger.log(`Charge initialized: ${reference}`);

      return new ChargeResponse({
        reference,
        authorizationUrl: readString(data, 'responseBody.checkoutUrl') ?? '',
        accessCode: readString(data, 'responseBody.transactionReference') ?? '',
        status: 'pending',
        metadata: request.metadata,
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof ChargeError) {
        throw error;
      }
      this.logger.error(`Charge failed: ${errorMessage(error)}`);
      throw new ChargeError(`Monnify charge failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async verify(reference: string): Promise<VerificationResponse> {
    try {
      const token = await this.getAccessToken();
      const { data } = await this.toolkit.http.get(
        `/api/v2/transactions/${encodeURIComponent(reference)}`,
        { headers: { Authorization: `Bearer ${token}` } },
      );

      if (readPath(data, 'requestSuccessful') !== true) {
        throw new VerificationError(
          readString(data, 'responseMessage') ?? 'Failed to verify Monnify transaction',
          this.name,
        );
      }

      const result = readObject(data, 'responseBody');

      return new VerificationResponse({
        reference: readString(result, 'paymentReference') ?? reference,
        status: this.toolkit.normalizeStatus(readString(result, 'paymentStatus') ?? 'unknown'),
        amount: readNumber(result, 'amountPaid') ?? 0,
        currency: readString(result, 'currencyCode') ?? '',
        paidAt: readString(result, 'paidOn'),
        channel: readString(result, 'paymentMethod'),
        customer: {
          email: readString(result, 'customerEmail'),
          name: readString(result, 'customerName'),
        },
        metadata: readObject(result, 'metaData'),
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof VerificationError) {
        throw error;
      }
      this.logger.error(`Verification failed for ${reference}: ${errorMessage(error)}`);
      throw new VerificationError(
        `Monnify verification failed: ${errorMessage(error)}`,
        this.name,
        error,
      );
    }
  }

  async validateWebhook(headers: WebhookHeaders, rawBody: Buffer): Promise<boolean> {
    const signature = headerValue(headers, MONNIFY_SIGNATURE_HEADER);
    if (!signature) {
      this.logger.warn('Webhook signature missing');
      return false;
    }

    if (!safeEqual(signature.toLowerCase(), hmacHex('sha512', this.secretKey, rawBody))) {
      this.logger.warn('Webhook signature mismatch');
      return false;
    }

    const payload = parseJsonObject(rawBody);
    return this.toolkit.passesReplayGuard(payload && readString(payload, 'eventData.paidOn'));
  }

  async healthCheck(): Promise<boolean> {
    return this.toolkit.isReachable(() => this.login());
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
    return readString(payload, 'eventData.paymentReference', 'paymentReference');
  }

  extractWebhookStatus(payload: WebhookPayload): string {
    return readString(payload, 'eventData.paymentStatus', 'paymentStatus') ?? 'unknown';
  }

  extractWebhookChannel(payload: WebhookPayload): string | null {
    return readString(payload, 'eventData.paymentMethod', 'paymentMethod');
  }

  resolveVerificationId(reference: string): string {
    return reference;
  }

  /**
   * Cached bearer token; concurrent callers share one login
   */
  private async getAccessToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }

    if (!this.pendingToken) {
      this.pendingToken = this.login().finally(() => {
        this.pendingToken = null;
      });
    }
    return this.pendingToken;
  }

  private async login(): Promise<string> {
    const credentials = Buffer.from(`${this.apiKey}:${this.secretKey}`).toString('base64');
    const { data } = await this.toolkit.http.post('/api/v1/auth/login', {
      headers: { Authorization: `Basic ${credentials}` },
    });

    const accessToken = readString(data, 'responseBody.accessToken');
    if (readPath(data, 'requestSuccessful') !== true || !accessToken) {
      throw new ChargeError('Failed to authenticate with Monnify', this.name);
    }

    const lifetime = readNumber(data, 'responseBody.expiresIn') ?? DEFAULT_TOKEN_LIFETIME_SECONDS;
    this.token = {
      value: accessToken,
      expiresAt: Date.now() + (lifetime - TOKEN_EXPIRY_BUFFER_SECONDS) * 1000,
    };
    return accessToken;
  }
}
