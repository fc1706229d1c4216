import { Logger } from '@nestjs/common';
import * as CRC32 from 'crc-32';
import { createVerify } from 'crypto';
import { LRUCache } from 'lru-cache';
import {
  ChargeError,
  ChargeRequest,
  ChargeResponse,
  ConfigurationError,
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
  headerValue,
  parseJsonObject,
  readArray,
  readNumber,
  readObject,
  readString,
} from '../shared';

export type PayPalWebhookVerification = 'api' | 'certificate';

export const PAYPAL_HEADERS = {
  transmissionId: 'paypal-transmission-id',
  transmissionTime: 'paypal-transmission-time',
  transmissionSig: 'paypal-transmission-sig',
  certUrl: 'paypal-cert-url',
  authAlgo: 'paypal-auth-algo',
} as const;

const TOKEN_EXPIRY_BUFFER_SECONDS = 60;
const CERTIFICATE_TTL_MS = 60 * 60 * 1000;

const SIGNATURE_ALGORITHMS: Record<string, string> = {
  SHA256WITHRSA: 'RSA-SHA256',
  SHA384WITHRSA: 'RSA-SHA384',
  SHA512WITHRSA: 'RSA-SHA512',
};

interface Transmission {
  id: string;
  time: string;
  signature: string;
  certUrl: string;
  authAlgo: string;
}

/**
 * PayPal driver
 *
 * OAuth client-credentials token, cached until shortly before expiry.
 * Charges create a CAPTURE order; verification reads the order by id.
 *
 * Webhooks are authenticated either by PayPal's verify-webhook-signature
 * API (`webhookVerification: 'api'`, the default) or locally against the
 * signing certificate (`'certificate'`).
 *
 * Settings: clientId, clientSecret (required), webhookId, webhookVerification, brandName
 */
export class PayPalDriver implements PaymentDriver {
  private readonly logger = new Logger(PayPalDriver.name);
  private readonly toolkit: DriverToolkit;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly verification: PayPalWebhookVerification;
  private readonly certificates = new LRUCache<string, string>({ max: 16, ttl: CERTIFICATE_TTL_MS });
  private token: { value: string; expiresAt: number } | null = null;
  private pendingToken: Promise<string> | null = null;

  constructor(
    readonly name: string,
    config: ProviderConfig,
    context: DriverContext,
  ) {
    this.toolkit = new DriverToolkit(name, config, context, {
      defaultBaseUrl: 'https://api-m.paypal.com',
      defaultCurrencies: ['USD', 'EUR', 'GBP', 'CAD', 'AUD'],
      requiredSettings: ['clientId', 'clientSecret'],
    });
    this.clientId = this.toolkit.requireSetting('clientId');
    this.clientSecret = this.toolkit.requireSetting('clientSecret');

    const verification = this.toolkit.optionalSetting('webhookVerification') ?? 'api';
    if (verification !== 'api' && verification !== 'certificate') {
      throw new ConfigurationError(
        `Unsupported PayPal webhook verification [${verification}]`,
        'webhookVerification',
        name,
      );
    }
    this.verification = verification;
  }

  async charge(request: ChargeRequest): Promise<ChargeResponse> {
    const reference = request.reference ?? this.toolkit.generateReference('PAYPAL');
    const callbackUrl = this.toolkit.callbackUrl(request);

    try {
      const token = await this.getAccessToken();
      const { data } = await this.toolkit.http.post('/v2/checkout/orders', {
        headers: {
          Authorization: `Bearer ${token}`,
          ...this.toolkit.idempotencyHeaders(request, 'PayPal-Request-Id'),
        },
        json: {
          intent: 'CAPTURE',
          purchase_units: [
            {
              reference_id: reference,
              custom_id: reference,
              description: request.description ?? 'Payment',
              amount: {
                currency_code: request.currency,
                value: formatMajorAmount(request.amount, request.currency),
              },
            },
          ],
          payment_source: {
            paypal: {
              experience_context: {
                brand_name: this.toolkit.optionalSetting('brandName'),
                return_url: callbackUrl,
                cancel_url: callbackUrl,
                payment_method_preference: 'IMMEDIATE_PAYMENT_REQUIRED',
                user_action: 'PAY_NOW',
              },
            },
          },
        },
      });

      const orderId = readString(data, 'id');
      if (!orderId) {
        throw new ChargeError('Failed to create PayPal order', this.name);
      }

      const approveLink = readArray(data, 'links')
        .filter(isJsonObject)
        .find((link) => link.rel === 'approve' || link.rel === 'payer-action');

      this.logger.log(`Charge initialized: ${reference} (order ${orderId})`);

      return new ChargeResponse({
        reference,
        authorizationUrl: (approveLink && readString(approveLink, 'href')) ?? '',
        accessCode: orderId,
        status: readString(data, 'status') ?? 'CREATED',
        metadata: { order_id: orderId },
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof ChargeError) {
        throw error;
      }
      this.logger.error(`Charge failed: ${errorMessage(error)}`);
      throw new ChargeError(`PayPal charge failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async verify(orderId: string): Promise<VerificationResponse> {
    try {
      const token = await this.getAccessToken();
      const { data } = await this.toolkit.http.get(
        `/v2/checkout/orders/${encodeURIComponent(orderId)}`,
        { headers: { Authorization: `Bearer ${token}` } },
      );

      if (!readString(data, 'id')) {
        throw new VerificationError('PayPal order not found', this.name);
      }

      const unit = readObject(data, 'purchase_units.0');
      const capture = readObject(unit, 'payments.captures.0');

      return new VerificationResponse({
        reference: readString(unit, 'custom_id', 'reference_id') ?? orderId,
        status: this.toolkit.normalizeStatus(readString(data, 'status') ?? 'unknown'),
        amount: readNumber(unit, 'amount.value') ?? 0,
        currency: readString(unit, 'amount.currency_code') ?? '',
        paidAt: readString(capture, 'create_time'),
        channel: 'paypal',
        customer: {
          email: readString(data, 'payer.email_address'),
          name: readString(data, 'payer.name.given_name'),
        },
        metadata: { order_id: readString(data, 'id'), capture_id: readString(capture, 'id') },
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof VerificationError) {
        throw error;
      }
      this.logger.error(`Verification failed for ${orderId}: ${errorMessage(error)}`);
      throw new VerificationError(`PayPal verification failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async validateWebhook(headers: WebhookHeaders, rawBody: Buffer): Promise<boolean> {
    const transmission = readTransmission(headers);
    if (!transmission) {
      this.logger.warn('Webhook transmission headers missing');
      return false;
    }

    const webhookId = this.toolkit.optionalSetting('webhookId');
    if (!webhookId) {
      this.logger.warn('Webhook id not configured');
      return false;
    }

    const payload = parseJsonObject(rawBody);
    if (!payload) {
      this.logger.warn('Webhook body is not a JSON object');
      return false;
    }

    let verified: boolean;
    try {
      verified =
        this.verification === 'certificate'
          ? await this.verifyWithCertificate(transmission, webhookId, rawBody)
          : await this.verifyWithApi(transmission, webhookId, payload);
    } catch (error) {
      this.logger.warn(`Webhook verification failed: ${errorMessage(error)}`);
      return false;
    }

    if (!verified) {
      this.logger.warn('Webhook signature rejected');
      return false;
    }

    return this.toolkit.passesReplayGuard(transmission.time || readString(payload, 'create_time'));
  }

  async healthCheck(): Promise<boolean> {
    return this.toolkit.isReachable(() => this.requestToken());
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
    return readString(
      payload,
      'resource.custom_id',
      'resource.purchase_units.0.custom_id',
      'resource.purchase_units.0.reference_id',
    );
  }

  /**
   * The resource's own status; the event type only when the resource has none
   */
  extractWebhookStatus(payload: WebhookPayload): string {
    return readString(payload, 'resource.status', 'event_type') ?? 'unknown';
  }

  extractWebhookChannel(): string | null {
    return 'paypal';
  }

  resolveVerificationId(reference: string, providerId: string | null): string {
    return providerId ?? reference;
  }

  private async verifyWithApi(
    transmission: Transmission,
    webhookId: string,
    payload: JsonObject,
  ): Promise<boolean> {
    const token = await this.getAccessToken();
    const { data } = await this.toolkit.http.post('/v1/notifications/verify-webhook-signature', {
      headers: { Authorization: `Bearer ${token}` },
      json: {
        auth_algo: transmission.authAlgo,
        cert_url: transmission.certUrl,
        transmission_id: transmission.id,
        transmission_sig: transmission.signature,
        transmission_time: transmission.time,
        webhook_id: webhookId,
        webhook_event: payload,
      },
    });

    return readString(data, 'verification_status') === 'SUCCESS';
  }

  private async verifyWithCertificate(
    transmission: Transmission,
    webhookId: string,
    rawBody: Buffer,
  ): Promise<boolean> {
    const algorithm = SIGNATURE_ALGORITHMS[transmission.authAlgo.toUpperCase()];
    if (!algorithm) {
      this.logger.warn(`Unsupported auth algorithm ${transmission.authAlgo}`);
      return false;
    }

    const certificate = await this.fetchCertificate(transmission.certUrl);
    const crc = CRC32.buf(rawBody) >>> 0;
    const message = `${transmission.id}|${transmission.time}|${webhookId}|${crc}`;

    return createVerify(algorithm)
      .update(message)
      .verify(certificate, transmission.signature, 'base64');
  }

  private async fetchCertificate(certUrl: string): Promise<string> {
    if (!isTrustedCertificateUrl(certUrl)) {
      throw new Error(`Untrusted certificate URL ${certUrl}`);
    }

    const cached = this.certificates.get(certUrl);
    if (cached) {
      return cached;
    }

    const { data } = await this.toolkit.http.get(certUrl, { headers: { Accept: '*/*' } });
    if (typeof data !== 'string' || !data.includes('BEGIN CERTIFICATE')) {
      throw new Error('Certificate response is not a PEM document');
    }

    this.certificates.set(certUrl, data);
    return data;
  }

  private async getAccessToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }

    if (!this.pendingToken) {
      this.pendingToken = this.requestToken().finally(() => {
        this.pendingToken = null;
      });
    }
    return this.pendingToken;
  }

  private async requestToken(): Promise<string> {
    const credentials = Buffer.from(`${this.clientId}:${this.clientSecret}`).toString('base64');
    const { data } = await this.toolkit.http.post('/v1/oauth2/token', {
      headers: { Authorization: `Basic ${credentials}` },
      form: { grant_type: 'client_credentials' },
    });

    const accessToken = readString(data, 'access_token');
    if (!accessToken) {
      throw new ChargeError('Failed to authenticate with PayPal', this.name);
    }

    const lifetime = readNumber(data, 'expires_in') ?? 3600;
    this.token = {
      value: accessToken,
      expiresAt: Date.now() + (lifetime - TOKEN_EXPIRY_BUFFER_SECONDS) * 1000,
    };
    return accessToken;
  }
}

/**
 * Only https URLs on a paypal.com host may serve signing certificates
 */
export function isTrustedCertificateUrl(certUrl: string): boolean {
  try {
    const url = new URL(certUrl);
    return url.protocol === 'https:' && (url.hostname === 'paypal.com' || url.hostname.endsWith('.paypal.com'));
  } catch {
    return false;
  }
}

function readTransmission(headers: WebhookHeaders): Transmission | null {
  const id = headerValue(headers, PAYPAL_HEADERS.transmissionId);
  const time = headerValue(headers, PAYPAL_HEADERS.transmissionTime);
  const signature = headerValue(headers, PAYPAL_HEADERS.transmissionSig);
  const certUrl = headerValue(headers, PAYPAL_HEADERS.certUrl);

  if (!id || !time || !signature || !certUrl) {
    return null;
  }

  return {
    id,
    time,
    signature,
    certUrl,
    authAlgo: headerValue(headers, PAYPAL_HEADERS.authAlgo) ?? 'SHA256withRSA',
  };
}
