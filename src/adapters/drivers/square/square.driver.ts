import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
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
  fromMinorUnits,
  isJsonObject,
} from '../../../core';
import {
  DriverToolkit,
  HttpError,
  headerValue,
  hmacBase64,
  parseJsonObject,
  readArray,
  readNumber,
  readObject,
  readString,
  safeEqual,
} from '../shared';

export const SQUARE_SIGNATURE_HEADER = 'x-square-signature';
export const SQUARE_API_VERSION = '2024-10-18';

const SQUARE_PAYMENT_ID_LENGTH = 32;

/**
 * Square driver
 *
 * Charges create an Online Checkout payment link. Verification accepts a
 * payment id, a payment link id, or falls back to an order search on reference_id.
 *
 * Settings: accessToken, locationId (required), webhookSignatureKey
 */
export class SquareDriver implements PaymentDriver {
  private readonly logger = new Logger(SquareDriver.name);
  private readonly toolkit: DriverToolkit;
  private readonly locationId: string;

  constructor(
    readonly name: string,
    config: ProviderConfig,
    context: DriverContext,
  ) {
    const accessToken = typeof config.accessToken === 'string' ? config.accessToken : '';
    this.toolkit = new DriverToolkit(name, config, context, {
      defaultBaseUrl: 'https://connect.squareup.com',
      defaultCurrencies: ['USD', 'CAD', 'GBP', 'EUR', 'AUD', 'JPY'],
      defaultHeaders: {
        Authorization: `Bearer ${accessToken}`,
        'Square-Version': SQUARE_API_VERSION,
      },
      requiredSettings: ['accessToken', 'locationId'],
    });
    this.locationId = this.toolkit.requireSetting('locationId');
  }

  async charge(request: ChargeRequest): Promise<ChargeResponse> {
    const reference = request.reference ?? this.toolkit.generateReference('SQUARE');

    try {
      const { data } = await this.toolkit.http.post('/v2/online-checkout/payment-links', {
        headers: this.toolkit.idempotencyHeaders(request),
        json: {
          idempotency_key: request.idempotencyKey ?? randomUUID(),
          order: {
            location_id: this.locationId,
            reference_id: reference,
            line_items: [
              {
                name: request.description ?? 'Payment',
                quantity: '1',
                base_price_money: {
                  amount: request.amountInMinorUnits(),
                  currency: request.currency,
                },
              },
            ],
          },
          redirect_url: this.toolkit.appendQueryParam(
            this.toolkit.callbackUrl(request),
            'reference',
            reference,
          ),
          pre_populated_data: { buyer_email: request.email },
        },
      });

      const linkId = readString(data, 'payment_link.id');
      const url = readString(data, 'payment_link.url');
      if (!linkId || !url) {
        throw new ChargeError('Failed to create Square payment link', this.name);
      }

      this.logger.log(`Charge initialized: ${reference}`);

      return new ChargeResponse({
        reference,
        authorizationUrl: url,
        accessCode: linkId,
        status: 'pending',
        metadata: {
          payment_link_id: linkId,
          order_id: readString(data, 'payment_link.order_id'),
        },
        provider: this.name,
      });
    } catch (error) {
      if (error instanceof ChargeError) {
        throw error;
      }
      this.logger.error(`Charge failed: ${errorMessage(error)}`);
      throw new ChargeError(`Square charge failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async verify(id: string): Promise<VerificationResponse> {
    try {
      const result =
        (await this.verifyByPaymentId(id)) ??
        (await this.verifyByPaymentLinkId(id)) ??
        (await this.verifyByReferenceId(id));
      return result;
    } catch (error) {
      if (error instanceof VerificationError) {
        throw error;
      }
      this.logger.error(`Verification failed for ${id}: ${errorMessage(error)}`);
      throw new VerificationError(`Square verification failed: ${errorMessage(error)}`, this.name, error);
    }
  }

  async validateWebhook(headers: WebhookHeaders, rawBody: Buffer): Promise<boolean> {
    const signature = headerValue(headers, SQUARE_SIGNATURE_HEADER);
    if (!signature) {
      this.logger.warn('Webhook signature missing');
      return false;
    }

    const signatureKey = this.toolkit.optionalSetting('webhookSignatureKey');
    if (!signatureKey) {
      this.logger.warn('Webhook signature key not configured');
      return false;
    }

    if (!safeEqual(signature, hmacBase64('sha256', signatureKey, rawBody))) {
      this.logger.warn('Webhook signature mismatch');
      return false;
    }

    const payload = parseJsonObject(rawBody);
    return this.toolkit.passesReplayGuard(payload && readString(payload, 'created_at'));
  }

  async healthCheck(): Promise<boolean> {
    return this.toolkit.isReachable(() => this.toolkit.http.get('/v2/locations'));
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
    return readString(payload, 'data.object.payment.reference_id', 'data.object.order.reference_id');
  }

  extractWebhookStatus(payload: WebhookPayload): string {
    return readString(payload, 'data.object.payment.status', 'data.object.order.state') ?? 'unknown';
  }

  extractWebhookChannel(payload: WebhookPayload): string | null {
    return readString(payload, 'data.object.payment.source_type');
  }

  resolveVerificationId(reference: string, providerId: string | null): string {
    return providerId ?? reference;
  }

  private async verifyByPaymentId(id: string): Promise<VerificationResponse | null> {
    if (!id.startsWith('payment_') && id.length !== SQUARE_PAYMENT_ID_LENGTH) {
      return null;
    }

    const payment = await this.getOrNull(`/v2/payments/${encodeURIComponent(id)}`, 'payment');
    return payment ? this.mapPayment(payment, id) : null;
  }

  private async verifyByPaymentLinkId(id: string): Promise<VerificationResponse | null> {
    const link = await this.getOrNull(
      `/v2/online-checkout/payment-links/${encodeURIComponent(id)}`,
      'payment_link',
    );
    const orderId = link && readString(link, 'order_id');
    if (!orderId) {
      return null;
    }

    return this.verifyOrder(orderId, id);
  }

  private async verifyByReferenceId(reference: string): Promise<VerificationResponse> {
    const { data } = await this.toolkit.http.post('/v2/orders/search', {
      json: {
        location_ids: [this.locationId],
        query: {
          filter: { state_filter: { states: ['OPEN', 'COMPLETED', 'CANCELED'] } },
        },
      },
    });

    const order = readArray(data, 'orders')
      .filter(isJsonObject)
      .find((candidate) => readString(candidate, 'reference_id') === reference);
    const orderId = order && readString(order, 'id');
    if (!orderId) {
      throw new VerificationError(`Payment not found for reference [${reference}]`, this.name);
    }

    return this.verifyOrder(orderId, reference);
  }

  private async verifyOrder(orderId: string, fallbackReference: string): Promise<VerificationResponse> {
    const { data } = await this.toolkit.http.get(`/v2/orders/${encodeURIComponent(orderId)}`);
    const order = readObject(data, 'order');

    const paymentId = readString(order, 'tenders.0.payment_id');
    if (!paymentId) {
      throw new VerificationError(`No payment found for order [${orderId}]`, this.name);
    }

    const payment = await this.toolkit.http.get(`/v2/payments/${encodeURIComponent(paymentId)}`);
    return this.mapPayment(
      readObject(payment.data, 'payment'),
      readString(order, 'reference_id') ?? fallbackReference,
    );
  }

  /**
   * GET a resource, treating 404 as "not this kind of id"
   */
  private async getOrNull(path: string, key: string): Promise<JsonObject | null> {
    try {
      const { data } = await this.toolkit.http.get(path);
      const resource = readObject(data, key);
      return Object.keys(resource).length > 0 ? resource : null;
    } catch (error) {
      if (error instanceof HttpError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  private mapPayment(payment: JsonObject, reference: string): VerificationResponse {
    const status = this.toolkit.normalizeStatus(readString(payment, 'status') ?? 'unknown');
    const currency = (readString(payment, 'amount_money.currency') ?? '').toUpperCase();

    return new VerificationResponse({
      reference: readString(payment, 'reference_id') ?? reference,
      status,
      amount: fromMinorUnits(readNumber(payment, 'amount_money.amount') ?? 0, currency),
      currency,
      paidAt: readString(payment, 'updated_at', 'created_at'),
      channel: readString(payment, 'source_type'),
      cardType: readString(payment, 'card_details.card.card_brand'),
      customer: { email: readString(payment, 'buyer_email_address') },
      metadata: {
        payment_id: readString(payment, 'id'),
        order_id: readString(payment, 'order_id'),
      },
      provider: this.name,
    });
  }
}
