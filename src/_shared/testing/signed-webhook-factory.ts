import { randomBytes } from 'crypto';
import {
  FLUTTERWAVE_SIGNATURE_HEADER,
  MOLLIE_SIGNATURE_HEADER,
  MONNIFY_SIGNATURE_HEADER,
  NOWPAYMENTS_SIGNATURE_HEADER,
  PAYSTACK_SIGNATURE_HEADER,
  SQUARE_SIGNATURE_HEADER,
  STRIPE_SIGNATURE_HEADER,
  sortKeysDeep,
  hmacBase64,
  hmacHex,
} from '../../adapters/drivers';
import { JsonObject } from '../../core';

/**
 * A webhook delivery as the provider would send it
 */
export interface SignedWebhook {
  body: string;
  headers: Record<string, string>;
  payload: JsonObject;
}

export interface WebhookOptions {
  reference?: string;
  status?: string;
  channel?: string;
  /** Payload timestamp; defaults to now */
  issuedAt?: Date;
  secret?: string;
}

const DEFAULT_SECRET = 'test-secret';

/**
 * Builds signed webhook deliveries per provider for tests and local tooling
 */
export class SignedWebhookFactory {
  static paystack(options: WebhookOptions = {}): SignedWebhook {
    const payload = {
      event: 'charge.success',
      data: {
        reference: options.reference ?? this.generateRef('PAYSTACK'),
        status: options.status ?? 'success',
        channel: options.channel ?? 'card',
        amount: 500000,
        currency: 'NGN',
        paid_at: this.timestamp(options),
      },
    };
    const body = JSON.stringify(payload);

    return {
      body,
      payload,
      headers: {
        'content-type': 'application/json',
        [PAYSTACK_SIGNATURE_HEADER]: hmacHex('sha512', options.secret ?? DEFAULT_SECRET, body),
      },
    };
  }

  static flutterwave(options: WebhookOptions = {}): SignedWebhook {
    const payload = {
      event: 'charge.completed',
      data: {
        tx_ref: options.reference ?? this.generateRef('FLW'),
        status: options.status ?? 'successful',
        payment_type: options.channel ?? 'card',
        amount: 5000,
        currency: 'NGN',
        created_at: this.timestamp(options),
      },
    };

    return {
      body: JSON.stringify(payload),
      payload,
      headers: {
        'content-type': 'application/json',
        [FLUTTERWAVE_SIGNATURE_HEADER]: options.secret ?? DEFAULT_SECRET,
      },
    };
  }

  static monnify(options: WebhookOptions = {}): SignedWebhook {
    const payload = {
      eventType: 'SUCCESSFUL_TRANSACTION',
      eventData: {
        paymentReference: options.reference ?? this.generateRef('MON'),
        paymentStatus: options.status ?? 'PAID',
        paymentMethod: options.channel ?? 'ACCOUNT_TRANSFER',
        amountPaid: 5000,
        paidOn: this.timestamp(options),
      },
    };
    const body = JSON.stringify(payload);

    return {
      body,
      payload,
      headers: {
        'content-type': 'application/json',
        [MONNIFY_SIGNATURE_HEADER]: hmacHex('sha512', options.secret ?? DEFAULT_SECRET, body),
      },
    };
  }

  static square(options: WebhookOptions = {}): SignedWebhook {
    const payload = {
      type: 'payment.updated',
      created_at: this.timestamp(options),
      data: {
        object: {
          payment: {
            id: randomBytes(16).toString('hex'),
            reference_id: options.reference ?? this.generateRef('SQUARE'),
            status: options.status ?? 'COMPLETED',
            source_type: options.channel ?? 'CARD',
          },
        },
      },
    };
    const body = JSON.stringify(payload);

    return {
      body,
      payload,
      headers: {
        'content-type': 'application/json',
        [SQUARE_SIGNATURE_HEADER]: hmacBase64('sha256', options.secret ?? DEFAULT_SECRET, body),
      },
    };
  }

  static mollie(options: WebhookOptions = {}): SignedWebhook {
    const payload = {
      resource: 'payment',
      id: `tr_${randomBytes(5).toString('hex')}`,
      status: options.status ?? 'paid',
      method: options.channel ?? 'ideal',
      createdAt: this.timestamp(options),
      metadata: { reference: options.reference ?? this.generateRef('MOLLIE') },
    };
    const body = JSON.stringify(payload);

    return {
      body,
      payload,
      headers: {
        'content-type': 'application/json',
        [MOLLIE_SIGNATURE_HEADER]: hmacHex('sha256', options.secret ?? DEFAULT_SECRET, body),
      },
    };
  }

  static stripe(options: WebhookOptions = {}): SignedWebhook {
    const payload = {
      id: `evt_${randomBytes(8).toString('hex')}`,
      type: 'checkout.session.completed',
      data: {
        object: {
          id: `cs_test_${randomBytes(8).toString('hex')}`,
          object: 'checkout.session',
          client_reference_id: options.reference ?? this.generateRef('STRIPE'),
          status: 'complete',
          payment_status: options.status ?? 'paid',
          payment_method_types: [options.channel ?? 'card'],
        },
      },
    };
    const body = JSON.stringify(payload);
    const timestamp = Math.floor((options.issuedAt ?? new Date()).getTime() / 1000);
    const signature = hmacHex('sha256', options.secret ?? DEFAULT_SECRET, `${timestamp}.${body}`);

    return {
      body,
      payload,
      headers: {
        'content-type': 'application/json',
        [STRIPE_SIGNATURE_HEADER]: `t=${timestamp},v1=${signature}`,
      },
    };
  }

  static nowpayments(options: WebhookOptions = {}): SignedWebhook {
    const payload = {
      payment_id: 5077125051,
      order_id: options.reference ?? this.generateRef('NOWPAYMENTS'),
      payment_status: options.status ?? 'finished',
      pay_currency: options.channel ?? 'btc',
      price_amount: 50,
      price_currency: 'usd',
      updated_at: (options.issuedAt ?? new Date()).getTime(),
    };
    const body = JSON.stringify(sortKeysDeep(payload));

    return {
      body,
      payload,
      headers: {
        'content-type': 'application/json',
        [NOWPAYMENTS_SIGNATURE_HEADER]: hmacHex('sha512', options.secret ?? DEFAULT_SECRET, body),
      },
    };
  }

  /**
   * Same delivery with its signature header replaced
   */
  static tampered(webhook: SignedWebhook, header: string): SignedWebhook {
    return {
      ...webhook,
      headers: { ...webhook.headers, [header]: 'invalid-signature' },
    };
  }

  static generateRef(prefix: string): string {
    return `${prefix}_${Math.floor(Date.now() / 1000)}_${randomBytes(8).toString('hex')}`;
  }

  private static timestamp(options: WebhookOptions): string {
    return (options.issuedAt ?? new Date()).toISOString();
  }
}
