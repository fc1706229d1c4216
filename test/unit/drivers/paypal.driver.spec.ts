import {
  ChargeRequest,
  ConfigurationError,
  PAYPAL_HEADERS,
  PayPalDriver,
  isTrustedCertificateUrl,
} from '../../../src';
import { createDriverContext, jsonBody, jsonResponse, stubFetch } from '../../helpers';

describe('PayPalDriver', () => {
  const createDriver = (config: Record<string, unknown> = {}) =>
    new PayPalDriver(
      'paypal',
      { clientId: 'client-id', clientSecret: 'test-secret', webhookId: 'WH-ID-1', ...config },
      createDriverContext(),
    );

  const token = () => jsonResponse({ access_token: 'token-1', expires_in: 32400 });

  const transmissionHeaders = (overrides: Record<string, string> = {}): Record<string, string> => ({
    [PAYPAL_HEADERS.transmissionId]: 'tx-1',
    [PAYPAL_HEADERS.transmissionTime]: new Date().toISOString(),
    [PAYPAL_HEADERS.transmissionSig]: 'c2lnbmF0dXJl',
    [PAYPAL_HEADERS.certUrl]: 'https://api.paypal.com/v1/notifications/certs/CERT-1',
    [PAYPAL_HEADERS.authAlgo]: 'SHA256withRSA',
    ...overrides,
  });

  const event = JSON.stringify({
    id: 'WH-EVENT-1',
    event_type: 'PAYMENT.CAPTURE.COMPLETED',
    create_time: new Date().toISOString(),
    resource: { id: 'CAP-1', custom_id: 'PAYPAL_REF_1', status: 'COMPLETED' },
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should reject an unknown webhook verification mode', () => {
    expect(() => createDriver({ webhookVerification: 'magic' })).toThrow(ConfigurationError);
  });

  describe('charge', () => {
    it('should create a capture order and return the approval link', async () => {
      const { calls } = stubFetch({
        'POST /v1/oauth2/token': token,
        'POST /v2/checkout/orders': () =>
          jsonResponse({
            id: 'ORDER-1',
            status: 'PAYER_ACTION_REQUIRED',
            links: [
              { rel: 'self', href: 'https://api-m.paypal.com/v2/checkout/orders/ORDER-1' },
              { rel: 'payer-action', href: 'https://www.paypal.test/checkoutnow?token=ORDER-1' },
            ],
          }),
      });

      const response = await createDriver().charge(
        ChargeRequest.create({
          amount: 50,
          currency: 'USD',
          email: 'payer@example.com',
          reference: 'PAYPAL_REF_1',
          callbackUrl: 'https://shop.test/return',
          idempotencyKey: 'idem-1',
        }),
      );

      expect(response).toMatchObject({
        reference: 'PAYPAL_REF_1',
        authorizationUrl: 'https://www.paypal.test/checkoutnow?token=ORDER-1',
        accessCode: 'ORDER-1',
        status: 'PAYER_ACTION_REQUIRED',
        metadata: { order_id: 'ORDER-1' },
      });

      expect(calls[0].body).toBe('grant_type=client_credentials');
      expect(calls[0].headers.authorization).toBe(`Basic ${Buffer.from('client-id:test-secret').toString('base64')}`);
      expect(calls[1].headers.authorization).toBe('Bearer token-1');
      expect(calls[1].headers['paypal-request-id']).toBe('idem-1');
      expect(jsonBody(calls[1])).toEqual({
        intent: 'CAPTURE',
        purchase_units: [
          {
            reference_id: 'PAYPAL_REF_1',
            custom_id: 'PAYPAL_REF_1',
            description: 'Payment',
            amount: { currency_code: 'USD', value: '50.00' },
          },
        ],
        payment_source: {
          paypal: {
            experience_context: {
              return_url: 'https://shop.test/return',
              cancel_url: 'https://shop.test/return',
              payment_method_preference: 'IMMEDIATE_PAYMENT_REQUIRED',
              user_action: 'PAY_NOW',
            },
          },
        },
      });
    });

    it('should fail when authentication is refused', async () => {
      stubFetch({
        'POST /v1/oauth2/token': () => jsonResponse({ error: 'invalid_client' }, 401),
      });

      await expect(
        createDriver().charge(ChargeRequest.create({ amount: 5, currency: 'USD', email: 'payer@example.com' })),
      ).rejects.toThrow('PayPal charge failed');
    });
  });

  describe('verify', () => {
    it('should read the order by id', async () => {
      stubFetch({
        'POST /v1/oauth2/token': token,
        'GET /v2/checkout/orders/ORDER-1': () =>
          jsonResponse({
            id: 'ORDER-1',
            status: 'COMPLETED',
            purchase_units: [
              {
                reference_id: 'PAYPAL_REF_1',
                custom_id: 'PAYPAL_REF_1',
                amount: { currency_code: 'USD', value: '50.00' },
                payments: { captures: [{ id: 'CAP-1', create_time: '2026-01-01T10:00:00Z' }] },
              },
            ],
            payer: { email_address: 'payer@example.com', name: { given_name: 'Ada' } },
          }),
      });

      const result = await createDriver().verify('ORDER-1');

      expect(result).toMatchObject({
        reference: 'PAYPAL_REF_1',
        status: 'success',
        amount: 50,
        currency: 'USD',
        paidAt: '2026-01-01T10:00:00Z',
        channel: 'paypal',
        customer: { email: 'payer@example.com', name: 'Ada' },
        metadata: { order_id: 'ORDER-1', capture_id: 'CAP-1' },
      });
    });

    it('should verify by the stored order id', () => {
      expect(createDriver().resolveVerificationId('PAYPAL_REF_1', 'ORDER-1')).toBe('ORDER-1');
      expect(createDriver().resolveVerificationId('PAYPAL_REF_1', null)).toBe('PAYPAL_REF_1');
    });
  });

  describe('validateWebhook', () => {
    it('should accept a delivery PayPal verifies', async () => {
      const { calls } = stubFetch({
        'POST /v1/oauth2/token': token,
        'POST /v1/notifications/verify-webhook-signature': () => jsonResponse({ verification_status: 'SUCCESS' }),
      });

      await expect(createDriver().validateWebhook(transmissionHeaders(), Buffer.from(event))).resolves.toBe(true);
      expect(jsonBody(calls[1])).toEqual(
        expect.objectContaining({
          transmission_id: 'tx-1',
          webhook_id: 'WH-ID-1',
          webhook_event: JSON.parse(event),
        }),
      );
    });

    it('should reject a delivery PayPal does not verify', async () => {
      stubFetch({
        'POST /v1/oauth2/token': token,
        'POST /v1/notifications/verify-webhook-signature': () => jsonResponse({ verification_status: 'FAILURE' }),
      });

      await expect(createDriver().validateWebhook(transmissionHeaders(), Buffer.from(event))).resolves.toBe(false);
    });

    it('should reject a stale transmission', async () => {
      stubFetch({
        'POST /v1/oauth2/token': token,
        'POST /v1/notifications/verify-webhook-signature': () => jsonResponse({ verification_status: 'SUCCESS' }),
      });
      const headers = transmissionHeaders({
        [PAYPAL_HEADERS.transmissionTime]: new Date(Date.now() - 3600 * 1000).toISOString(),
      });

      await expect(createDriver().validateWebhook(headers, Buffer.from(event))).resolves.toBe(false);
    });

    it('should reject deliveries without transmission headers', async () => {
      const { calls } = stubFetch({});

      await expect(createDriver().validateWebhook({}, Buffer.from(event))).resolves.toBe(false);
      expect(calls).toHaveLength(0);
    });

    it('should reject deliveries when no webhook id is configured', async () => {
      const driver = new PayPalDriver(
        'paypal',
        { clientId: 'client-id', clientSecret: 'test-secret' },
        createDriverContext(),
      );

      await expect(driver.validateWebhook(transmissionHeaders(), Buffer.from(event))).resolves.toBe(false);
    });

    it('should refuse certificates from untrusted hosts', async () => {
      const { calls } = stubFetch({});
      const headers = transmissionHeaders({ [PAYPAL_HEADERS.certUrl]: 'https://evil.test/cert.pem' });

      await expect(
        createDriver({ webhookVerification: 'certificate' }).validateWebhook(headers, Buffer.from(event)),
      ).resolves.toBe(false);
      expect(calls).toHaveLength(0);
    });

    it('should reject a certificate response that is not PEM', async () => {
      stubFetch({ 'GET /v1/notifications/certs/CERT-1': () => new Response('not a certificate') });

      await expect(
        createDriver({ webhookVerification: 'certificate' }).validateWebhook(transmissionHeaders(), Buffer.from(event)),
      ).resolves.toBe(false);
    });

    it('should extract webhook fields', () => {
      const driver = createDriver();
      const payload = JSON.parse(event);

      expect(driver.extractWebhookReference(payload)).toBe('PAYPAL_REF_1');
      expect(driver.extractWebhookStatus(payload)).toBe('COMPLETED');
      expect(driver.extractWebhookChannel()).toBe('paypal');
    });

    it('should fall back to the event type when the resource carries no status', () => {
      const driver = createDriver();

      expect(driver.extractWebhookStatus({ event_type: 'PAYMENT.CAPTURE.PENDING', resource: {} })).toBe(
        'PAYMENT.CAPTURE.PENDING',
      );
    });
  });

  describe('helpers', () => {
    it('should only trust paypal.com certificate hosts over https', () => {
      expect(isTrustedCertificateUrl('https://api.paypal.com/v1/notifications/certs/X')).toBe(true);
      expect(isTrustedCertificateUrl('http://api.paypal.com/cert')).toBe(false);
      expect(isTrustedCertificateUrl('https://paypal.com.evil.test/cert')).toBe(false);
      expect(isTrustedCertificateUrl('not a url')).toBe(false);
    });
  });
});
