import {
  ChargeRequest,
  SQUARE_API_VERSION,
  SQUARE_SIGNATURE_HEADER,
  SignedWebhookFactory,
  SquareDriver,
  VerificationError,
} from '../../../src';
import { createDriverContext, jsonBody, jsonResponse, stubFetch } from '../../helpers';

describe('SquareDriver', () => {
  const createDriver = (config: Record<string, unknown> = {}) =>
    new SquareDriver(
      'square',
      { accessToken: 'test-token', locationId: 'LOC1', webhookSignatureKey: 'test-secret', ...config },
      createDriverContext(),
    );

  const payment = {
    payment: {
      id: 'PAY1',
      status: 'COMPLETED',
      amount_money: { amount: 2550, currency: 'usd' },
      reference_id: 'SQUARE_REF_1',
      source_type: 'CARD',
      card_details: { card: { card_brand: 'VISA' } },
      updated_at: '2026-01-01T10:00:00Z',
      order_id: 'ORD1',
    },
  };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should create a payment link in minor units', async () => {
    const { calls } = stubFetch({
      'POST /v2/online-checkout/payment-links': () =>
        jsonResponse({ payment_link: { id: 'PL1', url: 'https://square.link/u/abc', order_id: 'ORD1' } }),
    });

    const response = await createDriver().charge(
      ChargeRequest.create({
        amount: 25.5,
        currency: 'USD',
        email: 'payer@example.com',
        reference: 'SQUARE_REF_1',
        idempotencyKey: 'idem-1',
      }),
    );

    expect(response).toMatchObject({
      reference: 'SQUARE_REF_1',
      authorizationUrl: 'https://square.link/u/abc',
      accessCode: 'PL1',
      status: 'pending',
      metadata: { payment_link_id: 'PL1', order_id: 'ORD1' },
    });
    expect(calls[0].headers.authorization).toBe('Bearer test-token');
    expect(calls[0].headers['square-version']).toBe(SQUARE_API_VERSION);
    expect(jsonBody(calls[0])).toEqual({
      idempotency_key: 'idem-1',
      order: {
        location_id: 'LOC1',
        reference_id: 'SQUARE_REF_1',
        line_items: [
          { name: 'Payment', quantity: '1', base_price_money: { amount: 2550, currency: 'USD' } },
        ],
      },
      pre_populated_data: { buyer_email: 'payer@example.com' },
    });
  });

  it('should send zero-decimal currencies whole', async () => {
    const { calls } = stubFetch({
      'POST /v2/online-checkout/payment-links': () =>
        jsonResponse({ payment_link: { id: 'PL2', url: 'https://square.link/u/jpy', order_id: 'ORD2' } }),
    });

    await createDriver().charge(
      ChargeRequest.create({ amount: 1000, currency: 'JPY', email: 'payer@example.com', reference: 'SQUARE_JPY' }),
    );

    expect(jsonBody(calls[0])).toMatchObject({
      order: { line_items: [{ base_price_money: { amount: 1000, currency: 'JPY' } }] },
    });
  });

  describe('verify', () => {
    it('should read zero-decimal amounts whole', async () => {
      stubFetch({
        'GET /v2/payments/payment_jpy': () =>
          jsonResponse({ payment: { ...payment.payment, amount_money: { amount: 1000, currency: 'JPY' } } }),
      });

      await expect(createDriver().verify('payment_jpy')).resolves.toMatchObject({ amount: 1000, currency: 'JPY' });
    });

    it('should read a payment id directly', async () => {
      const { calls } = stubFetch({ 'GET /v2/payments/payment_abc': () => jsonResponse(payment) });

      const result = await createDriver().verify('payment_abc');

      expect(calls).toHaveLength(1);
      expect(result).toMatchObject({
        reference: 'SQUARE_REF_1',
        status: 'success',
        amount: 25.5,
        currency: 'USD',
        paidAt: '2026-01-01T10:00:00Z',
        channel: 'CARD',
        cardType: 'VISA',
      });
    });

    it('should follow a payment link to its order payment', async () => {
      const { calls } = stubFetch({
        'GET /v2/online-checkout/payment-links/PL1': () => jsonResponse({ payment_link: { id: 'PL1', order_id: 'ORD1' } }),
        'GET /v2/orders/ORD1': () =>
          jsonResponse({ order: { id: 'ORD1', reference_id: 'SQUARE_REF_1', tenders: [{ payment_id: 'PAY1' }] } }),
        'GET /v2/payments/PAY1': () => jsonResponse(payment),
      });

      const result = await createDriver().verify('PL1');

      expect(calls.map((call) => call.url)).toEqual([
        'https://connect.squareup.com/v2/online-checkout/payment-links/PL1',
        'https://connect.squareup.com/v2/orders/ORD1',
        'https://connect.squareup.com/v2/payments/PAY1',
      ]);
      expect(result.reference).toBe('SQUARE_REF_1');
      expect(result.status).toBe('success');
    });

    it('should fall back to an order search by reference', async () => {
      const { calls } = stubFetch({
        'GET /v2/online-checkout/payment-links/': () => jsonResponse({ errors: [{ code: 'NOT_FOUND' }] }, 404),
        'POST /v2/orders/search': () =>
          jsonResponse({
            orders: [
              { id: 'ORD0', reference_id: 'OTHER' },
              { id: 'ORD1', reference_id: 'SQUARE_REF_1' },
            ],
          }),
        'GET /v2/orders/ORD1': () =>
          jsonResponse({ order: { id: 'ORD1', reference_id: 'SQUARE_REF_1', tenders: [{ payment_id: 'PAY1' }] } }),
        'GET /v2/payments/PAY1': () => jsonResponse(payment),
      });

      const result = await createDriver().verify('SQUARE_REF_1');

      expect(result.reference).toBe('SQUARE_REF_1');
      expect(jsonBody(calls[1])).toEqual(expect.objectContaining({ location_ids: ['LOC1'] }));
    });

    it('should fail when no order carries the reference', async () => {
      stubFetch({
        'GET /v2/online-checkout/payment-links/': () => jsonResponse({}, 404),
        'POST /v2/orders/search': () => jsonResponse({ orders: [] }),
      });

      const verify = createDriver().verify('SQUARE_MISSING');

      await expect(verify).rejects.toThrow(VerificationError);
      await expect(verify).rejects.toThrow('Payment not found for reference [SQUARE_MISSING]');
    });

    it('should keep approved payments pending', async () => {
      stubFetch({
        'GET /v2/payments/payment_abc': () =>
          jsonResponse({ payment: { ...payment.payment, status: 'APPROVED' } }),
      });

      await expect(createDriver().verify('payment_abc')).resolves.toMatchObject({ status: 'pending' });
    });
  });

  describe('validateWebhook', () => {
    it('should accept an HMAC-SHA256 base64 signature', async () => {
      const webhook = SignedWebhookFactory.square();

      await expect(createDriver().validateWebhook(webhook.headers, Buffer.from(webhook.body))).resolves.toBe(true);
    });

    it('should reject a tampered signature', async () => {
      const webhook = SignedWebhookFactory.tampered(SignedWebhookFactory.square(), SQUARE_SIGNATURE_HEADER);

      await expect(createDriver().validateWebhook(webhook.headers, Buffer.from(webhook.body))).resolves.toBe(false);
    });

    it('should reject every delivery without a signature key', async () => {
      const webhook = SignedWebhookFactory.square();
      const driver = createDriver({ webhookSignatureKey: undefined });

      await expect(driver.validateWebhook(webhook.headers, Buffer.from(webhook.body))).resolves.toBe(false);
    });

    it('should extract webhook fields', () => {
      const { payload } = SignedWebhookFactory.square({ reference: 'SQUARE_R1', status: 'COMPLETED' });
      const driver = createDriver();

      expect(driver.extractWebhookReference(payload)).toBe('SQUARE_R1');
      expect(driver.extractWebhookStatus(payload)).toBe('COMPLETED');
      expect(driver.extractWebhookChannel(payload)).toBe('CARD');
    });
  });
});
