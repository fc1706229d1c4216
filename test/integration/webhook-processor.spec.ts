import {
  DriverFactory,
  DriverNotFoundError,
  EventDispatcherImpl,
  IGNORED_WEBHOOK_STATUS,
  InMemoryKeyValueCache,
  MockTransactionStore,
  PaymentEventType,
  PaymentOrchestrator,
  MollieDriver,
  PayPalDriver,
  PaymentSession,
  ProviderConfig,
  VerificationError,
  WebhookJob,
  WebhookProcessor,
  WebhookReceivedEvent,
} from '../../src';
import { createFakeDriver, createSilentLogger, jsonResponse, stubFetch } from '../helpers';

interface SetupOptions {
  persistTransactions?: boolean;
  store?: MockTransactionStore;
  providers?: Record<string, ProviderConfig>;
  factory?: DriverFactory;
}

function setup(options: SetupOptions = {}) {
  const store = options.store ?? new MockTransactionStore({ simulateLatency: true, latencyMs: 5 });
  const orchestrator = new PaymentOrchestrator({
    config: {
      defaultProvider: 'alpha',
      fallbackProvider: null,
      providers: options.providers ?? { alpha: {} },
      healthCheck: { enabled: true, cacheTtlSeconds: 300 },
      logging: { enabled: true },
      webhook: { toleranceSeconds: 300, requireTimestamp: false },
      sessionTtlSeconds: 3600,
    },
    factory: options.factory ?? new DriverFactory().register('alpha', createFakeDriver()),
    store,
    sessionCache: new InMemoryKeyValueCache<PaymentSession>(),
    healthCache: new InMemoryKeyValueCache<boolean>(),
    logger: createSilentLogger(),
  });

  const dispatcher = new EventDispatcherImpl();
  const events: unknown[] = [];
  dispatcher.on(PaymentEventType.WEBHOOK_RECEIVED, (_type, payload) => {
    events.push(payload);
  });

  const processor = new WebhookProcessor(
    orchestrator,
    store,
    dispatcher,
    { persistTransactions: options.persistTransactions ?? true },
    createSilentLogger(),
  );

  return { processor, store, events };
}

function job(payload: Record<string, unknown>, provider = 'alpha'): WebhookJob {
  return { provider, payload, receivedAt: new Date(), attempt: 1 };
}

async function seed(store: MockTransactionStore, reference: string, paidAt: string | null = null) {
  await store.create({
    reference,
    provider: 'alpha',
    providerId: null,
    status: 'pending',
    amount: 100,
    currency: 'NGN',
    email: 'payer@example.com',
    channel: null,
    paidAt,
    metadata: {},
    customer: null,
  });
}

describe('WebhookProcessor', () => {
  it('should apply the normalized status and announce it', async () => {
    const { processor, store, events } = setup();
    await seed(store, 'ALPHA_1');
    const payload = { reference: 'ALPHA_1', status: 'SUCCESSFUL', channel: 'card' };

    const result = await processor.handle(job(payload));

    expect(result).toEqual({ reference: 'ALPHA_1', status: 'success', dispatched: true });
    const stored = await store.findByReference('ALPHA_1');
    expect(stored).toMatchObject({ status: 'success', channel: 'card' });
    expect(typeof stored?.paidAt).toBe('string');
    const expected: WebhookReceivedEvent = {
      provider: 'alpha',
      reference: 'ALPHA_1',
      status: 'success',
      channel: 'card',
      payload,
    };
    expect(events).toEqual([expected]);
  });

  it('should apply concurrent duplicate deliveries once', async () => {
    const { processor, store, events } = setup();
    await seed(store, 'ALPHA_1');
    const delivery = job({ reference: 'ALPHA_1', status: 'success', channel: 'card' });

    const results = await Promise.all(Array.from({ length: 5 }, () => processor.handle(delivery)));

    expect(results.filter((result) => result.dispatched)).toHaveLength(1);
    expect(events).toHaveLength(1);
    await expect(store.findByReference('ALPHA_1')).resolves.toMatchObject({ status: 'success' });
  });

  it('should apply a later state change', async () => {
    const { processor, store, events } = setup();
    await seed(store, 'ALPHA_1');

    await processor.handle(job({ reference: 'ALPHA_1', status: 'pending' }));
    await processor.handle(job({ reference: 'ALPHA_1', status: 'declined' }));

    expect(events).toEqual([expect.objectContaining({ status: 'failed' })]);
    await expect(store.findByReference('ALPHA_1')).resolves.toMatchObject({ status: 'failed', paidAt: null });
  });

  it('should keep an existing paidAt', async () => {
    const { processor, store } = setup();
    await seed(store, 'ALPHA_1', '2026-01-01T00:00:00.000Z');

    await processor.handle(job({ reference: 'ALPHA_1', status: 'success' }));

    await expect(store.findByReference('ALPHA_1')).resolves.toMatchObject({
      status: 'success',
      paidAt: '2026-01-01T00:00:00.000Z',
    });
  });

  it('should still announce deliveries for untracked references', async () => {
    const { processor, store, events } = setup();

    const result = await processor.handle(job({ reference: 'ALPHA_404', status: 'success' }));

    expect(result.dispatched).toBe(true);
    expect(events[0]).toMatchObject({ reference: 'ALPHA_404', status: 'success', channel: null });
    expect(store.size).toBe(0);
  });

  it('should announce deliveries without a reference', async () => {
    const { processor, events } = setup();

    await expect(processor.handle(job({ status: 'failed' }))).resolves.toEqual({
      reference: null,
      status: 'failed',
      dispatched: true,
    });
    expect(events).toHaveLength(1);
  });

  it('should leave the store alone when persistence is off', async () => {
    const { processor, store, events } = setup({ persistTransactions: false });
    await seed(store, 'ALPHA_1');

    await processor.handle(job({ reference: 'ALPHA_1', status: 'success' }));

    await expect(store.findByReference('ALPHA_1')).resolves.toMatchObject({ status: 'pending' });
    expect(events).toHaveLength(1);
  });

  it('should reject deliveries for unknown providers', async () => {
    const { processor } = setup();

    await expect(processor.handle(job({ reference: 'X' }, 'zeta'))).rejects.toThrow(DriverNotFoundError);
  });

  it('should propagate store failures without announcing', async () => {
    const { processor, events } = setup({ store: new MockTransactionStore({ throwOnError: true }) });

    await expect(processor.handle(job({ reference: 'ALPHA_1', status: 'success' }))).rejects.toThrow(
      'Mock store failure: updateWithLock',
    );
    expect(events).toHaveLength(0);
  });
});

describe('WebhookProcessor with provider drivers', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('PayPal', () => {
    const paypal = () =>
      setup({
        providers: { paypal: { clientId: 'test-client', clientSecret: 'test-secret' } },
        factory: new DriverFactory().register('paypal', PayPalDriver),
      });

    it('should store a canonical status for an approved order', async () => {
      const { processor, store } = paypal();
      await seed(store, 'PAYPAL_1');

      const result = await processor.handle(
        job(
          {
            event_type: 'CHECKOUT.ORDER.APPROVED',
            resource: { id: 'ORDER-1', status: 'APPROVED', purchase_units: [{ reference_id: 'PAYPAL_1' }] },
          },
          'paypal',
        ),
      );

      expect(result).toEqual({ reference: 'PAYPAL_1', status: 'pending', dispatched: true });
      await expect(store.findByReference('PAYPAL_1')).resolves.toMatchObject({
        status: 'pending',
        channel: 'paypal',
      });
    });

    it('should map capture events that carry no resource status', async () => {
      const { processor, store } = paypal();
      await seed(store, 'PAYPAL_1');

      const result = await processor.handle(
        job({ event_type: 'PAYMENT.CAPTURE.DENIED', resource: { custom_id: 'PAYPAL_1' } }, 'paypal'),
      );

      expect(result).toEqual({ reference: 'PAYPAL_1', status: 'failed', dispatched: true });
      await expect(store.findByReference('PAYPAL_1')).resolves.toMatchObject({ status: 'failed' });
    });
  });

  describe('Mollie without a signing secret', () => {
    const mollie = () =>
      setup({
        providers: { mollie: { apiKey: 'test-key' } },
        factory: new DriverFactory().register('mollie', MollieDriver),
      });

    it('should never apply a ping event', async () => {
      const { calls } = stubFetch({});
      const { processor, store, events } = mollie();
      await seed(store, 'MOLLIE_1');

      const result = await processor.handle(
        job(
          { id: 'tr_any', type: 'hook.ping', status: 'paid', metadata: { reference: 'MOLLIE_1' } },
          'mollie',
        ),
      );

      expect(result).toEqual({ reference: null, status: IGNORED_WEBHOOK_STATUS, dispatched: false });
      await expect(store.findByReference('MOLLIE_1')).resolves.toMatchObject({ status: 'pending', paidAt: null });
      expect(events).toHaveLength(0);
      expect(calls).toHaveLength(0);
    });

    it('should take reference and status from the fetched payment, not the body', async () => {
      stubFetch({
        'GET /v2/payments/tr_1': () =>
          jsonResponse({ id: 'tr_1', status: 'open', method: 'ideal', metadata: { reference: 'MOLLIE_2' } }),
      });
      const { processor, store } = mollie();
      await seed(store, 'MOLLIE_1');
      await seed(store, 'MOLLIE_2');

      const result = await processor.handle(
        job({ id: 'tr_1', status: 'paid', metadata: { reference: 'MOLLIE_1' } }, 'mollie'),
      );

      expect(result).toEqual({ reference: 'MOLLIE_2', status: 'pending', dispatched: true });
      await expect(store.findByReference('MOLLIE_1')).resolves.toMatchObject({
        status: 'pending',
        channel: null,
        paidAt: null,
      });
      await expect(store.findByReference('MOLLIE_2')).resolves.toMatchObject({
        status: 'pending',
        channel: 'ideal',
      });
    });

    it('should fail the job when the payment cannot be fetched', async () => {
      stubFetch({ 'GET /v2/payments/tr_gone': () => jsonResponse({ title: 'Not Found' }, 404) });
      const { processor, store, events } = mollie();
      await seed(store, 'MOLLIE_1');

      await expect(
        processor.handle(job({ id: 'tr_gone', status: 'paid', metadata: { reference: 'MOLLIE_1' } }, 'mollie')),
      ).rejects.toThrow(VerificationError);
      await expect(store.findByReference('MOLLIE_1')).resolves.toMatchObject({ status: 'pending' });
      expect(events).toHaveLength(0);
    });
  });
});
