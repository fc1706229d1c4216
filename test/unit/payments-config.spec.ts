import { paymentsConfigFromEnv, resolvePayRouteConfig } from '../../src';

describe('paymentsConfigFromEnv', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = paymentsConfigFromEnv({});

    expect(config.defaultProvider).toBe('paystack');
    expect(config.fallbackProvider).toBeNull();
    expect(config.storage).toEqual({ type: 'memory' });
    expect(config.providers.paystack).toEqual({ enabled: true });
    expect(config.providers.flutterwave).toEqual({ enabled: false });
    expect(config.webhook).toEqual({
      path: undefined,
      toleranceSeconds: 300,
      requireTimestamp: false,
      maxAttempts: 3,
      backoffMs: 60_000,
    });
  });

  it('should read provider settings and flags', () => {
    const config = paymentsConfigFromEnv({
      PAYMENTS_FALLBACK_PROVIDER: 'flutterwave',
      PAYMENTS_STORAGE: 'typeorm',
      PAYSTACK_SECRET_KEY: 'test-secret',
      PAYSTACK_PREVIOUS_WEBHOOK_SECRETS: 'old-one, old-two,',
      PAYSTACK_CURRENCIES: 'NGN,USD',
      FLUTTERWAVE_ENABLED: 'yes',
      FLUTTERWAVE_SECRET_KEY: 'test-secret',
      PAYMENTS_WEBHOOK_REQUIRE_TIMESTAMP: 'TRUE',
    });

    expect(config.fallbackProvider).toBe('flutterwave');
    expect(config.storage).toEqual({ type: 'typeorm' });
    expect(config.providers.paystack).toEqual({
      enabled: true,
      secretKey: 'test-secret',
      previousWebhookSecrets: ['old-one', 'old-two'],
      currencies: ['NGN', 'USD'],
    });
    expect(config.providers.flutterwave).toEqual({ enabled: true, secretKey: 'test-secret' });
    expect(config.webhook?.requireTimestamp).toBe(true);
  });

  it('should read Stripe and NOWPayments credentials', () => {
    const config = paymentsConfigFromEnv({
      STRIPE_ENABLED: 'true',
      STRIPE_SECRET_KEY: 'test-key',
      STRIPE_WEBHOOK_SECRET: 'test-secret',
      NOWPAYMENTS_API_KEY: 'test-key',
      NOWPAYMENTS_IPN_SECRET: 'test-secret',
    });

    expect(config.providers.stripe).toEqual({ enabled: true, secretKey: 'test-key', webhookSecret: 'test-secret' });
    expect(config.providers.nowpayments).toEqual({ enabled: false, apiKey: 'test-key', ipnSecret: 'test-secret' });
  });

  it('should ignore numbers that do not parse', () => {
    const config = paymentsConfigFromEnv({
      PAYMENTS_WEBHOOK_TOLERANCE: 'soon',
      PAYMENTS_SESSION_TTL: '120',
    });

    expect(config.webhook?.toleranceSeconds).toBe(300);
    expect(config.sessionTtlSeconds).toBe(120);
  });
});

describe('resolvePayRouteConfig', () => {
  it('should apply every default', () => {
    const resolved = resolvePayRouteConfig({ defaultProvider: 'paystack', providers: {} });

    expect(resolved.fallbackProvider).toBeNull();
    expect(resolved.storage).toEqual({ type: 'memory' });
    expect(resolved.healthCheck).toEqual({ enabled: true, cacheTtlSeconds: 300 });
    expect(resolved.logging).toEqual({ enabled: true });
    expect(resolved.webhook).toEqual({ toleranceSeconds: 300, requireTimestamp: false });
    expect(resolved.webhookPath).toBe('payments/webhook');
    expect(resolved.healthPath).toBe('payments/health');
    expect(resolved.queue).toEqual({ maxAttempts: 3, backoffMs: 60_000 });
    expect(resolved.sessionTtlSeconds).toBe(3600);
    expect(resolved.events).toEqual({ enableLogging: false, logLevel: 'normal' });
  });

  it('should keep defaults for fields a partial section leaves out', () => {
    const resolved = resolvePayRouteConfig({
      defaultProvider: 'paystack',
      providers: {},
      healthCheck: { enabled: false },
      webhook: { path: 'hooks', maxAttempts: 5 },
    });

    expect(resolved.healthCheck).toEqual({ enabled: false, cacheTtlSeconds: 300 });
    expect(resolved.webhookPath).toBe('hooks');
    expect(resolved.queue).toEqual({ maxAttempts: 5, backoffMs: 60_000 });
    expect(resolved.webhook.toleranceSeconds).toBe(300);
  });
});
