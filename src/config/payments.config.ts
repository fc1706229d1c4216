import { registerAs } from '@nestjs/config';
import type { PayRouteModuleConfig } from '../modules/payroute/payroute.config';
import type { ProviderConfig } from '../core';

type Env = Record<string, string | undefined>;

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function integer(value: string | undefined, fallback: number): number {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function list(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Drop unset settings so drivers report missing credentials by name
 */
function settings(values: Record<string, string | string[] | boolean | undefined>): ProviderConfig {
  const config: ProviderConfig = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== '') {
      config[key] = value;
    }
  }
  return config;
}

/**
 * Provider settings read from the environment
 */
export function providersFromEnv(env: Env): Record<string, ProviderConfig> {
  return {
    paystack: settings({
      enabled: flag(env.PAYSTACK_ENABLED, true),
      secretKey: env.PAYSTACK_SECRET_KEY,
      publicKey: env.PAYSTACK_PUBLIC_KEY,
      webhookSecret: env.PAYSTACK_WEBHOOK_SECRET,
      previousWebhookSecrets: list(env.PAYSTACK_PREVIOUS_WEBHOOK_SECRETS),
      baseUrl: env.PAYSTACK_BASE_URL,
      callbackUrl: env.PAYSTACK_CALLBACK_URL,
      currencies: list(env.PAYSTACK_CURRENCIES),
    }),
    flutterwave: settings({
      enabled: flag(env.FLUTTERWAVE_ENABLED, false),
      secretKey: env.FLUTTERWAVE_SECRET_KEY,
      publicKey: env.FLUTTERWAVE_PUBLIC_KEY,
      webhookSecret: env.FLUTTERWAVE_WEBHOOK_SECRET,
      baseUrl: env.FLUTTERWAVE_BASE_URL,
      callbackUrl: env.FLUTTERWAVE_CALLBACK_URL,
      currencies: list(env.FLUTTERWAVE_CURRENCIES),
    }),
    monnify: settings({
      enabled: flag(env.MONNIFY_ENABLED, false),
      apiKey: env.MONNIFY_API_KEY,
      secretKey: env.MONNIFY_SECRET_KEY,
      contractCode: env.MONNIFY_CONTRACT_CODE,
      baseUrl: env.MONNIFY_BASE_URL,
      callbackUrl: env.MONNIFY_CALLBACK_URL,
    }),
    square: settings({
      enabled: flag(env.SQUARE_ENABLED, false),
      accessToken: env.SQUARE_ACCESS_TOKEN,
      locationId: env.SQUARE_LOCATION_ID,
      webhookSignatureKey: env.SQUARE_WEBHOOK_SIGNATURE_KEY,
      baseUrl: env.SQUARE_BASE_URL,
      callbackUrl: env.SQUARE_CALLBACK_URL,
    }),
    paypal: settings({
      enabled: flag(env.PAYPAL_ENABLED, false),
      clientId: env.PAYPAL_CLIENT_ID,
      clientSecret: env.PAYPAL_CLIENT_SECRET,
      webhookId: env.PAYPAL_WEBHOOK_ID,
      webhookVerification: env.PAYPAL_WEBHOOK_VERIFICATION,
      baseUrl: env.PAYPAL_BASE_URL,
      callbackUrl: env.PAYPAL_CALLBACK_URL,
    }),
    mollie: settings({
      enabled: flag(env.MOLLIE_ENABLED, false),
      apiKey: env.MOLLIE_API_KEY,
      webhookSecret: env.MOLLIE_WEBHOOK_SECRET,
      baseUrl: env.MOLLIE_BASE_URL,
      callbackUrl: env.MOLLIE_CALLBACK_URL,
    }),
    stripe: settings({
      enabled: flag(env.STRIPE_ENABLED, false),
      secretKey: env.STRIPE_SECRET_KEY,
      publicKey: env.STRIPE_PUBLIC_KEY,
      webhookSecret: env.STRIPE_WEBHOOK_SECRET,
      baseUrl: env.STRIPE_BASE_URL,
      callbackUrl: env.STRIPE_CALLBACK_URL,
      currencies: list(env.STRIPE_CURRENCIES),
    }),
    nowpayments: settings({
      enabled: flag(env.NOWPAYMENTS_ENABLED, false),
      apiKey: env.NOWPAYMENTS_API_KEY,
      ipnSecret: env.NOWPAYMENTS_IPN_SECRET,
      ipnCallbackUrl: env.NOWPAYMENTS_IPN_CALLBACK_URL,
      baseUrl: env.NOWPAYMENTS_BASE_URL,
      callbackUrl: env.NOWPAYMENTS_CALLBACK_URL,
    }),
  };
}

/**
 * Module configuration from the environment
 */
export function paymentsConfigFromEnv(env: Env = process.env): PayRouteModuleConfig {
  return {
    defaultProvider: env.PAYMENTS_DEFAULT_PROVIDER || 'paystack',
    fallbackProvider: env.PAYMENTS_FALLBACK_PROVIDER || null,
    providers: providersFromEnv(env),
    storage: env.PAYMENTS_STORAGE === 'typeorm' ? { type: 'typeorm' } : { type: 'memory' },
    healthCheck: {
      enabled: flag(env.PAYMENTS_HEALTH_CHECK_ENABLED, true),
      cacheTtlSeconds: integer(env.PAYMENTS_HEALTH_CHECK_CACHE_TTL, 300),
      path: env.PAYMENTS_HEALTH_PATH || undefined,
    },
    logging: {
      enabled: flag(env.PAYMENTS_LOGGING_ENABLED, true),
    },
    webhook: {
      path: env.PAYMENTS_WEBHOOK_PATH || undefined,
      toleranceSeconds: integer(env.PAYMENTS_WEBHOOK_TOLERANCE, 300),
      requireTimestamp: flag(env.PAYMENTS_WEBHOOK_REQUIRE_TIMESTAMP, false),
      maxAttempts: integer(env.PAYMENTS_WEBHOOK_MAX_ATTEMPTS, 3),
      backoffMs: integer(env.PAYMENTS_WEBHOOK_BACKOFF_MS, 60_000),
    },
    sessionTtlSeconds: integer(env.PAYMENTS_SESSION_TTL, 3600),
    events: {
      enableLogging: flag(env.PAYMENTS_EVENT_LOGGING, false),
    },
  };
}

export const PAYMENTS_CONFIG_KEY = 'payments';

export default registerAs(PAYMENTS_CONFIG_KEY, () => paymentsConfigFromEnv());
