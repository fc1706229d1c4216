/**
 * Base class for every error raised by the payment core
 */
export class PaymentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details: Record<string, unknown> = {},
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PaymentError';
  }
}

/**
 * Driver or module configuration is missing a required setting.
 * Raised synchronously at construction, never retried.
 */
export class ConfigurationError extends PaymentError {
  constructor(
    message: string,
    public readonly setting?: string,
    public readonly provider?: string,
  ) {
    super(message, 'CONFIGURATION_ERROR', { setting, provider });
    this.name = 'ConfigurationError';
  }

  static missingSetting(provider: string, setting: string): ConfigurationError {
    return new ConfigurationError(
      `${provider} configuration is missing required setting "${setting}"`,
      setting,
      provider,
    );
  }
}

/**
 * A charge request failed validation at construction
 */
export class InvalidChargeRequestError extends PaymentError {
  constructor(public readonly violations: string[]) {
    super(`Invalid charge request: ${violations.join('; ')}`, 'INVALID_CHARGE_REQUEST', {
      violations,
    });
    this.name = 'InvalidChargeRequestError';
  }
}

/**
 * A single provider failed to initialize a charge
 */
export class ChargeError extends PaymentError {
  constructor(message: string, public readonly provider?: string, cause?: unknown) {
    super(message, 'CHARGE_FAILED', { provider }, cause);
    this.name = 'ChargeError';
  }
}

/**
 * A single provider failed to verify a payment
 */
export class VerificationError extends PaymentError {
  constructor(message: string, public readonly provider?: string, cause?: unknown) {
    super(message, 'VERIFICATION_FAILED', { provider }, cause);
    this.name = 'VerificationError';
  }
}

/**
 * The request currency is not accepted by a provider
 */
export class CurrencyError extends PaymentError {
  constructor(
    public readonly currency: string,
    public readonly provider: string,
  ) {
    super(
      `Currency ${currency} is not supported by ${provider}`,
      'CURRENCY_NOT_SUPPORTED',
      { currency, provider },
    );
    this.name = 'CurrencyError';
  }
}

/**
 * Webhook signature or timestamp rejected; the delivery must not be enqueued
 */
export class WebhookAuthError extends PaymentError {
  constructor(message: string, public readonly provider: string) {
    super(message, 'WEBHOOK_AUTH_FAILED', { provider });
    this.name = 'WebhookAuthError';
  }
}

/**
 * Every candidate provider failed. Carries each provider's message in attempt order.
 */
export class ProviderAggregateError extends PaymentError {
  constructor(
    message: string,
    public readonly errors: Record<string, string>,
  ) {
    super(message, 'ALL_PROVIDERS_FAILED', { errors });
    this.name = 'ProviderAggregateError';
  }

  /**
   * Providers attempted, in order
   */
  get providers(): string[] {
    return Object.keys(this.errors);
  }
}

/**
 * Unknown or disabled provider requested explicitly
 */
export class DriverNotFoundError extends PaymentError {
  constructor(
    public readonly provider: string,
    reason = 'not configured',
  ) {
    super(`Payment driver [${provider}] ${reason}`, 'DRIVER_NOT_FOUND', { provider });
    this.name = 'DriverNotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
