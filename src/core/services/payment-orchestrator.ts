import { Logger as NestLogger } from '@nestjs/common';
import { PaymentStatus } from '../domain/enums';
import {
  ChargeRequest,
  ChargeRequestInput,
  ChargeResponse,
  PaymentSession,
  VerificationContext,
  VerificationResponse,
} from '../domain/models';
import {
  CurrencyError,
  DriverNotFoundError,
  ProviderAggregateError,
  errorMessage,
} from '../errors';
import {
  DriverContext,
  KeyValueCache,
  Logger,
  PaymentDriver,
  PaymentTransaction,
  PaymentsConfig,
  TransactionStore,
} from '../interfaces';
import {
  ChannelMapper,
  DriverFactory,
  ProviderDetector,
  StatusNormalizer,
} from '../registry';

export const SESSION_CACHE_PREFIX = 'payments.session.';
export const PROVIDER_UNAVAILABLE_MESSAGE = 'Provider is currently unavailable';

export interface PaymentOrchestratorDeps {
  config: PaymentsConfig;
  factory: DriverFactory;
  store: TransactionStore;
  sessionCache: KeyValueCache<PaymentSession>;
  healthCache: KeyValueCache<boolean>;
  detector?: ProviderDetector;
  statusNormalizer?: StatusNormalizer;
  channelMapper?: ChannelMapper;
  logger?: Logger;
}

export type ProviderHealth =
  | { healthy: boolean; currencies: string[] }
  | { healthy: false; error: string };

/**
 * Payment Orchestrator
 *
 * Single entry point for charging and verifying across providers.
 * Charges walk a fallback chain; verification resolves which provider
 * (and which provider-side id) to ask, from the session cache, the
 * transaction store, or the reference prefix.
 */
export class PaymentOrchestrator {
  readonly statusNormalizer: StatusNormalizer;
  readonly channelMapper: ChannelMapper;
  readonly detector: ProviderDetector;

  private readonly config: PaymentsConfig;
  private readonly factory: DriverFactory;
  private readonly store: TransactionStore;
  private readonly sessionCache: KeyValueCache<PaymentSession>;
  private readonly driverContext: DriverContext;
  private readonly logger: Logger;
  private readonly drivers = new Map<string, PaymentDriver>();

  constructor(deps: PaymentOrchestratorDeps) {
    this.config = deps.config;
    this.factory = deps.factory;
    this.store = deps.store;
    this.sessionCache = deps.sessionCache;
    this.statusNormalizer = deps.statusNormalizer ?? new StatusNormalizer();
    this.channelMapper = deps.channelMapper ?? new ChannelMapper();
    this.detector = deps.detector ?? new ProviderDetector();
    this.logger = deps.logger ?? new NestLogger(PaymentOrchestrator.name);

    this.driverContext = {
      statusNormalizer: this.statusNormalizer,
      channelMapper: this.channelMapper,
      healthCache: deps.healthCache,
      healthCheckTtlSeconds: this.config.healthCheck.cacheTtlSeconds,
      webhook: this.config.webhook,
    };

    for (const [name, providerConfig] of Object.entries(this.config.providers)) {
      this.detector.registerPrefix(providerConfig.referencePrefix ?? name.toUpperCase(), name);
    }
  }

  /**
   * Driver for a configured, enabled provider; built once and reused
   */
  driver(name?: string): PaymentDriver {
    const provider = name ?? this.config.defaultProvider;

    const cached = this.drivers.get(provider);
    if (cached) {
      return cached;
    }

    const providerConfig = this.config.providers[provider];
    if (!providerConfig) {
      throw new DriverNotFoundError(provider, 'is not configured');
    }
    if (providerConfig.enabled === false) {
      throw new DriverNotFoundError(provider, 'is disabled');
    }

    const driver = this.factory.create(provider, providerConfig, this.driverContext);
    this.drivers.set(provider, driver);
    return driver;
  }

  /**
   * Charge through the first provider that accepts the request.
   * Throws ProviderAggregateError listing each provider's failure when none does.
   */
  async charge(
    input: ChargeRequest | ChargeRequestInput,
    providers?: string[],
  ): Promise<ChargeResponse> {
    const request = input instanceof ChargeRequest ? input : ChargeRequest.create(input);
    const chain = dedupe(providers && providers.length > 0 ? providers : this.getFallbackChain());
    const errors: Record<string, string> = {};

    for (const provider of chain) {
      let driver: PaymentDriver;
      try {
        driver = this.driver(provider);
      } catch (error) {
        errors[provider] = errorMessage(error);
        this.logger.warn(`Skipping ${provider}: ${errors[provider]}`);
        continue;
      }

      try {
        if (this.config.healthCheck.enabled && !(await driver.getCachedHealthCheck())) {
          errors[provider] = PROVIDER_UNAVAILABLE_MESSAGE;
          this.logger.warn(`Skipping ${provider}: ${PROVIDER_UNAVAILABLE_MESSAGE}`);
          continue;
        }

        if (!driver.isCurrencySupported(request.currency)) {
          errors[provider] = new CurrencyError(request.currency, provider).message;
          this.logger.warn(`Skipping ${provider}: ${errors[provider]}`);
          continue;
        }

        const response = await driver.charge(request);
        this.logger.log(`Charge succeeded with ${provider}: ${response.reference}`);

        await this.recordCharge(request, response);
        await this.rememberSession(response);

        return response;
      } catch (error) {
        errors[provider] = errorMessage(error);
        this.logger.error(`Charge failed with ${provider}: ${errors[provider]}`);
      }
    }

    throw new ProviderAggregateError('All payment providers failed', errors);
  }

  /**
   * Re-check a reference with its provider and record the outcome.
   * With an explicit provider only that provider is asked.
   */
  async verify(reference: string, provider?: string): Promise<VerificationResponse> {
    let context: VerificationContext | null;
    let candidates: string[];

    if (provider) {
      this.driver(provider);
      context = {
        provider,
        providerId: await this.lookupProviderId(reference, provider),
        source: 'explicit',
      };
      candidates = [provider];
    } else {
      context = await this.resolveVerificationContext(reference);
      const enabled = this.getEnabledProviders();
      candidates = context
        ? [context.provider, ...enabled.filter((name) => name !== context?.provider)]
        : enabled;
    }

    if (context) {
      this.logger.debug(`Verifying ${reference} via ${context.provider} (${context.source})`);
    } else {
      this.logger.debug(`No context for ${reference}; trying every enabled provider`);
    }

    const errors: Record<string, string> = {};

    for (const candidate of candidates) {
      try {
        const driver = this.driver(candidate);
        const providerId = context && context.provider === candidate ? context.providerId : null;
        const result = await driver.verify(driver.resolveVerificationId(reference, providerId));

        await this.recordVerification(reference, result);
        return result;
      } catch (error) {
        errors[candidate] = errorMessage(error);
        this.logger.warn(`Verification of ${reference} failed with ${candidate}: ${errors[candidate]}`);
      }
    }

    throw new ProviderAggregateError(`Unable to verify payment reference: ${reference}`, errors);
  }

  /**
   * Cache first, then the store, then the reference prefix
   */
  async resolveVerificationContext(reference: string): Promise<VerificationContext | null> {
    const session = await this.readSession(reference);
    if (session && this.isEnabled(session.provider)) {
      return { provider: session.provider, providerId: session.providerId, source: 'cache' };
    }

    const transaction = await this.readTransaction(reference);
    if (transaction && this.isEnabled(transaction.provider)) {
      return { provider: transaction.provider, providerId: transaction.providerId, source: 'store' };
    }

    const detected = this.detector.detectFromReference(reference);
    if (detected && this.isEnabled(detected)) {
      return { provider: detected, providerId: null, source: 'heuristic' };
    }

    return null;
  }

  getDefaultDriver(): string {
    return this.config.defaultProvider;
  }

  /**
   * `[default, fallback]` without duplicates; fallback left out when unset
   */
  getFallbackChain(): string[] {
    const chain = [this.config.defaultProvider];
    if (this.config.fallbackProvider) {
      chain.push(this.config.fallbackProvider);
    }
    return dedupe(chain);
  }

  /**
   * Enabled providers in configuration order
   */
  getEnabledProviders(): string[] {
    return Object.entries(this.config.providers)
      .filter(([, providerConfig]) => providerConfig.enabled !== false)
      .map(([name]) => name);
  }

  isEnabled(provider: string): boolean {
    const providerConfig = this.config.providers[provider];
    return providerConfig !== undefined && providerConfig.enabled !== false;
  }

  /**
   * Cached health of every enabled provider
   */
  async checkHealth(): Promise<Record<string, ProviderHealth>> {
    const report: Record<string, ProviderHealth> = {};

    for (const provider of this.getEnabledProviders()) {
      try {
        const driver = this.driver(provider);
        report[provider] = {
          healthy: await driver.getCachedHealthCheck(),
          currencies: driver.getSupportedCurrencies(),
        };
      } catch (error) {
        report[provider] = { healthy: false, error: errorMessage(error) };
      }
    }

    return report;
  }

  private async recordCharge(request: ChargeRequest, response: ChargeResponse): Promise<void> {
    if (!this.config.logging.enabled) {
      return;
    }

    try {
      await this.store.create({
        reference: response.reference,
        provider: response.provider,
        providerId: response.accessCode || null,
        status: this.statusNormalizer.normalize(response.status, response.provider),
        amount: request.amount,
        currency: request.currency,
        email: request.email,
        channel: null,
        paidAt: null,
        metadata: request.metadata,
        customer: request.customer ?? null,
      });
    } catch (error) {
      this.logger.error(`Failed to record transaction ${response.reference}: ${errorMessage(error)}`);
    }
  }

  private async rememberSession(response: ChargeResponse): Promise<void> {
    try {
      await this.sessionCache.put(
        `${SESSION_CACHE_PREFIX}${response.reference}`,
        { provider: response.provider, providerId: response.accessCode || null },
        this.config.sessionTtlSeconds,
      );
    } catch (error) {
      this.logger.error(`Failed to cache session ${response.reference}: ${errorMessage(error)}`);
    }
  }

  private async recordVerification(reference: string, result: VerificationResponse): Promise<void> {
    if (!this.config.logging.enabled) {
      return;
    }

    const success = result.status === PaymentStatus.SUCCESS;
    try {
      await this.store.update(reference, {
        status: result.status,
        ...(result.channel ? { channel: result.channel } : {}),
        paidAt: success ? result.paidAt ?? new Date().toISOString() : null,
      });
    } catch (error) {
      this.logger.error(`Failed to record verification of ${reference}: ${errorMessage(error)}`);
    }
  }

  private async lookupProviderId(reference: string, provider: string): Promise<string | null> {
    const session = await this.readSession(reference);
    if (session && session.provider === provider) {
      return session.providerId;
    }

    const transaction = await this.readTransaction(reference);
    if (transaction && transaction.provider === provider) {
      return transaction.providerId;
    }

    return null;
  }

  private async readSession(reference: string): Promise<PaymentSession | undefined> {
    try {
      return await this.sessionCache.get(`${SESSION_CACHE_PREFIX}${reference}`);
    } catch (error) {
      this.logger.warn(`Session cache read failed for ${reference}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async readTransaction(reference: string): Promise<PaymentTransaction | null> {
    if (!this.config.logging.enabled) {
      return null;
    }

    try {
      return await this.store.findByReference(reference);
    } catch (error) {
      this.logger.warn(`Store lookup failed for ${reference}: ${errorMessage(error)}`);
      return null;
    }
  }
}

function dedupe(providers: string[]): string[] {
  return [...new Set(providers)];
}
