import { Logger } from '@nestjs/common';
import { randomBytes } from 'crypto';
import {
  ChargeRequest,
  ConfigurationError,
  DriverContext,
  OMIT_CHANNELS,
  ProviderConfig,
  isWithinReplayWindow,
  parseWebhookTimestamp,
} from '../../../core';
import { HttpClient, HttpError } from './http-client';

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

export interface DriverToolkitOptions {
  /** Used when the provider config carries no baseUrl */
  defaultBaseUrl: string;
  /** Used when the provider config carries no currencies */
  defaultCurrencies: string[];
  /** Headers sent with every request (auth, API version) */
  defaultHeaders?: Record<string, string>;
  /** Settings that must be present; checked at construction */
  requiredSettings?: string[];
}

/**
 * Shared driver scaffolding, composed into every driver:
 * config validation, lazy HTTP client, reference generation,
 * cached health check, channel/status mapping and the replay guard.
 */
export class DriverToolkit {
  private readonly logger: Logger;
  private client?: HttpClient;

  constructor(
    readonly provider: string,
    readonly config: ProviderConfig,
    private readonly context: DriverContext,
    private readonly options: DriverToolkitOptions,
  ) {
    this.logger = new Logger(`${DriverToolkit.name}:${provider}`);

    for (const setting of options.requiredSettings ?? []) {
      this.requireSetting(setting);
    }
  }

  /**
   * Read a string setting or fail with a ConfigurationError naming it
   */
  requireSetting(setting: string): string {
    const value = this.optionalSetting(setting);
    if (value === undefined) {
      throw ConfigurationError.missingSetting(this.provider, setting);
    }
    return value;
  }

  optionalSetting(setting: string): string | undefined {
    const value = this.config[setting];
    if (typeof value === 'number') {
      return String(value);
    }
    return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
  }

  /**
   * String list setting (comma-separated strings accepted)
   */
  listSetting(setting: string): string[] {
    const value = this.config[setting];
    if (Array.isArray(value)) {
      return value.filter((item): item is string => typeof item === 'string' && item.length > 0);
    }
    if (typeof value === 'string') {
      return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
    }
    return [];
  }

  get http(): HttpClient {
    if (!this.client) {
      this.client = new HttpClient({
        baseUrl: this.config.baseUrl ?? this.options.defaultBaseUrl,
        timeoutMs: this.config.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
        headers: this.options.defaultHeaders,
      });
    }
    return this.client;
  }

  /**
   * Idempotency header for a charge call; the caller's key is forwarded as-is
   */
  idempotencyHeaders(request: ChargeRequest, header = 'Idempotency-Key'): Record<string, string> {
    return request.idempotencyKey ? { [header]: request.idempotencyKey } : {};
  }

  /**
   * `{PREFIX}_{unixSeconds}_{16 hex chars}`; a configured referencePrefix wins over the driver's own
   */
  generateReference(fallbackPrefix: string = this.provider.toUpperCase()): string {
    const prefix = this.config.referencePrefix ?? fallbackPrefix;
    const seconds = Math.floor(Date.now() / 1000);
    return `${prefix}_${seconds}_${randomBytes(8).toString('hex')}`;
  }

  appendQueryParam(url: string | undefined, key: string, value: string): string | undefined {
    if (!url) {
      return undefined;
    }
    const separator = url.includes('?') ? '&' : '?';
    return `${url}${separator}${encodeURIComponent(key)}=${encodeURIComponent(value)}`;
  }

  callbackUrl(request: ChargeRequest): string | undefined {
    return request.callbackUrl ?? this.config.callbackUrl;
  }

  /**
   * Provider channel list for the request, or null when the field should be left out
   */
  mapChannels(request: ChargeRequest): string[] | null {
    const mapped = this.context.channelMapper.mapChannels(request.channels, this.provider);
    return mapped === OMIT_CHANNELS ? null : mapped;
  }

  normalizeStatus(status: string): string {
    return this.context.statusNormalizer.normalize(status, this.provider);
  }

  getSupportedCurrencies(): string[] {
    const configured = this.config.currencies;
    const currencies = configured && configured.length > 0 ? configured : this.options.defaultCurrencies;
    return currencies.map((currency) => currency.toUpperCase());
  }

  isCurrencySupported(currency: string): boolean {
    return this.getSupportedCurrencies().includes(currency.toUpperCase());
  }

  /**
   * Run the check at most once per TTL window
   */
  async cachedHealthCheck(check: () => Promise<boolean>): Promise<boolean> {
    return this.context.healthCache.getOrCompute(
      `payments.health.${this.provider}`,
      this.context.healthCheckTtlSeconds,
      check,
    );
  }

  /**
   * Any HTTP answer below 500 means the API is reachable
   */
  async isReachable(request: () => Promise<unknown>): Promise<boolean> {
    try {
      await request();
      return true;
    } catch (error) {
      if (error instanceof HttpError && !error.isServerError) {
        return true;
      }
      this.logger.warn(`Health check failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  /**
   * Replay window check applied after a signature has been accepted
   */
  passesReplayGuard(issuedAt: unknown): boolean {
    const { toleranceSeconds, requireTimestamp } = this.context.webhook;
    const timestamp = parseWebhookTimestamp(issuedAt);

    if (!timestamp) {
      if (requireTimestamp) {
        this.logger.warn('Webhook rejected: no usable timestamp');
        return false;
      }
      this.logger.debug('Webhook carries no timestamp; replay window not applied');
      return true;
    }

    if (!isWithinReplayWindow(timestamp, toleranceSeconds)) {
      this.logger.warn(
        `Webhook rejected: timestamp ${timestamp.toISOString()} outside ${toleranceSeconds}s window`,
      );
      return false;
    }

    return true;
  }
}
