import { Injectable, Inject } from '@nestjs/common';
import type { ProviderConfig, WebhookSecurityOptions } from '../../../core';
import type { ResolvedPayRouteConfig } from '../payroute.config';
import { PAYROUTE_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Typed read access to the resolved module configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(PAYROUTE_CONFIG)
    private readonly config: ResolvedPayRouteConfig,
  ) {}

  getConfig(): ResolvedPayRouteConfig {
    return this.config;
  }

  getDefaultProvider(): string {
    return this.config.defaultProvider;
  }

  getFallbackProvider(): string | null {
    return this.config.fallbackProvider;
  }

  /**
   * Provider settings, undefined for an unknown provider
   */
  getProviderConfig(providerName: string): ProviderConfig | undefined {
    return this.config.providers[providerName];
  }

  isProviderEnabled(providerName: string): boolean {
    const provider = this.getProviderConfig(providerName);
    return provider !== undefined && provider.enabled !== false;
  }

  getWebhookSecurity(): WebhookSecurityOptions {
    return this.config.webhook;
  }

  getWebhookPath(): string {
    return this.config.webhookPath;
  }

  getHealthPath(): string {
    return this.config.healthPath;
  }

  isHealthCheckEnabled(): boolean {
    return this.config.healthCheck.enabled;
  }

  getHealthCheckTtl(): number {
    return this.config.healthCheck.cacheTtlSeconds;
  }

  /**
   * Whether charges and verifications are persisted
   */
  isTransactionLoggingEnabled(): boolean {
    return this.config.logging.enabled;
  }

  getStorageType(): ResolvedPayRouteConfig['storage']['type'] {
    return this.config.storage.type;
  }
}
