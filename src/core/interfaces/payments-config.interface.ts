import { ProviderConfig, WebhookSecurityOptions } from './driver-config.interface';

export interface HealthCheckOptions {
  /** Skip providers whose cached health check reports them down */
  enabled: boolean;
  cacheTtlSeconds: number;
}

/**
 * Settings the orchestrator and the webhook processor run on
 */
export interface PaymentsConfig {
  defaultProvider: string;
  fallbackProvider: string | null;
  /** Keyed by provider name; iteration order is the verify fallback order */
  providers: Record<string, ProviderConfig>;
  healthCheck: HealthCheckOptions;
  /** Persist transactions through the TransactionStore */
  logging: { enabled: boolean };
  webhook: WebhookSecurityOptions;
  /** Lifetime of the reference → provider session cached at charge time */
  sessionTtlSeconds: number;
}
