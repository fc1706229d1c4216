import type { ChannelMapper } from '../registry/channel-mapper';
import type { StatusNormalizer } from '../registry/status-normalizer';
import { KeyValueCache } from './key-value-cache.interface';
import { PaymentDriver } from './payment-driver.interface';

/**
 * Per-provider configuration map.
 * Drivers read their own credentials (secretKey, clientId, ...) from it
 * and fail fast when a required one is missing.
 */
export interface ProviderConfig {
  /** Implementation name, resolved through the driver factory catalogue */
  driver?: string;
  enabled?: boolean;
  baseUrl?: string;
  timeoutMs?: number;
  currencies?: string[];
  callbackUrl?: string;
  /** Reference prefix for detection; defaults to the upper-cased provider name */
  referencePrefix?: string;
  [setting: string]: unknown;
}

export interface WebhookSecurityOptions {
  /** Accepted clock distance between payload timestamp and now */
  toleranceSeconds: number;
  /** Reject deliveries whose payload carries no usable timestamp */
  requireTimestamp: boolean;
}

/**
 * Shared collaborators handed to every driver at construction
 */
export interface DriverContext {
  statusNormalizer: StatusNormalizer;
  channelMapper: ChannelMapper;
  healthCache: KeyValueCache<boolean>;
  healthCheckTtlSeconds: number;
  webhook: WebhookSecurityOptions;
}

export type DriverConstructor = new (
  name: string,
  config: ProviderConfig,
  context: DriverContext,
) => PaymentDriver;
