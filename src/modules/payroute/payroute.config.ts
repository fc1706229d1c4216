import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { DataSource, DataSourceOptions } from 'typeorm';
import {
  DEFAULT_REPLAY_TOLERANCE_SECONDS,
  DEFAULT_WEBHOOK_BACKOFF_MS,
  DEFAULT_WEBHOOK_MAX_ATTEMPTS,
  DriverConstructor,
  EventDispatcher,
  EventHandler,
  EventLogLevel,
  PaymentsConfig,
  ProviderConfig,
  TransactionStore,
} from '../../core';
import { DEFAULT_HEALTH_PATH, DEFAULT_WEBHOOK_PATH } from './constants';

export type StorageConfig =
  | { type: 'memory' }
  | {
      type: 'typeorm';
      /** An existing DataSource; initialized on demand */
      dataSource?: DataSource;
      /** Overrides for the DB_* environment defaults */
      options?: Partial<Pick<DataSourceOptions, 'synchronize' | 'logging'>>;
    }
  | { type: 'custom'; store: TransactionStore };

/**
 * Payments module configuration
 */
export interface PayRouteModuleConfig {
  defaultProvider: string;
  fallbackProvider?: string | null;

  /**
   * Provider settings keyed by provider name.
   * Credentials use the driver's setting names (secretKey, clientId, ...).
   */
  providers: Record<string, ProviderConfig>;

  /**
   * Explicit driver registrations; they win over the built-in catalogue
   */
  drivers?: Record<string, DriverConstructor>;

  /**
   * Extra implementations added to the catalogue, looked up by class name
   */
  implementations?: DriverConstructor[];

  storage?: StorageConfig;

  healthCheck?: {
    enabled?: boolean;
    cacheTtlSeconds?: number;
    path?: string;
  };

  logging?: {
    /** Persist transactions */
    enabled?: boolean;
  };

  webhook?: {
    path?: string;
    toleranceSeconds?: number;
    requireTimestamp?: boolean;
    maxAttempts?: number;
    backoffMs?: number;
  };

  sessionTtlSeconds?: number;

  events?: {
    dispatcher?: EventDispatcher;
    enableLogging?: boolean;
    logLevel?: EventLogLevel;
    handlers?: Array<{
      eventType: string;
      handler: EventHandler;
    }>;
  };
}

/**
 * Async configuration factory.
 * Routes are registered before the factory runs, so their paths are given here.
 */
export interface PayRouteModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<Promise<PayRouteModuleConfig> | PayRouteModuleConfig>['useFactory'];
  webhookPath?: string;
  healthPath?: string;
}

/**
 * Configuration with every default applied
 */
export interface ResolvedPayRouteConfig extends PaymentsConfig {
  drivers: Record<string, DriverConstructor>;
  implementations: DriverConstructor[];
  storage: StorageConfig;
  webhookPath: string;
  healthPath: string;
  queue: { maxAttempts: number; backoffMs: number };
  events: NonNullable<PayRouteModuleConfig['events']>;
}

export const defaultPayRouteConfig = {
  storage: { type: 'memory' },
  healthCheck: { enabled: true, cacheTtlSeconds: 300, path: DEFAULT_HEALTH_PATH },
  logging: { enabled: true },
  webhook: {
    path: DEFAULT_WEBHOOK_PATH,
    toleranceSeconds: DEFAULT_REPLAY_TOLERANCE_SECONDS,
    requireTimestamp: false,
    maxAttempts: DEFAULT_WEBHOOK_MAX_ATTEMPTS,
    backoffMs: DEFAULT_WEBHOOK_BACKOFF_MS,
  },
  sessionTtlSeconds: 3600,
  events: { enableLogging: false, logLevel: 'normal' },
} satisfies Omit<PayRouteModuleConfig, 'defaultProvider' | 'providers'>;

export function resolvePayRouteConfig(config: PayRouteModuleConfig): ResolvedPayRouteConfig {
  const defaults = defaultPayRouteConfig;
  const healthCheck = config.healthCheck ?? {};
  const webhook = config.webhook ?? {};
  const events = config.events ?? {};

  return {
    defaultProvider: config.defaultProvider,
    fallbackProvider: config.fallbackProvider ?? null,
    providers: config.providers,
    drivers: config.drivers ?? {},
    implementations: config.implementations ?? [],
    storage: config.storage ?? defaults.storage,
    healthCheck: {
      enabled: healthCheck.enabled ?? defaults.healthCheck.enabled,
      cacheTtlSeconds: healthCheck.cacheTtlSeconds ?? defaults.healthCheck.cacheTtlSeconds,
    },
    logging: { enabled: config.logging?.enabled ?? defaults.logging.enabled },
    webhook: {
      toleranceSeconds: webhook.toleranceSeconds ?? defaults.webhook.toleranceSeconds,
      requireTimestamp: webhook.requireTimestamp ?? defaults.webhook.requireTimestamp,
    },
    sessionTtlSeconds: config.sessionTtlSeconds ?? defaults.sessionTtlSeconds,
    webhookPath: webhook.path ?? defaults.webhook.path,
    healthPath: healthCheck.path ?? defaults.healthCheck.path,
    queue: {
      maxAttempts: webhook.maxAttempts ?? defaults.webhook.maxAttempts,
      backoffMs: webhook.backoffMs ?? defaults.webhook.backoffMs,
    },
    events: {
      ...events,
      enableLogging: events.enableLogging ?? defaults.events.enableLogging,
      logLevel: events.logLevel ?? defaults.events.logLevel,
    },
  };
}
