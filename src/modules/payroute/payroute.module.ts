import { DynamicModule, Global, Logger, Module, Provider } from '@nestjs/common';
import {
  ChannelMapper,
  DriverFactory,
  EventDispatcher,
  EventDispatcherImpl,
  InProcessWebhookQueue,
  KeyValueCache,
  LoggingEventHandler,
  PaymentOrchestrator,
  PaymentSession,
  ProviderDetector,
  StatusNormalizer,
  TransactionStore,
  WebhookProcessor,
} from '../../core';
import { InMemoryKeyValueCache } from '../../adapters/cache';
import { createDefaultDriverFactory } from '../../adapters/drivers';
import {
  MockTransactionStore,
  TypeORMTransactionStore,
  createDataSource,
} from '../../adapters/storage';
import {
  PayRouteModuleAsyncConfig,
  PayRouteModuleConfig,
  ResolvedPayRouteConfig,
  resolvePayRouteConfig,
} from './payroute.config';
import {
  CHANNEL_MAPPER,
  DEFAULT_HEALTH_PATH,
  DEFAULT_WEBHOOK_PATH,
  DRIVER_FACTORY,
  EVENT_DISPATCHER,
  HEALTH_CACHE,
  PAYMENT_ORCHESTRATOR,
  PAYROUTE_CONFIG,
  PAYROUTE_MODULE_OPTIONS,
  PROVIDER_DETECTOR,
  SESSION_CACHE,
  STATUS_NORMALIZER,
  TRANSACTION_STORE,
  WEBHOOK_PROCESSOR,
  WEBHOOK_QUEUE,
} from './constants';
import { createHealthController, createWebhookController } from './controllers';
import { ConfigurationService, PaymentsService, WebhookWorkerService } from './services';

const EXPORTED_TOKENS = [
  PAYROUTE_CONFIG,
  TRANSACTION_STORE,
  DRIVER_FACTORY,
  STATUS_NORMALIZER,
  CHANNEL_MAPPER,
  PROVIDER_DETECTOR,
  PAYMENT_ORCHESTRATOR,
  EVENT_DISPATCHER,
  WEBHOOK_PROCESSOR,
  WEBHOOK_QUEUE,
  PaymentsService,
  ConfigurationService,
  WebhookWorkerService,
];

/**
 * Payments Module
 *
 * Wires drivers, registries, storage, caches, the orchestrator and the
 * webhook pipeline, and mounts the webhook and health controllers.
 */
@Global()
@Module({})
export class PayRouteModule {
  /**
   * Configure the module synchronously
   */
  static forRoot(config: PayRouteModuleConfig): DynamicModule {
    const resolved = resolvePayRouteConfig(config);

    return {
      module: PayRouteModule,
      providers: [
        {
          provide: PAYROUTE_CONFIG,
          useValue: resolved,
        },
        ...this.createProviders(),
      ],
      controllers: [
        createWebhookController(resolved.webhookPath),
        createHealthController(resolved.healthPath),
      ],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Configure the module from a factory (e.g. ConfigService).
   * Route paths are fixed before the factory runs and come from the options.
   */
  static forRootAsync(options: PayRouteModuleAsyncConfig): DynamicModule {
    return {
      module: PayRouteModule,
      imports: options.imports || [],
      providers: [
        {
          provide: PAYROUTE_MODULE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject || [],
        },
        {
          provide: PAYROUTE_CONFIG,
          useFactory: (config: PayRouteModuleConfig) => resolvePayRouteConfig(config),
          inject: [PAYROUTE_MODULE_OPTIONS],
        },
        ...this.createProviders(),
      ],
      controllers: [
        createWebhookController(options.webhookPath ?? DEFAULT_WEBHOOK_PATH),
        createHealthController(options.healthPath ?? DEFAULT_HEALTH_PATH),
      ],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Providers that depend on the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: TRANSACTION_STORE,
        useFactory: (config: ResolvedPayRouteConfig) => this.createStore(config),
        inject: [PAYROUTE_CONFIG],
      },
      {
        provide: SESSION_CACHE,
        useFactory: (): KeyValueCache<PaymentSession> => new InMemoryKeyValueCache<PaymentSession>(),
      },
      {
        provide: HEALTH_CACHE,
        useFactory: (): KeyValueCache<boolean> => new InMemoryKeyValueCache<boolean>(),
      },
      {
        provide: STATUS_NORMALIZER,
        useFactory: () => new StatusNormalizer(),
      },
      {
        provide: CHANNEL_MAPPER,
        useFactory: () => new ChannelMapper(),
      },
      {
        provide: PROVIDER_DETECTOR,
        useFactory: () => new ProviderDetector(),
      },
      {
        provide: DRIVER_FACTORY,
        useFactory: (config: ResolvedPayRouteConfig) => {
          const factory = createDefaultDriverFactory(config.implementations);
          for (const [name, driver] of Object.entries(config.drivers)) {
            factory.register(name, driver);
          }
          return factory;
        },
        inject: [PAYROUTE_CONFIG],
      },
      {
        provide: PAYMENT_ORCHESTRATOR,
        useFactory: (
          config: ResolvedPayRouteConfig,
          factory: DriverFactory,
          store: TransactionStore,
          sessionCache: KeyValueCache<PaymentSession>,
          healthCache: KeyValueCache<boolean>,
          statusNormalizer: StatusNormalizer,
          channelMapper: ChannelMapper,
          detector: ProviderDetector,
        ) =>
          new PaymentOrchestrator({
            config,
            factory,
            store,
            sessionCache,
            healthCache,
            statusNormalizer,
            channelMapper,
            detector,
          }),
        inject: [
          PAYROUTE_CONFIG,
          DRIVER_FACTORY,
          TRANSACTION_STORE,
          SESSION_CACHE,
          HEALTH_CACHE,
          STATUS_NORMALIZER,
          CHANNEL_MAPPER,
          PROVIDER_DETECTOR,
        ],
      },
      {
        provide: EVENT_DISPATCHER,
        useFactory: (config: ResolvedPayRouteConfig) => this.createEventDispatcher(config),
        inject: [PAYROUTE_CONFIG],
      },
      {
        provide: WEBHOOK_PROCESSOR,
        useFactory: (
          config: ResolvedPayRouteConfig,
          orchestrator: PaymentOrchestrator,
          store: TransactionStore,
          eventDispatcher: EventDispatcher,
        ) =>
          new WebhookProcessor(orchestrator, store, eventDispatcher, {
            persistTransactions: config.logging.enabled,
          }),
        inject: [PAYROUTE_CONFIG, PAYMENT_ORCHESTRATOR, TRANSACTION_STORE, EVENT_DISPATCHER],
      },
      {
        provide: WEBHOOK_QUEUE,
        useFactory: (config: ResolvedPayRouteConfig, processor: WebhookProcessor) =>
          new InProcessWebhookQueue((job) => processor.handle(job), config.queue),
        inject: [PAYROUTE_CONFIG, WEBHOOK_PROCESSOR],
      },
      PaymentsService,
      ConfigurationService,
      WebhookWorkerService,
    ];
  }

  private static async createStore(config: ResolvedPayRouteConfig): Promise<TransactionStore> {
    const storage = config.storage;

    switch (storage.type) {
      case 'memory':
        return new MockTransactionStore();

      case 'typeorm': {
        const dataSource = storage.dataSource ?? createDataSource(storage.options);
        if (!dataSource.isInitialized) {
          await dataSource.initialize();
        }
        return new TypeORMTransactionStore(dataSource);
      }

      case 'custom':
        return storage.store;
    }
  }

  private static createEventDispatcher(config: ResolvedPayRouteConfig): EventDispatcher {
    const dispatcher = config.events.dispatcher || new EventDispatcherImpl();

    if (config.events.enableLogging) {
      const loggingHandler = new LoggingEventHandler(
        new Logger(LoggingEventHandler.name),
        config.events.logLevel,
      );
      dispatcher.onAll(loggingHandler.getHandler());
    }

    if (config.events.handlers) {
      for (const { eventType, handler } of config.events.handlers) {
        dispatcher.on(eventType, handler);
      }
    }

    return dispatcher;
  }
}
