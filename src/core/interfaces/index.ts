// Interface and type exports
export * from './common.types';
export * from './payment-driver.interface';
export * from './transaction-store.interface';
export * from './key-value-cache.interface';
export * from './event-dispatcher.interface';
export * from './driver-config.interface';
export * from './payments-config.interface';
