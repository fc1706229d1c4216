/**
 * Orchestration core: domain models, contracts, registries,
 * the payment orchestrator and webhook processing.
 * Storage and provider adapters live under src/adapters.
 */

// Domain
export * from './domain/models';
export * from './domain/enums';
export * from './domain/value-objects';
export * from './errors';

// Contracts
export * from './interfaces';

// Registries
export * from './registry';

// Webhooks
export * from './webhooks';

// Services
export * from './services';

// Events
export * from './events';
