/**
 * PayRoute - Payment Orchestration Core
 *
 * Charges through a fallback chain of payment providers, routes
 * verification back to the provider that issued a reference, and turns
 * authenticated webhooks into normalized transaction updates.
 */

// Core: models, contracts, registries, orchestrator, webhooks, events
export * from './core';

// Drivers, stores and caches
export * from './adapters';

// NestJS module
export * from './modules';

// Environment configuration
export * from './config';

// DTOs, Swagger decorators and webhook test helpers
export * from './_shared';
