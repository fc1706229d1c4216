export * from './payment-orchestrator';
