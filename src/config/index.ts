export { default as paymentsConfig } from './payments.config';
export * from './payments.config';
