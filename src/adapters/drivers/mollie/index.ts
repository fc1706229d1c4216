export * from './mollie.driver';
