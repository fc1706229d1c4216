export * from './stripe.driver';
