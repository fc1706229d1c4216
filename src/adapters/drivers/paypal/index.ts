export * from './paypal.driver';
