export * from './paystack.driver';
