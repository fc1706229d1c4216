export * from './nowpayments.driver';
