export * from './payment.errors';
