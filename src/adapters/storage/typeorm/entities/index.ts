export * from './payment-transaction.entity';
