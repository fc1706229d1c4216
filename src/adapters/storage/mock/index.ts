export * from './mock-transaction-store.adapter';
