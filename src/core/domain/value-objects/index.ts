export * from './currency-units';
