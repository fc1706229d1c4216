export * from './monnify.driver';
