export * from './square.driver';
