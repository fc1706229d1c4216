export * from './flutterwave.driver';
