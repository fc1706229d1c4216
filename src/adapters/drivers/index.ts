import { DriverConstructor, DriverFactory } from '../../core';
import { FlutterwaveDriver } from './flutterwave';
import { MollieDriver } from './mollie';
import { MonnifyDriver } from './monnify';
import { NowPaymentsDriver } from './nowpayments';
import { PayPalDriver } from './paypal';
import { PaystackDriver } from './paystack';
import { SquareDriver } from './square';
import { StripeDriver } from './stripe';

export * from './shared';
export * from './paystack';
export * from './flutterwave';
export * from './monnify';
export * from './square';
export * from './paypal';
export * from './mollie';
export * from './stripe';
export * from './nowpayments';

/**
 * Drivers shipped with the library, catalogued under their class names
 */
export const BUILT_IN_DRIVERS: DriverConstructor[] = [
  PaystackDriver,
  FlutterwaveDriver,
  MonnifyDriver,
  SquareDriver,
  PayPalDriver,
  MollieDriver,
  StripeDriver,
  NowPaymentsDriver,
];

/**
 * Factory preloaded with the built-in driver catalogue
 */
export function createDefaultDriverFactory(extra: DriverConstructor[] = []): DriverFactory {
  return new DriverFactory([...BUILT_IN_DRIVERS, ...extra]);
}
