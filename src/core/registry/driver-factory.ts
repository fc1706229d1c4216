import { DriverNotFoundError } from '../errors';
import {
  DriverConstructor,
  DriverContext,
  PaymentDriver,
  ProviderConfig,
} from '../interfaces';

// Brand names that are not a plain capitalization of the provider key
const BRAND_CASING: Record<string, string> = {
  paypal: 'PayPal',
  nowpayments: 'NowPayments',
};

/**
 * Driver Factory
 *
 * Resolves a provider name to a driver constructor:
 *  1. constructor registered for the name
 *  2. configured implementation name (`driver` setting)
 *  3. `{PascalCase}Driver` convention
 *  4. the configured string (or name) taken literally
 * Implementations are looked up in a catalogue keyed by class name.
 */
export class DriverFactory {
  private readonly registered = new Map<string, DriverConstructor>();
  private readonly catalogue = new Map<string, DriverConstructor>();

  constructor(implementations: DriverConstructor[] = []) {
    for (const implementation of implementations) {
      this.registerImplementation(implementation);
    }
  }

  /**
   * Bind a constructor to a provider name; takes precedence over everything else
   */
  register(name: string, driver: DriverConstructor): this {
    this.registered.set(name, driver);
    return this;
  }

  /**
   * Add an implementation to the catalogue under its class name (and an optional alias)
   */
  registerImplementation(driver: DriverConstructor, alias?: string): this {
    this.catalogue.set(driver.name, driver);
    if (alias) {
      this.catalogue.set(alias, driver);
    }
    return this;
  }

  resolve(name: string, config: ProviderConfig = {}): DriverConstructor {
    const registered = this.registered.get(name);
    if (registered) {
      return registered;
    }

    if (config.driver) {
      const configured = this.lookup(config.driver);
      if (configured) {
        return configured;
      }
    }

    const conventional = this.catalogue.get(DriverFactory.conventionalName(name));
    if (conventional) {
      return conventional;
    }

    const literal = this.lookup(config.driver ?? name);
    if (literal) {
      return literal;
    }

    throw new DriverNotFoundError(
      name,
      `has no driver implementation (looked for ${config.driver ?? DriverFactory.conventionalName(name)})`,
    );
  }

  create(name: string, config: ProviderConfig, context: DriverContext): PaymentDriver {
    const Driver = this.resolve(name, config);
    return new Driver(name, config, context);
  }

  getRegisteredDrivers(): string[] {
    return [...this.registered.keys()];
  }

  isRegistered(name: string): boolean {
    return this.registered.has(name);
  }

  /**
   * 'paystack' → 'PaystackDriver', 'paypal' → 'PayPalDriver', 'cash-app' → 'CashAppDriver'
   */
  static conventionalName(provider: string): string {
    const key = provider.toLowerCase();
    const base =
      BRAND_CASING[key] ??
      key
        .split(/[-_\s]+/)
        .filter((part) => part.length > 0)
        .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
        .join('');

    return `${base}Driver`;
  }

  private lookup(implementation: string): DriverConstructor | undefined {
    const exact = this.catalogue.get(implementation);
    if (exact) {
      return exact;
    }

    const segments = implementation.split(/[./\\]/);
    const last = segments[segments.length - 1];
    return last ? this.catalogue.get(last) : undefined;
  }
}
