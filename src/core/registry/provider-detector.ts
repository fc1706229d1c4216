const DEFAULT_PREFIXES: Record<string, string> = {
  PAYSTACK: 'paystack',
  FLW: 'flutterwave',
  MON: 'monnify',
  STRIPE: 'stripe',
  PAYPAL: 'paypal',
  SQUARE: 'square',
  MOLLIE: 'mollie',
  NOWPAYMENTS: 'nowpayments',
};

const DELIMITER = '_';

/**
 * Provider Detector
 *
 * Infers the provider from a reference prefix. A prefix only matches
 * when the delimiter follows it, so MONACO_1 never resolves to MON.
 */
export class ProviderDetector {
  private readonly prefixes = new Map<string, string>();
  private ordered: Array<[string, string]> = [];

  constructor(prefixes: Record<string, string> = DEFAULT_PREFIXES) {
    for (const [prefix, provider] of Object.entries(prefixes)) {
      this.prefixes.set(prefix.toUpperCase(), provider);
    }
    this.reindex();
  }

  detectFromReference(reference: string): string | null {
    const upper = reference.toUpperCase();

    for (const [prefix, provider] of this.ordered) {
      if (upper.startsWith(prefix + DELIMITER)) {
        return provider;
      }
    }

    return null;
  }

  registerPrefix(prefix: string, provider: string): this {
    this.prefixes.set(prefix.toUpperCase(), provider);
    this.reindex();
    return this;
  }

  getPrefixes(): Record<string, string> {
    return Object.fromEntries(this.prefixes);
  }

  // longest first, so an overlapping short prefix never shadows a longer one
  private reindex(): void {
    this.ordered = [...this.prefixes.entries()].sort(([a], [b]) => b.length - a.length);
  }
}
