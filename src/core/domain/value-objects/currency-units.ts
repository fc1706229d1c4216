/**
 * ISO 4217 currencies without a minor unit; providers take them whole
 */
export const ZERO_DECIMAL_CURRENCIES: readonly string[] = [
  'BIF',
  'CLP',
  'DJF',
  'GNF',
  'JPY',
  'KMF',
  'KRW',
  'MGA',
  'PYG',
  'RWF',
  'UGX',
  'VND',
  'VUV',
  'XAF',
  'XOF',
  'XPF',
];

export function currencyDecimals(currency: string): number {
  return ZERO_DECIMAL_CURRENCIES.includes(currency.toUpperCase()) ? 0 : 2;
}

/**
 * Major units (naira, dollars, yen) to the provider's smallest unit
 */
export function toMinorUnits(amount: number, currency: string): number {
  return Math.round(amount * Math.pow(10, currencyDecimals(currency)));
}

export function fromMinorUnits(amount: number, currency: string): number {
  return amount / Math.pow(10, currencyDecimals(currency));
}

/**
 * Decimal string in major units, e.g. "10.50" or "1000" for JPY
 */
export function formatMajorAmount(amount: number, currency: string): string {
  return amount.toFixed(currencyDecimals(currency));
}
