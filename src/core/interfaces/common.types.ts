/**
 * Common types shared by drivers, stores and the webhook pipeline
 */

/**
 * Decoded JSON object
 */
export type JsonObject = Record<string, unknown>;

/**
 * Inbound webhook headers, keys lower-cased
 */
export type WebhookHeaders = Record<string, string | string[] | undefined>;

/**
 * Decoded webhook body
 */
export type WebhookPayload = JsonObject;

/**
 * Logger contract used by core classes.
 * NestJS Logger satisfies it; tests may pass a jest mock.
 */
export interface Logger {
  log(message: string, ...optionalParams: unknown[]): void;
  warn(message: string, ...optionalParams: unknown[]): void;
  error(message: string, ...optionalParams: unknown[]): void;
  debug(message: string, ...optionalParams: unknown[]): void;
}

/**
 * Narrow an unknown value to a plain JSON object
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
