import * as crypto from 'crypto';
import { WebhookHeaders } from '../../../core';

/**
 * Case-insensitive header lookup; the first value wins for repeated headers
 */
export function headerValue(headers: WebhookHeaders, name: string): string | null {
  const wanted = name.toLowerCase();

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) {
      continue;
    }
    const first = Array.isArray(value) ? value[0] : value;
    return first && first.length > 0 ? first : null;
  }

  return null;
}

export function hmacHex(algorithm: 'sha256' | 'sha512', secret: string, body: Buffer | string): string {
  return crypto.createHmac(algorithm, secret).update(body).digest('hex');
}

export function hmacBase64(algorithm: 'sha256' | 'sha512', secret: string, body: Buffer | string): string {
  return crypto.createHmac(algorithm, secret).update(body).digest('base64');
}

/**
 * Constant-time string comparison; unequal lengths compare false
 */
export function safeEqual(a: string, b: string): boolean {
  const bufferA = Buffer.from(a);
  const bufferB = Buffer.from(b);

  if (bufferA.length !== bufferB.length) {
    return false;
  }

  return crypto.timingSafeEqual(bufferA, bufferB);
}
