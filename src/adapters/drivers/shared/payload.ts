import { JsonObject, isJsonObject } from '../../../core';

/**
 * Walk a dotted path through decoded JSON; numeric segments index arrays
 */
export function readPath(source: unknown, path: string): unknown {
  let current: unknown = source;

  for (const segment of path.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (isJsonObject(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }

  return current;
}

/**
 * First non-empty string (numbers are stringified) found at any of the paths
 */
export function readString(source: unknown, ...paths: string[]): string | null {
  for (const path of paths) {
    const value = readPath(source, path);
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return null;
}

/**
 * First finite number (numeric strings accepted) found at any of the paths
 */
export function readNumber(source: unknown, ...paths: string[]): number | null {
  for (const path of paths) {
    const value = readPath(source, path);
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
      return Number(value);
    }
  }
  return null;
}

export function readObject(source: unknown, path: string): JsonObject {
  const value = readPath(source, path);
  return isJsonObject(value) ? value : {};
}

export function readArray(source: unknown, path: string): unknown[] {
  const value = readPath(source, path);
  return Array.isArray(value) ? value : [];
}

/**
 * Decode a raw webhook body; anything but a JSON object yields null
 */
export function parseJsonObject(raw: Buffer | string): JsonObject | null {
  try {
    const decoded: unknown = JSON.parse(raw.toString());
    return isJsonObject(decoded) ? decoded : null;
  } catch {
    return null;
  }
}
