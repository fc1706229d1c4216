export const DEFAULT_REPLAY_TOLERANCE_SECONDS = 300;

// values below this are unix seconds, above it milliseconds
const MILLISECONDS_THRESHOLD = 1e12;

/**
 * Parse a provider timestamp: unix seconds, unix milliseconds,
 * numeric strings of either, or anything Date.parse understands.
 */
export function parseWebhookTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return new Date(value < MILLISECONDS_THRESHOLD ? value * 1000 : value);
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    const trimmed = value.trim();
    if (/^\d+(\.\d+)?$/.test(trimmed)) {
      return parseWebhookTimestamp(Number(trimmed));
    }
    const parsed = Date.parse(trimmed);
    return Number.isNaN(parsed) ? null : new Date(parsed);
  }

  return null;
}

/**
 * Replay guard shared by every webhook scheme.
 * True when issuedAt lies within ±toleranceSeconds of now.
 */
export function isWithinReplayWindow(
  issuedAt: Date,
  toleranceSeconds: number,
  now: number = Date.now(),
): boolean {
  const skewMs = Math.abs(now - issuedAt.getTime());
  return skewMs <= toleranceSeconds * 1000;
}
