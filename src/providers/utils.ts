/**
 * Shared provider utilities.
 */

const DURATION_UNITS_MS: Record<string, number> = {
  h: 3_600_000,
  m: 60_000,
  s: 1000,
  ms: 1,
};

/**
 * Parse an OpenAI-style duration string ("6m23.456s", "1.5s", "500ms",
 * "2h30m0s") into milliseconds. Unrecognized input yields 0.
 */
export function parseDurationToMs(value: string): number {
  let totalMs = 0;
  for (const match of value.matchAll(/(\d+(?:\.\d+)?)(ms|h|m|s)/g)) {
    const [, amount, unit] = match;
    if (amount !== undefined && unit !== undefined) {
      totalMs += parseFloat(amount) * (DURATION_UNITS_MS[unit] ?? 0);
    }
  }
  return Math.round(totalMs);
}

/** Parse an integer header value, ignoring absent or non-numeric values. */
export function parseIntHeader(headers: Headers, name: string): number | undefined {
  const value = headers.get(name);
  if (value === null) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/** Parse a `retry-after` header (seconds) into milliseconds. */
export function parseRetryAfterMs(headers: Headers): number | undefined {
  const value = headers.get('retry-after');
  if (value === null) return undefined;
  const seconds = parseFloat(value);
  return isNaN(seconds) ? undefined : Math.round(seconds * 1000);
}

/** Null when every field is undefined, otherwise the object itself. */
export function compactRateLimitInfo<T extends object>(info: T): T | null {
  const entries = Object.entries(info).filter(([, value]) => value !== undefined);
  return entries.length === 0 ? null : info;
}
