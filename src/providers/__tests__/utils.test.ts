import { describe, it, expect } from 'vitest';
import { compactRateLimitInfo, parseDurationToMs, parseIntHeader, parseRetryAfterMs } from '../utils.js';

describe('parseDurationToMs', () => {
  it.each([
    ['6m0s', 360_000],
    ['6m23.456s', 383_456],
    ['1.5s', 1500],
    ['500ms', 500],
    ['2h30m0s', 9_000_000],
    ['soon', 0],
  ])('parses %s', (input, expected) => {
    expect(parseDurationToMs(input)).toBe(expected);
  });
});

describe('parseIntHeader', () => {
  it('reads integers and ignores absent or non-numeric values', () => {
    const headers = new Headers({ 'x-limit': '42', 'x-bad': 'lots' });
    expect(parseIntHeader(headers, 'x-limit')).toBe(42);
    expect(parseIntHeader(headers, 'x-bad')).toBeUndefined();
    expect(parseIntHeader(headers, 'x-missing')).toBeUndefined();
  });
});

describe('parseRetryAfterMs', () => {
  it('converts seconds to milliseconds', () => {
    expect(parseRetryAfterMs(new Headers({ 'retry-after': '2.5' }))).toBe(2500);
    expect(parseRetryAfterMs(new Headers())).toBeUndefined();
  });
});

describe('compactRateLimitInfo', () => {
  it('returns null when every field is undefined', () => {
    expect(compactRateLimitInfo({ limitRequests: undefined })).toBeNull();
    expect(compactRateLimitInfo({ limitRequests: 5, remainingRequests: undefined })).toEqual({ limitRequests: 5 });
  });
});
