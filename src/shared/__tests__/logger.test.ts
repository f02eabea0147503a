import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { REDACT_PATHS, logger } from '../logger.js';

function captureLogger() {
  const chunks: string[] = [];
  const dest = {
    write(chunk: string) {
      chunks.push(chunk);
    },
  };
  const testLogger = pino({ level: 'info', redact: { paths: REDACT_PATHS, censor: '[REDACTED]' } }, dest);
  return { testLogger, chunks };
}

describe('logger', () => {
  it('is a pino logger instance', () => {
    expect(typeof logger.info).toBe('function');
    expect(typeof logger.error).toBe('function');
    expect(typeof logger.warn).toBe('function');
    expect(typeof logger.debug).toBe('function');
  });

  it('redacts the authorization header', () => {
    const { testLogger, chunks } = captureLogger();
    testLogger.info({ req: { headers: { authorization: 'Bearer test-secret' } } }, 'request');

    const entry: unknown = JSON.parse(chunks.join(''));
    expect(entry).toMatchObject({ req: { headers: { authorization: '[REDACTED]' } } });
  });

  it('redacts nested apiKey and api_key fields', () => {
    const { testLogger, chunks } = captureLogger();
    testLogger.info({ llm: { apiKey: 'test-secret' }, search: { api_key: 'test-secret' } }, 'config');

    const entry: unknown = JSON.parse(chunks.join(''));
    expect(entry).toMatchObject({ llm: { apiKey: '[REDACTED]' }, search: { api_key: '[REDACTED]' } });
    expect(chunks.join('')).not.toContain('test-secret');
  });
});
