import { describe, expect, it } from 'vitest';
import { formatLogEntry, type LogLevel } from '../src/logger.js';
import { createServiceLogger, redactMetadata } from '../src/service-logger.js';

function captureSink() {
  const entries: Array<{ level: LogLevel; message: string; metadata: Record<string, unknown> }> = [];
  return {
    entries,
    sink: (level: LogLevel, message: string, metadata: Record<string, unknown>) => {
      entries.push({ level, message, metadata });
    }
  };
}

describe('createServiceLogger', () => {
  it('stamps the service name and redacts upstream credentials', () => {
    const { entries, sink } = captureSink();
    const logger = createServiceLogger({ service: 'payments-api', minLevel: 'info', sink });

    logger.warn('FX rate fetch failed', { pair: 'GBP/EUR', upstream: { access_key: 'test-secret', status: 429 } });

    expect(entries).toEqual([
      {
        level: 'warn',
        message: 'FX rate fetch failed',
        metadata: {
          service: 'payments-api',
          pair: 'GBP/EUR',
          upstream: { access_key: '[REDACTED]', status: 429 }
        }
      }
    ]);
  });

  it('drops entries below the minimum level', () => {
    const { entries, sink } = captureSink();
    const logger = createServiceLogger({ service: 'payments-api', minLevel: 'warn', sink });

    logger.debug('cache hit');
    logger.info('quote issued');
    logger.error('store unavailable');

    expect(entries.map((entry) => entry.message)).toEqual(['store unavailable']);
  });

  it('routes debug through the info channel and carries the correlation id', () => {
    const { entries, sink } = captureSink();
    const logger = createServiceLogger({ service: 'payments-api', minLevel: 'debug', sink });

    logger.setCorrelationId('req-1');
    logger.debug('cache hit', { pair: 'GBP/EUR' });

    expect(entries[0]).toEqual({
      level: 'info',
      message: 'cache hit',
      metadata: { service: 'payments-api', debug: true, correlationId: 'req-1', pair: 'GBP/EUR' }
    });
  });
});

describe('redactMetadata', () => {
  it('leaves dates and arrays untouched', () => {
    const at = new Date('2026-01-01T00:00:00.000Z');
    expect(redactMetadata({ at, codes: ['GBP', 'EUR'], apiKey: 'test-key' })).toEqual({
      at,
      codes: ['GBP', 'EUR'],
      apiKey: '[REDACTED]'
    });
  });
});

describe('formatLogEntry', () => {
  it('writes one JSON line with errors and bigints made serialisable', () => {
    const line = formatLogEntry(
      'warn',
      'FX rate source failed',
      { error: new TypeError('fetch failed'), bytes: 12n },
      new Date('2026-03-01T09:00:00.000Z')
    );

    expect(line).toBe(
      '{"timestamp":"2026-03-01T09:00:00.000Z","level":"warn","message":"FX rate source failed",' +
        '"metadata":{"error":{"name":"TypeError","message":"fetch failed"},"bytes":"12"}}'
    );
  });

  it('defaults to empty metadata', () => {
    expect(JSON.parse(formatLogEntry('info', 'ready'))).toMatchObject({ level: 'info', message: 'ready', metadata: {} });
  });
});
