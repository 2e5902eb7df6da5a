/**
 * Telemetry Tests
 */

import { expect, test } from 'vitest';
import {
  createRequestLogger,
  formatLogEntry,
  isLogFormat,
  isLogLevel,
  loggerDefaults,
  type LogEntry,
} from '../../framework/telemetry/logger.ts';
import { isOTELEnabled, withSpan } from '../../framework/telemetry/otel.ts';
import { captureLogger } from './helpers.ts';

test('Logger - drops entries below the level', () => {
  const { logger, entries } = captureLogger('warn');

  logger.debug('debug');
  logger.info('info');
  logger.warn('warn');
  logger.error('error');

  expect(entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
});

test('Logger - setLevel changes filtering', () => {
  const { logger, entries } = captureLogger('error');
  logger.setLevel('debug');
  logger.debug('now visible');

  expect(logger.getLevel()).toBe('debug');
  expect(logger.isLevelEnabled('debug')).toBe(true);
  expect(entries).toHaveLength(1);
});

test('Logger - entries carry message, context and timestamp', () => {
  const { logger, entries } = captureLogger();
  logger.info('hello', { port: 8080 });

  expect(entries[0].message).toBe('hello');
  expect(entries[0].context).toEqual({ port: 8080 });
  expect(Number.isNaN(Date.parse(entries[0].timestamp))).toBe(false);
});

test('Logger - errors are serialized', () => {
  const { logger, entries } = captureLogger();
  logger.error('failed', new TypeError('bad input'), { route: 'a/b' });

  expect(entries[0].error?.name).toBe('TypeError');
  expect(entries[0].error?.message).toBe('bad input');
  expect(entries[0].context).toEqual({ route: 'a/b' });
});

test('Logger - child merges context and shares the sink', () => {
  const { logger, entries } = captureLogger();
  const child = logger.child({ component: 'router' });
  child.warn('careful', { template: 'a/(x)' });

  expect(entries[0].context).toEqual({ component: 'router', template: 'a/(x)' });
});

test('createRequestLogger - tags entries with request details', () => {
  const { logger, entries } = captureLogger();
  const requestLogger = createRequestLogger(logger, {
    requestId: 'req-1',
    method: 'GET',
    path: '/test/hello',
  });
  requestLogger.info('handled');

  expect(entries[0].context).toEqual({ requestId: 'req-1', method: 'GET', path: '/test/hello' });
});

const timestamp = '2024-01-01T00:00:00.000Z';

test('formatLogEntry - pretty line with context', () => {
  const entry: LogEntry = { level: 'info', message: 'hello', timestamp, context: { port: 8080 } };
  expect(formatLogEntry(entry, 'pretty')).toBe(`${timestamp} INFO  hello {"port":8080}`);
});

test('formatLogEntry - pretty error without a stack', () => {
  const entry: LogEntry = {
    level: 'error',
    message: 'failed',
    timestamp,
    error: { name: 'Error', message: 'boom' },
  };
  expect(formatLogEntry(entry, 'pretty')).toBe(`${timestamp} ERROR failed\nError: boom`);
});

test('formatLogEntry - json is the serialized entry', () => {
  const entry: LogEntry = { level: 'warn', message: 'careful', timestamp };
  expect(formatLogEntry(entry, 'json')).toBe(
    `{"level":"warn","message":"careful","timestamp":"${timestamp}"}`
  );
});

test('loggerDefaults - depend on the environment name', () => {
  expect(loggerDefaults('production')).toEqual({ level: 'info', format: 'json' });
  expect(loggerDefaults('test')).toEqual({ level: 'warn', format: 'pretty' });
  expect(loggerDefaults()).toEqual({ level: 'debug', format: 'pretty' });
});

test('isLogLevel and isLogFormat - narrow unknown values', () => {
  expect(isLogLevel('warn')).toBe(true);
  expect(isLogLevel('verbose')).toBe(false);
  expect(isLogFormat('json')).toBe(true);
  expect(isLogFormat(1)).toBe(false);
});

test('withSpan - returns the result of the function', async () => {
  const result = await withSpan('unit', async (span) => {
    span.setAttribute('step', 1);
    return 42;
  });
  expect(result).toBe(42);
});

test('withSpan - rethrows failures', async () => {
  await expect(
    withSpan('unit', async () => {
      throw new Error('span failure');
    })
  ).rejects.toThrow('span failure');
});

test('isOTELEnabled - only for OTEL_ENABLED=true', () => {
  expect(isOTELEnabled({})).toBe(false);
  expect(isOTELEnabled({ OTEL_ENABLED: 'true' })).toBe(true);
  expect(isOTELEnabled({ OTEL_ENABLED: '1' })).toBe(false);
});
