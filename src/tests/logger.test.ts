import { Writable } from 'node:stream';
import { describe, expect, test } from 'vitest';

import { ConfigurationError } from '../errors';
import { createLogger, normalizeLogLevel, type LoggerOptions } from '../logger';

/**
 * Helper: A logger whose output lines are collected in memory.
 */
const capture = (options: LoggerOptions) => {
  const lines: string[] = [];
  const destination = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(String(chunk));
      callback();
    }
  });
  return { logger: createLogger({ ...options, destination }), lines };
};

describe('Logger', () => {
  test('minimal format prints component, message and meta', () => {
    const { logger, lines } = capture({ minimal: true, component: 'loader' });

    logger.info('Emitted JSON object', { chunks: 2 });

    expect(lines).toEqual(['[loader] Emitted JSON object {"chunks":2}\n']);
  });

  test('text format starts with timestamp and level', () => {
    const { logger, lines } = capture({ component: 'loader' });

    logger.warn('Slow query');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z WARN \[loader\] - Slow query\n$/
    );
  });

  test('json format writes one record per line', () => {
    const { logger, lines } = capture({ json: true, component: 'loader' });

    logger.error('Failed', { code: 'CONTRACT_VIOLATION' });

    const record: unknown = JSON.parse(lines[0] ?? '');
    expect(record).toMatchObject({
      level: 'error',
      message: 'Failed',
      component: 'loader',
      code: 'CONTRACT_VIOLATION'
    });
  });

  test('records above the configured level are dropped', () => {
    const { logger, lines } = capture({ level: 'warn', minimal: true });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(lines).toEqual(['shown\n']);
    expect(logger.isLevelEnabled('error')).toBe(true);
    expect(logger.isLevelEnabled('info')).toBe(false);
  });

  test('a child overrides the component and keeps the destination', () => {
    const { logger, lines } = capture({ minimal: true, component: 'parent' });

    logger.child({ component: 'child' }).info('hello');

    expect(lines).toEqual(['[child] hello\n']);
  });

  test('the sink receives every record that passes the filter', () => {
    const records: unknown[] = [];
    const { logger } = capture({ level: 'info', sink: record => records.push(record) });

    logger.debug('dropped');
    logger.info('kept', { n: 1 });

    expect(records).toEqual([
      expect.objectContaining({ level: 'info', message: 'kept', n: 1 })
    ]);
  });
});

describe('normalizeLogLevel', () => {
  test.for([
    { input: undefined, expected: 'info' },
    { input: 'DEBUG', expected: 'debug' },
    { input: 'Warn', expected: 'warn' }
  ])('[$input] -> $expected', ({ input, expected }) => {
    expect(normalizeLogLevel(input)).toBe(expected);
  });

  test('an unknown level is a configuration error', () => {
    expect(() => normalizeLogLevel('verbose')).toThrow(ConfigurationError);
  });
});
