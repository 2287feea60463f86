import { describe, test, expect, vi } from 'vitest';
import { createLogger, isLogLevel, type LogSink } from '../src/utils/logger';

function fakeSink() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LogSink;
}

describe('createLogger', () => {
  test('drops messages below the threshold and prefixes the scope', () => {
    const sink = fakeSink();
    const logger = createLogger('discover', 'info', sink);

    logger.debug('hidden');
    logger.info('entry file found');
    logger.warn('duplicate');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).toHaveBeenCalledWith('[discover] entry file found');
    expect(sink.warn).toHaveBeenCalledWith('[discover] duplicate');
  });

  test('passes the error object through', () => {
    const sink = fakeSink();
    const failure = new Error('boom');
    createLogger('cli', 'error', sink).error('failed', failure);
    expect(sink.error).toHaveBeenCalledWith('[cli] failed', failure);
  });

  test('silent level emits nothing', () => {
    const sink = fakeSink();
    const logger = createLogger('quiet', 'silent', sink);
    logger.error('nope');
    logger.warn('nope');
    expect(sink.error).not.toHaveBeenCalled();
    expect(sink.warn).not.toHaveBeenCalled();
  });
});

test('isLogLevel', () => {
  expect(isLogLevel('debug')).toBe(true);
  expect(isLogLevel('verbose')).toBe(false);
});
