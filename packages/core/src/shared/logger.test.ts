import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, formatTag, getLogLevel, isLogLevel, setLogLevel, setLogSink, type LogLevel } from './logger.js';

describe('logger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    setLogSink();
  });

  it('should tag lines with timestamp, padded level and prefix', () => {
    expect(formatTag('info', 'generation', new Date('2024-05-01T10:00:00.000Z'))).toBe(
      '2024-05-01T10:00:00.000Z [INFO ] [generation]',
    );
  });

  it('should drop lines below the current level', () => {
    const seen: Array<[LogLevel, unknown[]]> = [];
    setLogSink((level, _tag, args) => seen.push([level, args]));
    setLogLevel('warn');
    const log = createLogger('test');

    log.debug('a');
    log.info('b');
    log.warn('c', 1);
    log.error('d');

    expect(seen).toEqual([
      ['warn', ['c', 1]],
      ['error', ['d']],
    ]);
  });

  it('should recognise only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
