// tests/unit/logger.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger, resolveLogLevel } from '../../src/core/logger';

describe('Logger', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-02-10T18:30:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should prefix messages with timestamp, padded level and context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new Logger('Test', 'info').info('hello');

    expect(log).toHaveBeenCalledWith('[2026-02-10T18:30:00.000Z] [INFO ] [Test] hello');
  });

  it('should route warnings and errors to their console streams', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const cause = new Error('boom');

    const logger = new Logger('Test', 'debug');
    logger.warn('careful');
    logger.error('failed', cause);

    expect(warn).toHaveBeenCalledWith('[2026-02-10T18:30:00.000Z] [WARN ] [Test] careful');
    expect(error).toHaveBeenNthCalledWith(1, '[2026-02-10T18:30:00.000Z] [ERROR] [Test] failed');
    expect(error).toHaveBeenNthCalledWith(2, cause);
  });

  it('should suppress messages below its threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = new Logger('Test', 'warn');
    logger.debug('noise');
    logger.info('progress');

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();

    new Logger('Quiet', 'error').warn('ignored');
    expect(warn).not.toHaveBeenCalled();
  });
});

describe('resolveLogLevel', () => {
  it('should accept known levels case-insensitively', () => {
    expect(resolveLogLevel(' Debug ')).toBe('debug');
    expect(resolveLogLevel('ERROR')).toBe('error');
  });

  it('should default to info', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('info');
  });
});
