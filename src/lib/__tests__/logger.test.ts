import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from '../logger';

describe('logger', () => {
  beforeEach(() => {
    setLogLevel('INFO');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('INFO');
  });

  it('should write tagged lines to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('Registry').info('Registered provider: openai');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] \[Registry\] Registered provider: openai$/);
  });

  it('should drop lines below the current level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('WARNING');
    const log = createLogger('Test');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toContain('[WARNING] [Test] shown');
  });

  it('should accept lower case levels and the WARN alias, ignoring unknown ones', () => {
    setLogLevel('debug');
    expect(getLogLevel()).toBe('DEBUG');
    setLogLevel('warn');
    expect(getLogLevel()).toBe('WARNING');
    setLogLevel('verbose');
    expect(getLogLevel()).toBe('WARNING');
  });
});
