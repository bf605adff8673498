import { describe, it, expect, vi, afterEach } from 'vitest';
import { getLogger, resolveLogLevel, setLogLevel } from './logging.js';

describe('resolveLogLevel', () => {
  it('defaults to info when LOG_LEVEL is unset', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
  });

  it('accepts known levels case-insensitively', () => {
    expect(resolveLogLevel('DEBUG')).toBe('debug');
    expect(resolveLogLevel(' warn ')).toBe('warn');
  });

  it('falls back to info for unknown levels', () => {
    expect(resolveLogLevel('verbose')).toBe('info');
  });
});

describe('getLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the logger name', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = getLogger('prefix-test');
    logger.setLevel('info');

    logger.info('hello', 42);

    expect(infoSpy).toHaveBeenCalledWith('[prefix-test]', 'hello', 42);
  });
});

describe('setLogLevel', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('silences existing named loggers below the new level', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = getLogger('level-test');

    setLogLevel('warn');
    logger.info('hidden');
    logger.warn('shown');

    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('[level-test]', 'shown');
  });
});
