import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, isEnabled, matchPattern } from './logger';

describe('matchPattern', () => {
  it('supports wildcards', () => {
    expect(matchPattern('tagkv:conn', '*')).toBe(true);
    expect(matchPattern('tagkv:conn', 'tagkv:*')).toBe(true);
    expect(matchPattern('tagkv:conn', 'tagkv:pool')).toBe(false);
  });
});

describe('isEnabled', () => {
  it('is off without DEBUG', () => {
    expect(isEnabled('tagkv:conn', undefined)).toBe(false);
    expect(isEnabled('tagkv:conn', '')).toBe(false);
  });

  it('lets later exclusions win', () => {
    expect(isEnabled('tagkv:conn', '*,-tagkv:conn')).toBe(false);
    expect(isEnabled('tagkv:pool', '*,-tagkv:conn')).toBe(true);
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints debug lines only when enabled', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    createLogger('tagkv:test', 'other').debug('hidden');
    expect(debugSpy).not.toHaveBeenCalled();

    createLogger('tagkv:test', 'tagkv:*').debug('shown', 1);
    expect(debugSpy).toHaveBeenCalledWith('[tagkv:test]', 'shown', 1);
  });

  it('always prints info with the namespace prefix', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger('tagkv:test', undefined).info('hello');
    expect(logSpy).toHaveBeenCalledWith('[tagkv:test]', 'hello');
  });
});
