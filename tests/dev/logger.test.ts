import { describe, it, expect, vi, afterEach } from 'vitest';
import { isProduction, logger } from '../../src/dev/logger';
import { devWarn } from '../../src/dev/warnings';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should forward warnings to console in development', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logger.warn('w', 1);
    expect(isProduction()).toBe(false);
    expect(warn).toHaveBeenCalledWith('w', 1);
  });

  it('should stay silent in production', () => {
    process.env.NODE_ENV = 'production';
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logger.warn('w');
    expect(isProduction()).toBe(true);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should ignore a console method that throws', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {
      throw new Error('console unavailable');
    });
    expect(() => logger.warn('x')).not.toThrow();
  });

  it('should prefix dev warnings and skip them when the condition holds', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    devWarn(true, 'not shown');
    devWarn(false, 'shown');
    devWarn(() => false, 'lazy');
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenNthCalledWith(1, '[router] shown');
    expect(warn).toHaveBeenNthCalledWith(2, '[router] lazy');
  });

  it('should not evaluate a lazy condition in production', () => {
    process.env.NODE_ENV = 'production';
    const check = vi.fn(() => false);
    devWarn(check, 'skipped');
    expect(check).not.toHaveBeenCalled();
  });
});
