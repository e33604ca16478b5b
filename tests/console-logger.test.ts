import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { ConsoleCacheLogger } from '../src/observability/console-logger.js';

describe('ConsoleCacheLogger', () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should_writeOneJsonLine_per_event', () => {
    const logger = new ConsoleCacheLogger({ level: 'debug' });

    logger.debug({ event: 'hit', key: ['f', 1] });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      '{"timestamp":"2026-01-02T03:04:05.000Z","level":"debug","logger":"lru-cache","event":"hit","key":["f",1]}'
    );
  });

  it('should_dropEventsBelowLevel', () => {
    const logger = new ConsoleCacheLogger({ level: 'info' });

    logger.debug({ event: 'miss', key: 'a' });
    logger.info({ event: 'save_skipped', message: 'no changes to save' });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toContain('"event":"save_skipped"');
  });

  it('should_defaultToWarn', () => {
    const logger = new ConsoleCacheLogger();

    logger.info({ event: 'save_skipped' });
    logger.warn({ event: 'evict', key: 'a' });

    expect(logger.level).toBe('warn');
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should_writeNothing_when_silent', () => {
    const logger = new ConsoleCacheLogger({ level: 'silent' });

    logger.error({ event: 'save_failed', message: 'no backing path configured' });

    expect(errorSpy).not.toHaveBeenCalled();
    expect(logger.isEnabled('error')).toBe(false);
  });

  it('should_useCustomName', () => {
    const logger = new ConsoleCacheLogger({ level: 'error', name: 'geocode-cache' });

    logger.error({ event: 'save_failed' });

    expect(errorSpy).toHaveBeenCalledWith(
      '{"timestamp":"2026-01-02T03:04:05.000Z","level":"error","logger":"geocode-cache","event":"save_failed"}'
    );
  });
});
