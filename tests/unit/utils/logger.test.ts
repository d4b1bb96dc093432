/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel('info');
  });

  describe('levels', () => {
    it('should default to info', () => {
      const log = new Logger();

      log.debug('hidden');
      log.info('shown');

      expect(log.getLevel()).toBe('info');
      expect(logSpy).toHaveBeenCalledTimes(1);
    });

    it('should report which levels are enabled', () => {
      const log = new Logger();
      log.setLevel('warn');

      expect(log.isEnabled('info')).toBe(false);
      expect(log.isEnabled('warn')).toBe(true);
      expect(log.isEnabled('error')).toBe(true);
    });

    it('should route warnings and errors to their console methods', () => {
      const log = new Logger();

      log.warn('careful');
      log.error('broken');

      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('should print nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.error('broken');
      log.success('done');

      expect(errorSpy).not.toHaveBeenCalled();
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should print structured data on a second line', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('parsing', { args: 2 });

      expect(logSpy).toHaveBeenCalledTimes(2);
      expect(logSpy.mock.calls[1]?.[0]).toContain('"args": 2');
    });
  });

  describe('child', () => {
    it('should join prefixes with a colon', () => {
      const log = new Logger();
      log.setPrefix('cli');

      log.child('parse').info('hello');

      expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('[cli:parse] hello'));
    });

    it('should follow the parent level after creation', () => {
      const log = new Logger();
      const child = log.child('policy');

      child.debug('before');
      log.setLevel('debug');
      child.debug('after');

      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('[policy] after'));
    });

    it('should keep its own level once set', () => {
      const log = new Logger();
      const child = log.child('policy');
      child.setLevel('error');

      child.info('hidden');

      expect(child.getLevel()).toBe('error');
      expect(logSpy).not.toHaveBeenCalled();
    });
  });

  it('should export a singleton instance', () => {
    expect(logger).toBeInstanceOf(Logger);
  });
});
