/**
 * Tests for the stderr logger.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createLogger,
  formatEntry,
  isLogLevel,
  logger,
  setJsonMode,
  setLogLevel,
} from '../../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
    setJsonMode(false);
    vi.restoreAllMocks();
  });

  describe('formatEntry', () => {
    const entry = {
      timestamp: '2024-01-01T12:34:56.789Z',
      level: 'info' as const,
      message: 'hello',
      meta: { a: 1, b: { c: 2 } },
    };

    it('formats a human-readable line', () => {
      expect(formatEntry(entry, false)).toBe('[12:34:56] INFO  hello (a=1 b={"c":2})');
    });

    it('omits empty metadata', () => {
      expect(formatEntry({ ...entry, level: 'warn', meta: {} }, false)).toBe(
        '[12:34:56] WARN  hello',
      );
    });

    it('emits JSON in JSON mode', () => {
      expect(JSON.parse(formatEntry(entry, true))).toEqual(entry);
    });
  });

  describe('isLogLevel', () => {
    it('accepts known levels only', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('silent')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel(undefined)).toBe(false);
    });
  });

  describe('level filtering', () => {
    it('writes entries at or above the current level to stderr', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      setLogLevel('warn');

      logger.info('hidden');
      logger.warn('shown');

      expect(write).toHaveBeenCalledTimes(1);
      expect(String(write.mock.calls[0][0])).toMatch(/WARN  shown\n$/);
    });

    it('writes nothing when silent', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      setLogLevel('silent');

      logger.error('nope');

      expect(write).not.toHaveBeenCalled();
    });
  });

  describe('createLogger', () => {
    it('prefixes messages', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      setLogLevel('debug');

      createLogger('compare').debug('done');

      expect(String(write.mock.calls[0][0])).toMatch(/DEBUG \[compare\] done\n$/);
    });
  });
});
