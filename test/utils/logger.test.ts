/**
 * Tests for the stderr logger.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  formatEntry,
  isLogLevel,
  setJsonMode,
  setLogLevel,
} from '../../src/utils/logger.js';

describe('logger', () => {
  let writes: string[];
  const log = createLogger('test');

  beforeEach(() => {
    writes = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk));
      return true;
    });
    setJsonMode(false);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('info');
    setJsonMode(false);
  });

  describe('level filtering', () => {
    it('drops messages below the current level', () => {
      setLogLevel('warn');

      log.info('hidden');
      log.warn('shown');
      log.error('also shown');

      expect(writes).toHaveLength(2);
      expect(writes[0]).toMatch(/WARN  \[test\] shown\n$/);
      expect(writes[1]).toMatch(/ERROR \[test\] also shown\n$/);
    });

    it('prints nothing when silent', () => {
      setLogLevel('silent');
      log.error('nope');
      expect(writes).toEqual([]);
    });
  });

  describe('createLogger', () => {
    it('prefixes messages', () => {
      setLogLevel('debug');
      createLogger('exact-tour').debug('Exact tour', { nodes: 4 });

      expect(writes).toHaveLength(1);
      expect(writes[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] DEBUG \[exact-tour\] Exact tour \(nodes=4\)\n$/);
    });
  });

  describe('formatEntry', () => {
    const entry = {
      timestamp: '2026-01-02T03:04:05.678Z',
      level: 'info' as const,
      message: 'Solved',
      meta: { cost: 8, tour: [0, 1, 2, 3, 0] },
    };

    it('formats text lines with metadata', () => {
      expect(formatEntry(entry, false)).toBe('[03:04:05] INFO  Solved (cost=8 tour=[0,1,2,3,0])');
    });

    it('formats JSON lines', () => {
      expect(JSON.parse(formatEntry(entry, true))).toEqual(entry);
    });

    it('omits empty metadata', () => {
      expect(formatEntry({ ...entry, meta: {} }, false)).toBe('[03:04:05] INFO  Solved');
    });
  });

  describe('isLogLevel', () => {
    it('accepts known levels only', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('silent')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });
});
