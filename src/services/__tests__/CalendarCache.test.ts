/**
 * Unit tests for CalendarCache
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CalendarCache, calendarCacheKey } from '../CalendarCache.js';
import { ManualClock } from '../../__tests__/helpers.js';

const SECOND = 1000;

describe('CalendarCache', () => {
  let clock: ManualClock;
  let cache: CalendarCache;

  beforeEach(() => {
    clock = new ManualClock();
    cache = new CalendarCache({ ttl: 600, idleTimeout: 1800, cleanupInterval: 0, maxEntries: 10 }, clock);
  });

  afterEach(() => {
    cache.close();
  });

  describe('calendarCacheKey', () => {
    it('should combine course id, year and curriculum', () => {
      expect(calendarCacheKey(42, 1, 'A58-000')).toBe('42-1-A58-000');
    });

    it('should use an empty curriculum part when there is no filter', () => {
      expect(calendarCacheKey(42, 1, undefined)).toBe('42-1-');
    });

    it('should keep curriculum tokens verbatim', () => {
      expect(calendarCacheKey(42, 1, 'abc')).not.toBe(calendarCacheKey(42, 1, 'ABC'));
      expect(calendarCacheKey(42, 1, ' abc')).not.toBe(calendarCacheKey(42, 1, 'abc'));
    });
  });

  describe('get and set', () => {
    it('should store and retrieve a calendar', () => {
      const data = Buffer.from('BEGIN:VCALENDAR');
      cache.set('42-1-', data);

      expect(cache.get('42-1-')).toBe(data);
    });

    it('should return undefined for a cache miss', () => {
      expect(cache.get('never-stored')).toBeUndefined();
    });

    it('should keep entries for different keys apart', () => {
      cache.set('42-1-', Buffer.from('first'));
      cache.set('42-2-', Buffer.from('second'));

      expect(cache.get('42-1-')?.toString()).toBe('first');
      expect(cache.get('42-2-')?.toString()).toBe('second');
    });

    it('should overwrite an existing entry', () => {
      cache.set('42-1-', Buffer.from('old'));
      cache.set('42-1-', Buffer.from('new'));

      expect(cache.get('42-1-')?.toString()).toBe('new');
      expect(cache.size).toBe(1);
    });
  });

  describe('expiry', () => {
    it('should serve an entry until its TTL lapses', () => {
      cache.set('42-1-', Buffer.from('calendar'));

      clock.advance(600 * SECOND - 1);
      expect(cache.get('42-1-')).toBeDefined();

      clock.advance(1);
      expect(cache.get('42-1-')).toBeUndefined();
      expect(cache.size).toBe(0);
    });

    it('should not extend the TTL on reads', () => {
      cache.set('42-1-', Buffer.from('calendar'));

      clock.advance(400 * SECOND);
      expect(cache.get('42-1-')).toBeDefined();

      clock.advance(200 * SECOND);
      expect(cache.get('42-1-')).toBeUndefined();
    });

    it('should restart the TTL when an entry is stored again', () => {
      cache.set('42-1-', Buffer.from('first'));
      clock.advance(500 * SECOND);
      cache.set('42-1-', Buffer.from('second'));
      clock.advance(500 * SECOND);

      expect(cache.get('42-1-')?.toString()).toBe('second');
    });
  });

  describe('sweep', () => {
    it('should remove expired entries', () => {
      cache.set('42-1-', Buffer.from('a'));
      cache.set('42-2-', Buffer.from('b'));
      clock.advance(601 * SECOND);

      expect(cache.sweep()).toBe(2);
      expect(cache.size).toBe(0);
    });

    it('should remove entries idle for longer than the idle timeout', () => {
      const longLived = new CalendarCache({ ttl: 3600, idleTimeout: 1800, cleanupInterval: 0, maxEntries: 10 }, clock);
      longLived.set('read', Buffer.from('a'));
      longLived.set('idle', Buffer.from('b'));

      clock.advance(1000 * SECOND);
      expect(longLived.get('read')).toBeDefined();
      clock.advance(900 * SECOND);

      expect(longLived.sweep()).toBe(1);
      expect(longLived.get('read')?.toString()).toBe('a');
      expect(longLived.get('idle')).toBeUndefined();
      longLived.close();
    });

    it('should keep fresh entries', () => {
      cache.set('42-1-', Buffer.from('a'));
      clock.advance(10 * SECOND);

      expect(cache.sweep()).toBe(0);
      expect(cache.size).toBe(1);
    });
  });

  describe('size limit', () => {
    it('should evict the oldest stored entries beyond maxEntries', () => {
      const small = new CalendarCache({ maxEntries: 2, cleanupInterval: 0 }, clock);
      small.set('a', Buffer.from('a'));
      small.set('b', Buffer.from('b'));
      small.set('c', Buffer.from('c'));

      expect(small.get('a')).toBeUndefined();
      expect(small.get('b')).toBeDefined();
      expect(small.get('c')).toBeDefined();
      small.close();
    });

    it('should treat a rewritten entry as the newest', () => {
      const small = new CalendarCache({ maxEntries: 2, cleanupInterval: 0 }, clock);
      small.set('a', Buffer.from('a'));
      small.set('b', Buffer.from('b'));
      small.set('a', Buffer.from('a2'));
      small.set('c', Buffer.from('c'));

      expect(small.get('b')).toBeUndefined();
      expect(small.get('a')?.toString()).toBe('a2');
      small.close();
    });
  });

  describe('statistics', () => {
    it('should count hits, misses and evictions', () => {
      cache.set('42-1-', Buffer.from('a'));
      cache.get('42-1-');
      cache.get('42-1-');
      cache.get('42-2-');
      clock.advance(601 * SECOND);
      cache.get('42-1-');

      expect(cache.getStats()).toEqual({
        hits: 2,
        misses: 2,
        entries: 0,
        evictions: 1
      });
    });
  });

  describe('background cleanup', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should sweep expired entries on the cleanup interval', () => {
      const swept = new CalendarCache({ ttl: 30, idleTimeout: 1800, cleanupInterval: 60, maxEntries: 10 }, clock);
      swept.set('42-1-', Buffer.from('a'));
      clock.advance(31 * SECOND);

      vi.advanceTimersByTime(60 * SECOND);

      expect(swept.size).toBe(0);
      swept.close();
    });

    it('should stop the cleanup timer on close', () => {
      const swept = new CalendarCache({ cleanupInterval: 60 }, clock);
      expect(vi.getTimerCount()).toBe(1);

      swept.close();

      expect(vi.getTimerCount()).toBe(0);
    });

    it('should not start a timer when the cleanup interval is zero', () => {
      const manual = new CalendarCache({ cleanupInterval: 0 }, clock);

      expect(vi.getTimerCount()).toBe(0);
      manual.close();
    });
  });

  describe('clear', () => {
    it('should drop every entry', () => {
      cache.set('a', Buffer.from('a'));
      cache.set('b', Buffer.from('b'));
      cache.clear();

      expect(cache.size).toBe(0);
      expect(cache.get('a')).toBeUndefined();
    });
  });
});
