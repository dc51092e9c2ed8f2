/**
 * In-memory cache of serialized calendars keyed by request fingerprint
 */

import { CacheConfig, CacheEntry, CacheStats } from '../types/cache.js';
import { CurriculumFilter } from '../types/course.js';
import { Clock, systemClock } from '../utils/clock.js';

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  ttl: 600,
  idleTimeout: 1800,
  cleanupInterval: 1800,
  maxEntries: 500
};

/**
 * Build the cache key for a calendar request. The curriculum token is used
 * verbatim, so differently spelled tokens get separate entries.
 */
export function calendarCacheKey(courseId: number, year: number, curriculum: CurriculumFilter): string {
  return `${courseId}-${year}-${curriculum ?? ''}`;
}

export class CalendarCache {
  private entries: Map<string, CacheEntry> = new Map();
  private config: CacheConfig;
  private clock: Clock;
  private stats: CacheStats;
  private cleanupTimer?: NodeJS.Timeout;

  constructor(config: Partial<CacheConfig> = {}, clock: Clock = systemClock) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
    this.clock = clock;
    this.stats = {
      hits: 0,
      misses: 0,
      entries: 0,
      evictions: 0
    };

    this.startCleanupTimer();
  }

  private startCleanupTimer(): void {
    if (this.config.cleanupInterval <= 0) {
      return;
    }

    this.cleanupTimer = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) {
        console.log(`Calendar cache sweep removed ${removed} entries`);
      }
    }, this.config.cleanupInterval * 1000);

    // The sweep alone must not keep the process running
    this.cleanupTimer.unref();
  }

  /**
   * Return the stored calendar, or `undefined` if it was never stored,
   * has expired or was evicted
   */
  get(key: string): Buffer | undefined {
    const entry = this.entries.get(key);
    const now = this.clock.now();

    if (!entry || entry.expiresAt <= now) {
      if (entry) {
        this.entries.delete(key);
        this.stats.evictions++;
      }
      this.stats.misses++;
      return undefined;
    }

    entry.lastAccessedAt = now;
    this.stats.hits++;
    return entry.data;
  }

  /**
   * Store a calendar and restart its expiry clock
   */
  set(key: string, data: Buffer): void {
    const now = this.clock.now();

    // Re-inserting moves the key to the end of the Map's insertion order
    this.entries.delete(key);
    this.entries.set(key, {
      key,
      data,
      cachedAt: now,
      expiresAt: now + this.config.ttl * 1000,
      lastAccessedAt: now
    });

    if (this.entries.size > this.config.maxEntries) {
      this.evictOldestEntries();
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }

  private evictOldestEntries(): void {
    const toRemove = this.entries.size - this.config.maxEntries;
    const keys = Array.from(this.entries.keys()).slice(0, toRemove);

    for (const key of keys) {
      this.entries.delete(key);
      this.stats.evictions++;
    }
  }

  /**
   * Drop expired entries and entries idle for longer than the idle timeout.
   * Returns the number of removed entries.
   */
  sweep(): number {
    const now = this.clock.now();
    const idleCutoff = now - this.config.idleTimeout * 1000;
    let removed = 0;

    for (const [key, entry] of this.entries.entries()) {
      if (entry.expiresAt <= now || entry.lastAccessedAt <= idleCutoff) {
        this.entries.delete(key);
        removed++;
      }
    }

    this.stats.evictions += removed;
    return removed;
  }

  getStats(): CacheStats {
    return {
      ...this.stats,
      entries: this.entries.size
    };
  }

  /**
   * Clear all cached calendars
   */
  clear(): void {
    this.entries.clear();
  }

  close(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }
}
