/**
 * Cache-related types and interfaces
 */

export interface CacheConfig {
  ttl: number; // Seconds a stored calendar stays fresh
  idleTimeout: number; // Seconds without reads or writes before the sweep drops an entry
  cleanupInterval: number; // Interval in seconds between background sweeps
  maxEntries: number; // Maximum number of calendars kept in memory
}

export interface CacheEntry {
  key: string;
  data: Buffer;
  cachedAt: number;
  expiresAt: number;
  lastAccessedAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  entries: number;
  evictions: number;
}
