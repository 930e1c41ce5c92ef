import { LRUCache } from 'lru-cache';

import type { ReportCache } from '../../core/ports.js';

/** Upper bound on cached PDF bytes, whatever the entry count */
export const REPORT_CACHE_MAX_BYTES = 64 * 1024 * 1024;

export interface ReportCacheOptions {
  /** Maximum number of cached reports */
  max: number;
  /** Time to live in milliseconds; 0 keeps entries until evicted */
  ttlMs: number;
  maxBytes?: number;
}

/**
 * In-process LRU of rendered reports. Entries are evicted by count, by total
 * size and, when `ttlMs` is positive, by age.
 */
export const createReportCache = (options: ReportCacheOptions): ReportCache => {
  const { max, ttlMs, maxBytes = REPORT_CACHE_MAX_BYTES } = options;

  const lru = new LRUCache<string, Uint8Array>({
    max: Math.max(max, 1),
    maxSize: maxBytes,
    // lru-cache rejects zero sizes
    sizeCalculation: (value) => Math.max(value.byteLength, 1),
    ...(ttlMs > 0 && { ttl: ttlMs }),
  });

  return {
    get: (key) => lru.get(key),
    set: (key, value) => {
      lru.set(key, value);
    },
  };
};
