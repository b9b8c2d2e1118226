/**
 * Header Cache - In-memory TTL store from cache key to header-set snapshot
 *
 * Entries are frozen when written and replaced wholesale on refresh, so a
 * reader that got an entry outside the per-key lock can keep using it
 * while a new solve writes a successor.
 *
 * All methods are synchronous: on the single event-loop thread each call
 * runs to completion before any other pipeline run observes the map.
 */

import type { CacheEntry, HeaderSet } from '../types/index.js';

interface CacheOptions {
  ttlMs?: number; // Default 5 minutes
}

const DEFAULT_TTL = 5 * 60 * 1000;

export class HeaderCache {
  private cache: Map<string, CacheEntry> = new Map();
  private ttlMs: number;

  constructor(options: CacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL;
  }

  get ttl(): number {
    return this.ttlMs;
  }

  private isFresh(entry: CacheEntry, now: number): boolean {
    return now - entry.createdAt < this.ttlMs;
  }

  /**
   * Get an entry if it exists and is still fresh. Expired entries are
   * dropped on read.
   */
  get(key: string): CacheEntry | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      return undefined;
    }

    if (!this.isFresh(entry, Date.now())) {
      this.cache.delete(key);
      return undefined;
    }

    return entry;
  }

  /**
   * Store headers under key, overwriting any prior entry
   */
  put(key: string, headers: HeaderSet): CacheEntry {
    const entry: CacheEntry = Object.freeze({
      headers: Object.isFrozen(headers) ? headers : Object.freeze({ ...headers }),
      createdAt: Date.now(),
    });
    this.cache.set(key, entry);
    return entry;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  /**
   * Remove all expired entries
   */
  cleanup(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (!this.isFresh(entry, now)) {
        this.cache.delete(key);
        removed++;
      }
    }

    return removed;
  }

  clear(): void {
    this.cache.clear();
  }

  getStats(): {
    size: number;
    ttlMs: number;
    oldestEntry: number | null;
    newestEntry: number | null;
  } {
    let oldest: number | null = null;
    let newest: number | null = null;

    for (const entry of this.cache.values()) {
      if (oldest === null || entry.createdAt < oldest) {
        oldest = entry.createdAt;
      }
      if (newest === null || entry.createdAt > newest) {
        newest = entry.createdAt;
      }
    }

    return {
      size: this.cache.size,
      ttlMs: this.ttlMs,
      oldestEntry: oldest,
      newestEntry: newest,
    };
  }
}
