/**
 * Response cache - time-expiring completion cache keyed by exact input text
 */
import type { CacheStatus } from '../types/index';
import type { Clock } from './throttle';

interface CacheEntry {
  value: string;
  storedAt: number;
}

export interface ResponseCacheOptions {
  ttlMs: number;
  maxEntries: number;
}

/**
 * Entries older than the TTL read as absent. Writes beyond maxEntries sweep
 * expired entries first, then drop the oldest-written ones.
 */
export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: Clock;

  constructor(options: ResponseCacheOptions, now: Clock = Date.now) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = Math.max(1, options.maxEntries);
    this.now = now;
  }

  /**
   * Returns the cached value if present and not expired
   */
  get(key: string): string | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  /**
   * Stores (or overwrites) a value stamped with the current time
   */
  set(key: string, value: string): void {
    // Re-insert so Map iteration order tracks write order
    this.entries.delete(key);

    if (this.entries.size >= this.maxEntries) {
      this.sweep();
    }
    for (const oldestKey of this.entries.keys()) {
      if (this.entries.size < this.maxEntries) break;
      this.entries.delete(oldestKey);
    }

    this.entries.set(key, { value, storedAt: this.now() });
  }

  /**
   * Removes expired entries
   * @returns Number of entries removed
   */
  sweep(): number {
    const current = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (current - entry.storedAt >= this.ttlMs) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Time the entry for key was written, if any (expired entries included)
   */
  storedAt(key: string): number | undefined {
    return this.entries.get(key)?.storedAt;
  }

  get size(): number {
    return this.entries.size;
  }

  getStatus(): CacheStatus {
    return {
      size: this.entries.size,
      maxEntries: this.maxEntries,
      ttlMs: this.ttlMs,
    };
  }
}
