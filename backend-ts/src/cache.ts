/**
 * In-memory response cache with TTL expiry and access-count eviction.
 *
 * All operations are synchronous, so on Node's single thread each one runs to
 * completion before any other cache call can observe the map.
 */

import type { CacheStats, SweepResult } from '@ollama-relay/shared';
import { isCacheKey, type CacheKey } from './cache-key.js';
import { logger } from './logger.js';

export interface CacheEntry<T> {
  key: CacheKey;
  value: T;
  createdAt: number;
  expiresAt: number;
  accessCount: number;
}

export interface CacheOptions {
  ttlMs?: number; // Time to live in milliseconds
  maxSize?: number; // Maximum number of entries
}

export const DEFAULT_TTL_MS = 3600000;
export const DEFAULT_MAX_SIZE = 1000;

export class ResponseCache<T> {
  private entries = new Map<CacheKey, CacheEntry<T>>();
  readonly ttlMs: number;
  readonly maxSize: number;

  constructor(options: CacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxSize = Math.max(1, options.maxSize ?? DEFAULT_MAX_SIZE);
  }

  /**
   * Returns the cached value and bumps its access count, or null on a miss.
   * Expired entries are dropped on the way.
   */
  get(key: CacheKey): T | null {
    if (!isCacheKey(key)) {
      return null;
    }

    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (Date.now() > entry.expiresAt) {
      this.entries.delete(key);
      logger.debug(`Dropped expired cache entry: ${key}`);
      return null;
    }

    entry.accessCount += 1;
    return entry.value;
  }

  /**
   * Read-only view of an entry, expired or not.
   */
  peek(key: CacheKey): Readonly<CacheEntry<T>> | null {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : null;
  }

  put(key: CacheKey, value: T): void {
    if (!isCacheKey(key)) {
      logger.warn(`Refusing to cache under malformed key: ${key}`);
      return;
    }

    const now = Date.now();
    this.entries.set(key, {
      key,
      value,
      createdAt: now,
      expiresAt: now + this.ttlMs,
      accessCount: 1,
    });
    this.sweep();
  }

  /**
   * Re-insert an entry loaded from durable storage, keeping its timestamps.
   * Returns false if the entry was already expired.
   */
  restore(entry: CacheEntry<T>): boolean {
    if (!isCacheKey(entry.key) || Date.now() > entry.expiresAt) {
      return false;
    }
    this.entries.set(entry.key, { ...entry, accessCount: Math.max(1, entry.accessCount) });
    this.sweep();
    return true;
  }

  delete(key: CacheKey): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Drop expired entries, then enforce the size bound.
   */
  sweep(): SweepResult {
    return {
      expired: this.evictExpired(),
      evicted: this.evictOverflow(),
    };
  }

  stats(): CacheStats {
    const now = Date.now();
    let valid = 0;
    let expired = 0;
    let totalAccesses = 0;

    for (const entry of this.entries.values()) {
      if (now > entry.expiresAt) {
        expired += 1;
      } else {
        valid += 1;
      }
      totalAccesses += entry.accessCount;
    }

    return {
      total: this.entries.size,
      valid,
      expired,
      totalAccesses,
      maxSize: this.maxSize,
      ttlMs: this.ttlMs,
    };
  }

  private evictExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now > entry.expiresAt) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  /**
   * Batch eviction: once over maxSize, shrink to half of it in one pass,
   * least-accessed first and oldest first among equals.
   */
  private evictOverflow(): number {
    if (this.entries.size <= this.maxSize) {
      return 0;
    }

    const target = Math.floor(this.maxSize / 2);
    const ranked = [...this.entries.values()].sort(
      (a, b) => a.accessCount - b.accessCount || a.createdAt - b.createdAt
    );

    let evicted = 0;
    for (const entry of ranked) {
      if (this.entries.size <= target) {
        break;
      }
      this.entries.delete(entry.key);
      evicted += 1;
    }

    logger.debug(`Evicted ${evicted} cache entries (size now ${this.entries.size}/${this.maxSize})`);
    return evicted;
  }
}
