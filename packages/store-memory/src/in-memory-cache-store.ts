import type { CacheStore } from '@page-cache/core';

export interface InMemoryCacheStoreOptions {
  /** Interval between sweeps of expired entries. 0 disables the sweep. Default: 60000 */
  cleanupIntervalMs?: number;
  /** Maximum number of entries before the least recently used is evicted. Default: 1000 */
  maxItems?: number;
  /** Approximate memory budget in bytes. Default: 50MB */
  maxMemoryBytes?: number;
  /** Share of entries evicted when the memory budget is exceeded. Default: 0.1 */
  evictionRatio?: number;
}

interface CacheEntry<T> {
  value: T;
  /** Epoch ms, 0 for entries that never expire */
  expiresAt: number;
  size: number;
}

const DEFAULT_CLEANUP_INTERVAL_MS = 60_000;
const DEFAULT_MAX_ITEMS = 1000;
const DEFAULT_MAX_MEMORY_BYTES = 50 * 1024 * 1024;
const DEFAULT_EVICTION_RATIO = 0.1;
/** Size charged for values that cannot be serialized */
const FALLBACK_ENTRY_SIZE = 1024;

/**
 * Process-local cache store with TTL expiry and LRU eviction.
 *
 * Entries are kept in a Map whose insertion order is the recency order:
 * every read or write moves the entry to the end, so the first key is
 * always the least recently used.
 */
export class InMemoryCacheStore<T = unknown> implements CacheStore<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly maxItems: number;
  private readonly maxMemoryBytes: number;
  private readonly evictionRatio: number;
  private memoryUsageBytes = 0;
  private cleanupTimer: ReturnType<typeof setInterval> | undefined;

  constructor(options: InMemoryCacheStoreOptions = {}) {
    this.maxItems = options.maxItems ?? DEFAULT_MAX_ITEMS;
    this.maxMemoryBytes = options.maxMemoryBytes ?? DEFAULT_MAX_MEMORY_BYTES;
    this.evictionRatio = options.evictionRatio ?? DEFAULT_EVICTION_RATIO;

    const cleanupIntervalMs =
      options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    if (cleanupIntervalMs > 0) {
      this.cleanupTimer = setInterval(
        () => this.cleanupExpiredItems(),
        cleanupIntervalMs,
      );
      // Never keep the process alive just for the sweep.
      this.cleanupTimer.unref();
    }
  }

  async get(hash: string): Promise<T | undefined> {
    const entry = this.entries.get(hash);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry)) {
      this.removeEntry(hash, entry);
      return undefined;
    }

    this.entries.delete(hash);
    this.entries.set(hash, entry);
    return entry.value;
  }

  async set(hash: string, value: T, ttlSeconds: number): Promise<void> {
    const existing = this.entries.get(hash);
    if (existing) {
      this.removeEntry(hash, existing);
    }
    if (ttlSeconds < 0) {
      return;
    }

    const now = Date.now();
    const entry: CacheEntry<T> = {
      value,
      expiresAt: ttlSeconds === 0 ? 0 : now + ttlSeconds * 1000,
      size: this.estimateSize(hash, value),
    };
    this.entries.set(hash, entry);
    this.memoryUsageBytes += entry.size;

    this.enforceLimits();
  }

  async delete(hash: string): Promise<void> {
    const entry = this.entries.get(hash);
    if (entry) {
      this.removeEntry(hash, entry);
    }
  }

  async clear(scope?: string): Promise<void> {
    if (!scope) {
      this.entries.clear();
      this.memoryUsageBytes = 0;
      return;
    }
    for (const [hash, entry] of this.entries) {
      if (hash.startsWith(scope)) {
        this.removeEntry(hash, entry);
      }
    }
  }

  /** Remove expired entries, returning how many were removed */
  cleanupExpiredItems(): number {
    const now = Date.now();
    let removed = 0;
    for (const [hash, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.removeEntry(hash, entry);
        removed++;
      }
    }
    return removed;
  }

  destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
    this.entries.clear();
    this.memoryUsageBytes = 0;
  }

  private isExpired(entry: CacheEntry<T>, now = Date.now()): boolean {
    return entry.expiresAt !== 0 && now >= entry.expiresAt;
  }

  private removeEntry(hash: string, entry: CacheEntry<T>): void {
    this.entries.delete(hash);
    this.memoryUsageBytes -= entry.size;
  }

  private enforceLimits(): void {
    while (this.entries.size > this.maxItems) {
      this.evictOldest(1);
    }

    if (this.memoryUsageBytes > this.maxMemoryBytes) {
      this.cleanupExpiredItems();
    }
    // The newest entry is kept even when it alone exceeds the budget.
    if (this.memoryUsageBytes > this.maxMemoryBytes) {
      this.evictOldest(
        Math.min(
          this.entries.size - 1,
          Math.max(1, Math.floor(this.entries.size * this.evictionRatio)),
        ),
      );
    }
    while (this.memoryUsageBytes > this.maxMemoryBytes && this.entries.size > 1) {
      this.evictOldest(1);
    }
  }

  private evictOldest(count: number): void {
    let evicted = 0;
    for (const [hash, entry] of this.entries) {
      if (evicted >= count) break;
      this.removeEntry(hash, entry);
      evicted++;
    }
  }

  private estimateSize(hash: string, value: T): number {
    try {
      const json = JSON.stringify(value) ?? '';
      return (hash.length + json.length) * 2;
    } catch {
      return FALLBACK_ENTRY_SIZE;
    }
  }
}
