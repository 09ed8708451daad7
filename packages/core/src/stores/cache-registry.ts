import { UnknownCacheAliasError } from '../errors/index.js';
import type { CacheStore } from './cache-store.js';

export const DEFAULT_CACHE_ALIAS = 'default';

export interface RegisteredCache {
  store: CacheStore;
  /** Default TTL in seconds advertised by this backend */
  defaultTTL?: number;
}

export interface RegisterCacheOptions {
  defaultTTL?: number;
}

/**
 * Named cache backends. Deployments select the backend for the page cache
 * by alias, mirroring how several stores can live side by side.
 */
export class CacheRegistry {
  private readonly caches = new Map<string, RegisteredCache>();

  register(
    alias: string,
    store: CacheStore,
    options: RegisterCacheOptions = {},
  ): this {
    if (
      options.defaultTTL !== undefined &&
      (!Number.isFinite(options.defaultTTL) || options.defaultTTL < 0)
    ) {
      throw new RangeError(
        `defaultTTL for cache '${alias}' must be a non-negative number`,
      );
    }
    this.caches.set(alias, { store, defaultTTL: options.defaultTTL });
    return this;
  }

  has(alias: string): boolean {
    return this.caches.has(alias);
  }

  get(alias: string): RegisteredCache {
    const cache = this.caches.get(alias);
    if (!cache) {
      throw new UnknownCacheAliasError(alias);
    }
    return cache;
  }

  defaultTTL(alias: string): number | undefined {
    return this.get(alias).defaultTTL;
  }

  aliases(): Array<string> {
    return [...this.caches.keys()];
  }
}
