export type { CacheStore } from './cache-store.js';
export {
  CacheRegistry,
  DEFAULT_CACHE_ALIAS,
  type RegisteredCache,
  type RegisterCacheOptions,
} from './cache-registry.js';
