export { InMemoryCacheStore } from './in-memory-cache-store.js';
export type { InMemoryCacheStoreOptions } from './in-memory-cache-store.js';

// Re-export the store interface from the core package for convenience
export type { CacheStore } from '@page-cache/core';
