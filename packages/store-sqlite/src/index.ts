export { SQLiteCacheStore } from './sqlite-cache-store.js';
export type { SQLiteCacheStoreOptions } from './sqlite-cache-store.js';
export * from './schema.js';

// Re-export the store interface from the core package for convenience
export type { CacheStore } from '@page-cache/core';
