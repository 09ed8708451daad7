export {
  FetchFromCache,
  getCacheKey,
  type CacheKeyOptions,
} from './fetch-from-cache.js';
export { UpdateCache, learnCacheKey } from './update-cache.js';
export {
  CacheMiddleware,
  cachePage,
  type CacheMiddlewareOptions,
  type PageHandler,
} from './cache-middleware.js';
