export * from './cache/index.js';
export * from './errors/index.js';
export * from './http/index.js';
export * from './middleware/index.js';
export * from './stores/index.js';
export type * from './types/index.js';
export {
  validateCacheSettings,
  settingsFromEnv,
  resolveCacheOptions,
  DEFAULT_CACHE_SECONDS,
  type CacheSettings,
  type CacheSettingsInput,
  type CacheOptionsInput,
  type ResolvedCacheOptions,
} from './config.js';
export { createLogger, type Logger, type CreateLoggerOptions } from './logger.js';
