import type { Logger } from '../logger.js';
import type { CacheStore } from '../stores/index.js';

/**
 * Read from the backend, treating any failure as a miss so the page is
 * regenerated instead of failing the request.
 */
export async function readEntry(
  cache: CacheStore,
  key: string,
  logger: Logger,
): Promise<unknown> {
  try {
    return await cache.get(key);
  } catch (error: unknown) {
    logger.warn({ err: error, key }, 'cache read failed, treating as miss');
    return undefined;
  }
}

/**
 * Write to the backend. Failures are logged and reported through the
 * return value, never thrown.
 */
export async function writeEntry(
  cache: CacheStore,
  key: string,
  value: unknown,
  ttlSeconds: number,
  logger: Logger,
): Promise<boolean> {
  try {
    await cache.set(key, value, ttlSeconds);
    return true;
  } catch (error: unknown) {
    logger.error({ err: error, key }, 'cache write failed');
    return false;
  }
}
