import {
  generateHeaderListKey,
  generatePageKey,
  isHeaderList,
} from '../cache/index.js';
import type { ResolvedCacheOptions } from '../config.js';
import { PageResponse, isResponseSnapshot } from '../http/page-response.js';
import type { CacheableRequest } from '../types/index.js';
import { readEntry } from './backend.js';

export type CacheKeyOptions = Pick<
  ResolvedCacheOptions,
  'cache' | 'keyPrefix' | 'keyContext' | 'logger'
>;

const CACHEABLE_METHODS = new Set(['GET', 'HEAD']);

/**
 * Page key for the request using the header list on file for its path,
 * or undefined when no header list is known (the page must be rebuilt).
 */
export async function getCacheKey(
  request: CacheableRequest,
  method: string,
  options: CacheKeyOptions,
): Promise<string | undefined> {
  const { cache, keyPrefix, keyContext, logger } = options;
  const headerListKey = generateHeaderListKey(keyPrefix, request, keyContext);
  const headerList = await readEntry(cache, headerListKey, logger);
  if (!isHeaderList(headerList)) {
    return undefined;
  }
  return generatePageKey(request, method, headerList, keyPrefix, keyContext);
}

/**
 * Request phase of the page cache. Runs before the handler and serves a
 * stored response when one matches.
 */
export class FetchFromCache {
  constructor(private readonly options: ResolvedCacheOptions) {}

  async lookup(request: CacheableRequest): Promise<PageResponse | undefined> {
    const { cache, logger, headPiggybacksOnGet } = this.options;
    const method = request.method.toUpperCase();

    if (!CACHEABLE_METHODS.has(method)) {
      request.shouldStore = false;
      return undefined;
    }

    const firstMethod = method === 'HEAD' && !headPiggybacksOnGet ? 'HEAD' : 'GET';
    const cacheKey = await getCacheKey(request, firstMethod, this.options);
    if (cacheKey === undefined) {
      logger.debug({ path: request.fullPath }, 'no header list on file');
      request.shouldStore = true;
      return undefined;
    }

    let stored = await readEntry(cache, cacheKey, logger);

    if (stored === undefined && method === 'HEAD' && firstMethod === 'GET') {
      const headKey = await getCacheKey(request, 'HEAD', this.options);
      if (headKey !== undefined) {
        stored = await readEntry(cache, headKey, logger);
      }
    }

    if (!isResponseSnapshot(stored)) {
      logger.debug({ path: request.fullPath, key: cacheKey }, 'page cache miss');
      request.shouldStore = true;
      return undefined;
    }

    logger.debug({ path: request.fullPath, key: cacheKey }, 'page cache hit');
    request.shouldStore = false;
    return PageResponse.fromSnapshot(stored);
  }
}
