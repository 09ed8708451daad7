import {
  generateHeaderListKey,
  generatePageKey,
  getMaxAge,
  headerListFromVary,
  isVaryWildcard,
  patchEtag,
  patchResponseHeaders,
} from '../cache/index.js';
import type { ResolvedCacheOptions } from '../config.js';
import { MissingDependencyError } from '../errors/index.js';
import type { CacheableRequest, CacheableResponse } from '../types/index.js';
import { writeEntry } from './backend.js';
import type { CacheKeyOptions } from './fetch-from-cache.js';

/**
 * Record which request headers the response varies on, under the header
 * list key for the request's path, and return the page key for this
 * request. Returns undefined for `Vary: *`, which no key can represent.
 *
 * The header list is kept in the same store as the pages. If it ages out,
 * the next request for the path rebuilds the page once to learn it again.
 */
export async function learnCacheKey(
  request: CacheableRequest,
  response: CacheableResponse,
  cacheTimeout: number,
  options: CacheKeyOptions,
): Promise<string | undefined> {
  const { cache, keyPrefix, keyContext, logger } = options;
  const vary = response.getHeader('Vary');
  if (isVaryWildcard(vary)) {
    logger.debug({ path: request.fullPath }, 'Vary: * response is not cached');
    return undefined;
  }

  const headerList = headerListFromVary(vary);
  const headerListKey = generateHeaderListKey(keyPrefix, request, keyContext);
  await writeEntry(cache, headerListKey, headerList, cacheTimeout, logger);
  return generatePageKey(
    request,
    request.method,
    headerList,
    keyPrefix,
    keyContext,
  );
}

/**
 * Response phase of the page cache. Runs after the handler and stores
 * cacheable responses for the fetch phase to find.
 */
export class UpdateCache {
  constructor(private readonly options: ResolvedCacheOptions) {}

  private shouldUpdateCache(request: CacheableRequest): boolean {
    if (request.shouldStore !== true) {
      return false;
    }
    // Only an accessed session can have influenced the response; reading
    // `accessed` does not load it.
    if (this.options.anonymousOnly && request.session?.accessed) {
      if (!request.user) {
        throw new MissingDependencyError(
          'anonymousOnly caching requires an identity on the request; ' +
            'install the authentication layer before the page cache',
        );
      }
      if (request.user.isAuthenticated()) {
        return false;
      }
    }
    return true;
  }

  async maybeStore<R extends CacheableResponse>(
    request: CacheableRequest,
    response: R,
  ): Promise<R> {
    if (!this.shouldUpdateCache(request)) {
      return response;
    }
    if (response.status !== 200) {
      return response;
    }

    const { cache, logger, useEtags } = this.options;

    // max-age from the response wins over the configured timeout;
    // max-age=0 opts the response out of caching.
    let timeout = getMaxAge(response.getHeader('Cache-Control'));
    if (timeout === undefined) {
      timeout = this.options.cacheTimeout;
    } else if (timeout === 0) {
      return response;
    }

    patchResponseHeaders(response, timeout, { useEtags });
    if (timeout <= 0) {
      return response;
    }

    const cacheKey = await learnCacheKey(
      request,
      response,
      timeout,
      this.options,
    );
    if (cacheKey === undefined) {
      return response;
    }

    const ttl = timeout;
    const deferred = response.deferred;
    if (deferred && !deferred.isFinalized) {
      deferred.onFinalize(async (finalized) => {
        if (useEtags) {
          patchEtag(finalized);
        }
        await writeEntry(cache, cacheKey, finalized.toSnapshot(), ttl, logger);
      });
    } else {
      await writeEntry(cache, cacheKey, response.toSnapshot(), ttl, logger);
    }

    logger.debug({ path: request.fullPath, key: cacheKey, ttl }, 'page stored');
    return response;
  }
}
