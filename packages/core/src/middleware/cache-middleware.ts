import {
  resolveCacheOptions,
  type CacheOptionsInput,
  type ResolvedCacheOptions,
} from '../config.js';
import type { CacheableRequest, CacheableResponse } from '../types/index.js';
import { FetchFromCache } from './fetch-from-cache.js';
import { UpdateCache } from './update-cache.js';

export type PageHandler<
  Req extends CacheableRequest = CacheableRequest,
  Res extends CacheableResponse = CacheableResponse,
> = (request: Req) => Promise<Res>;

export type CacheMiddlewareOptions = CacheOptionsInput;

/**
 * Single-entry page cache for simple deployments: fetch phase, handler on
 * a miss, then update phase. Deployments whose other layers change the key
 * inputs (locale resolution, for one) should run `FetchFromCache` and
 * `UpdateCache` at their own positions instead.
 */
export class CacheMiddleware {
  readonly options: ResolvedCacheOptions;
  private readonly fetchPhase: FetchFromCache;
  private readonly updatePhase: UpdateCache;

  constructor(options: CacheMiddlewareOptions) {
    this.options = resolveCacheOptions(options);
    this.fetchPhase = new FetchFromCache(this.options);
    this.updatePhase = new UpdateCache(this.options);
  }

  lookup(request: CacheableRequest): ReturnType<FetchFromCache['lookup']> {
    return this.fetchPhase.lookup(request);
  }

  maybeStore<R extends CacheableResponse>(
    request: CacheableRequest,
    response: R,
  ): Promise<R> {
    return this.updatePhase.maybeStore(request, response);
  }

  async handle<Req extends CacheableRequest>(
    request: Req,
    handler: PageHandler<Req>,
  ): Promise<CacheableResponse> {
    const cached = await this.fetchPhase.lookup(request);
    if (cached) {
      return cached;
    }
    const response = await handler(request);
    return this.updatePhase.maybeStore(request, response);
  }
}

/**
 * Wrap a single handler with its own page cache, e.g. to cache one view
 * with a longer timeout than the rest of the site.
 */
export function cachePage<Req extends CacheableRequest>(
  handler: PageHandler<Req>,
  options: CacheMiddlewareOptions,
): PageHandler<Req> {
  const middleware = new CacheMiddleware(options);
  return (request) => middleware.handle(request, handler);
}
