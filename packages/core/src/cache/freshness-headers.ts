import type { CacheableResponse } from '../types/index.js';
import { mergeMaxAge } from './cache-control-parser.js';
import { md5Hex } from './cache-key.js';

export interface PatchResponseHeadersOptions {
  /** Add a body digest ETag when none is set. Default: true */
  useEtags?: boolean;
  /** Current time in milliseconds. Default: Date.now() */
  now?: number;
}

/** IMF-fixdate, e.g. `Thu, 01 Jan 2026 00:00:00 GMT` */
export function httpDate(epochMs: number): string {
  return new Date(epochMs).toUTCString();
}

export function patchEtag(response: CacheableResponse): void {
  if (response.hasHeader('ETag') || response.body === undefined) return;
  response.setHeader('ETag', `"${md5Hex(response.body)}"`);
}

/**
 * Add ETag, Last-Modified, Expires and Cache-Control max-age to a response.
 * Headers that are already present are left alone, except max-age which is
 * lowered to `cacheTimeout` when larger. Applying it twice with the same
 * timeout and clock yields the same headers as applying it once.
 */
export function patchResponseHeaders(
  response: CacheableResponse,
  cacheTimeout: number,
  options: PatchResponseHeadersOptions = {},
): void {
  const { useEtags = true, now = Date.now() } = options;
  const timeout = Math.max(0, Math.floor(cacheTimeout));

  if (useEtags) {
    patchEtag(response);
  }
  if (!response.hasHeader('Last-Modified')) {
    response.setHeader('Last-Modified', httpDate(now));
  }
  if (!response.hasHeader('Expires')) {
    response.setHeader('Expires', httpDate(now + timeout * 1000));
  }
  response.setHeader(
    'Cache-Control',
    mergeMaxAge(response.getHeader('Cache-Control'), timeout),
  );
}
