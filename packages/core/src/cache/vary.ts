import { DIRECTIVE_DELIMITER } from './cache-control-parser.js';
import type { CacheableRequest } from '../types/index.js';

/**
 * Parse a Vary header value into normalised (lowercased) header names,
 * keeping their order. Returns ['*'] for Vary: * (meaning the response
 * varies on everything).
 */
export function parseVaryHeader(
  varyHeader: string | null | undefined,
): Array<string> {
  if (!varyHeader) return [];
  const trimmed = varyHeader.trim();
  if (trimmed === '*') return ['*'];
  return trimmed
    .split(DIRECTIVE_DELIMITER)
    .map((f) => f.toLowerCase())
    .filter(Boolean);
}

/**
 * Canonical form of a request header name as stored in header lists:
 * `Accept-Language` becomes `HTTP_ACCEPT_LANGUAGE`.
 */
export function toMetaKey(headerName: string): string {
  return `HTTP_${headerName.trim().toUpperCase().replace(/-/g, '_')}`;
}

/**
 * Header list learned from a response's Vary header. Order follows the
 * Vary header; the page key hash depends on it.
 */
export function headerListFromVary(
  varyHeader: string | null | undefined,
): Array<string> {
  return parseVaryHeader(varyHeader).map(toMetaKey);
}

export function isVaryWildcard(varyHeader: string | null | undefined): boolean {
  return parseVaryHeader(varyHeader).includes('*');
}

/**
 * Request header values keyed by their canonical name. Repeated headers
 * are joined with ", ".
 */
export function requestMetaHeaders(
  request: Pick<CacheableRequest, 'headers'>,
): Map<string, string> {
  const meta = new Map<string, string>();
  for (const [name, value] of Object.entries(request.headers)) {
    if (value === undefined) continue;
    const joined = typeof value === 'string' ? value : value.join(', ');
    meta.set(toMetaKey(name), joined);
  }
  return meta;
}

export function isHeaderList(value: unknown): value is Array<string> {
  return (
    Array.isArray(value) && value.every((entry) => typeof entry === 'string')
  );
}
