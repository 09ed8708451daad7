import { createHash } from 'crypto';
import type { CacheableRequest } from '../types/index.js';
import { requestMetaHeaders } from './vary.js';

const HEADER_LIST_NAMESPACE = 'page-cache.header-list';
const PAGE_NAMESPACE = 'page-cache.page';

/**
 * Deployment-wide inputs that partition keys per locale and time zone.
 */
export interface KeyContext {
  useI18n: boolean;
  useTz: boolean;
  /** Fallback when the request carries no resolved locale */
  languageCode: string;
  /** Fallback when the request carries no resolved time zone */
  timeZone: string;
}

export const DEFAULT_KEY_CONTEXT: KeyContext = {
  useI18n: false,
  useTz: false,
  languageCode: 'en-us',
  timeZone: 'UTC',
};

type KeyRequest = Pick<
  CacheableRequest,
  'fullPath' | 'headers' | 'languageCode' | 'timeZone'
>;

export function md5Hex(input: string | Buffer): string {
  return createHash('md5').update(input).digest('hex');
}

/**
 * Convert an IRI path (possibly holding non-ASCII text) into URI form.
 * Reserved characters, `%`, `[` and `]` are kept as they are, and percent
 * escapes are uppercased so equivalent spellings derive the same key.
 */
export function normalizeFullPath(fullPath: string): string {
  let encoded: string;
  try {
    encoded = encodeURI(fullPath)
      .replace(/%25/g, '%')
      .replace(/%5B/g, '[')
      .replace(/%5D/g, ']');
  } catch {
    // Lone surrogates cannot be encoded; hash the path as given.
    encoded = fullPath;
  }
  return encoded.replace(/%[0-9a-f]{2}/gi, (escape) => escape.toUpperCase());
}

export function i18nKeySuffix(request: KeyRequest, context: KeyContext): string {
  let suffix = '';
  if (context.useI18n) {
    suffix += `.${request.languageCode ?? context.languageCode}`;
  }
  if (context.useTz) {
    suffix += `.${request.timeZone ?? context.timeZone}`;
  }
  return suffix;
}

/**
 * Key under which the header list for the request's path is stored.
 * Depends on the path, the prefix and the locale context only, so it can be
 * computed before any response exists.
 */
export function generateHeaderListKey(
  keyPrefix: string,
  request: KeyRequest,
  context: KeyContext = DEFAULT_KEY_CONTEXT,
): string {
  const path = md5Hex(normalizeFullPath(request.fullPath));
  return `${HEADER_LIST_NAMESPACE}.${keyPrefix}.${path}${i18nKeySuffix(request, context)}`;
}

/**
 * Key for one variant of a page: the values of the headers named in
 * `headerList` are hashed in list order. Missing headers contribute nothing.
 */
export function generatePageKey(
  request: KeyRequest,
  method: string,
  headerList: ReadonlyArray<string>,
  keyPrefix: string,
  context: KeyContext = DEFAULT_KEY_CONTEXT,
): string {
  const meta = requestMetaHeaders(request);
  const ctx = createHash('md5');
  for (const header of headerList) {
    const value = meta.get(header);
    if (value !== undefined) {
      ctx.update(value);
    }
  }
  const path = md5Hex(normalizeFullPath(request.fullPath));
  return `${PAGE_NAMESPACE}.${keyPrefix}.${method.toUpperCase()}.${path}.${ctx.digest('hex')}${i18nKeySuffix(request, context)}`;
}
