export {
  getMaxAge,
  mergeMaxAge,
  DIRECTIVE_DELIMITER,
} from './cache-control-parser.js';
export {
  parseVaryHeader,
  headerListFromVary,
  isVaryWildcard,
  isHeaderList,
  requestMetaHeaders,
  toMetaKey,
} from './vary.js';
export {
  generateHeaderListKey,
  generatePageKey,
  i18nKeySuffix,
  normalizeFullPath,
  md5Hex,
  DEFAULT_KEY_CONTEXT,
} from './cache-key.js';
export type { KeyContext } from './cache-key.js';
export {
  patchResponseHeaders,
  patchEtag,
  httpDate,
} from './freshness-headers.js';
export type { PatchResponseHeadersOptions } from './freshness-headers.js';
