export {
  PageCacheError,
  MissingDependencyError,
  UnknownCacheAliasError,
} from './page-cache-error.js';
