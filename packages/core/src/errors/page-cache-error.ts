/**
 * Base error class for page cache failures.
 * Consumers can match on `instanceof PageCacheError` to separate cache
 * configuration problems from application errors.
 */
export class PageCacheError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PageCacheError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when a configured policy needs a collaborator the request does not
 * provide, e.g. `anonymousOnly` without an identity on the request.
 */
export class MissingDependencyError extends PageCacheError {
  constructor(message: string) {
    super(message);
    this.name = 'MissingDependencyError';
  }
}

export class UnknownCacheAliasError extends PageCacheError {
  public readonly alias: string;

  constructor(alias: string) {
    super(`No cache store registered under alias '${alias}'`);
    this.name = 'UnknownCacheAliasError';
    this.alias = alias;
  }
}
