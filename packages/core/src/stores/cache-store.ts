/**
 * Key-value backend used for both header lists and page snapshots.
 *
 * TTL semantics shared by the bundled stores:
 *  - `ttlSeconds > 0`  entry expires after that many (possibly fractional) seconds
 *  - `ttlSeconds === 0` entry never expires
 *  - `ttlSeconds < 0`  entry is expired immediately
 */
export interface CacheStore<T = unknown> {
  /**
   * Retrieve a value from the cache
   * @param hash The cache key
   * @returns The cached value or undefined if absent or expired
   */
  get(hash: string): Promise<T | undefined>;

  /**
   * Store a value in the cache
   * @param hash The cache key
   * @param value The value to store
   * @param ttlSeconds Time to live in seconds
   */
  set(hash: string, value: T, ttlSeconds: number): Promise<void>;

  /**
   * Remove a value from the cache
   */
  delete(hash: string): Promise<void>;

  /**
   * Remove every entry, or only the entries whose key starts with `scope`
   */
  clear(scope?: string): Promise<void>;
}
