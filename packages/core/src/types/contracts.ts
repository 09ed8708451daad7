export type HeaderValue = string | ReadonlyArray<string> | undefined;

export type RequestHeaders = Readonly<Record<string, HeaderValue>>;

/**
 * Session handle that reports whether it was materialized during the
 * current request. Reading `accessed` must not load the session.
 */
export interface SessionAware {
  readonly accessed: boolean;
}

export interface IdentityAware {
  isAuthenticated(): boolean;
}

export interface CacheableRequest {
  readonly method: string;
  /** Path including the query string, e.g. `/articles?page=2` */
  readonly fullPath: string;
  readonly headers: RequestHeaders;
  /** Locale resolved by an upstream locale middleware, if any */
  readonly languageCode?: string;
  /** Time zone resolved for this request, if any */
  readonly timeZone?: string;
  readonly session?: SessionAware;
  readonly user?: IdentityAware;
  /**
   * Set once by the fetch phase, read once by the update phase.
   * `undefined` means the fetch phase never ran for this request.
   */
  shouldStore?: boolean;
}

/**
 * Serializable copy of a response as written to a cache store.
 * Header names are lowercased; the body is base64 encoded.
 */
export interface ResponseSnapshot {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export type FinalizeCallback = (
  response: CacheableResponse,
) => void | Promise<void>;

/**
 * Capability of responses whose body is produced after the headers have
 * been inspected (templates rendered late, streamed bodies collected, ...).
 */
export interface DeferredRenderable {
  readonly isFinalized: boolean;
  /** Register a callback to run once the body is available. */
  onFinalize(callback: FinalizeCallback): void;
  finalize(): Promise<void>;
}

export interface CacheableResponse {
  status: number;
  /** Undefined while a deferred body has not been produced */
  readonly body: Buffer | undefined;
  hasHeader(name: string): boolean;
  getHeader(name: string): string | undefined;
  setHeader(name: string, value: string): void;
  toSnapshot(): ResponseSnapshot;
  readonly deferred?: DeferredRenderable;
}
