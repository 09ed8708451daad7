import type {
  CacheableRequest,
  IdentityAware,
  RequestHeaders,
  SessionAware,
} from '../types/index.js';

export interface PageRequestInit {
  method?: string;
  fullPath: string;
  headers?: RequestHeaders;
  languageCode?: string;
  timeZone?: string;
  session?: SessionAware;
  user?: IdentityAware;
}

export class PageRequest implements CacheableRequest {
  readonly method: string;
  readonly fullPath: string;
  readonly headers: RequestHeaders;
  readonly languageCode?: string;
  readonly timeZone?: string;
  readonly session?: SessionAware;
  readonly user?: IdentityAware;
  shouldStore?: boolean;

  constructor(init: PageRequestInit) {
    this.method = (init.method ?? 'GET').toUpperCase();
    this.fullPath = init.fullPath;
    this.headers = init.headers ?? {};
    this.languageCode = init.languageCode;
    this.timeZone = init.timeZone;
    this.session = init.session;
    this.user = init.user;
  }
}

/**
 * Session that is only loaded when `load()` is first called, and records
 * that it was.
 */
export class LazySession<T> implements SessionAware {
  private state: { value: T } | undefined;

  constructor(private readonly loader: () => T) {}

  get accessed(): boolean {
    return this.state !== undefined;
  }

  load(): T {
    if (!this.state) {
      this.state = { value: this.loader() };
    }
    return this.state.value;
  }
}
