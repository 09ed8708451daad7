export type {
  HeaderValue,
  RequestHeaders,
  SessionAware,
  IdentityAware,
  CacheableRequest,
  ResponseSnapshot,
  FinalizeCallback,
  DeferredRenderable,
  CacheableResponse,
} from './contracts.js';
