export { PageRequest, LazySession, type PageRequestInit } from './page-request.js';
export {
  PageResponse,
  isResponseSnapshot,
  type PageResponseInit,
  type BodyRenderer,
} from './page-response.js';
export {
  toPageRequest,
  writePageResponse,
  createRequestListener,
  type IncomingRequestLike,
  type ServerResponseLike,
  type ToPageRequestOptions,
  type RequestContextResolver,
  type RequestListenerOptions,
} from './node-adapter.js';
