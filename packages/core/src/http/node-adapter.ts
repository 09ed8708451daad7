import type { IncomingMessage, ServerResponse } from 'http';
import type { Logger } from '../logger.js';
import type { CacheMiddleware, PageHandler } from '../middleware/index.js';
import type {
  CacheableResponse,
  IdentityAware,
  SessionAware,
} from '../types/index.js';
import { PageRequest } from './page-request.js';

export type IncomingRequestLike = Pick<
  IncomingMessage,
  'method' | 'url' | 'headers'
>;

export type ServerResponseLike = Pick<
  ServerResponse,
  'writeHead' | 'end' | 'headersSent'
>;

export interface ToPageRequestOptions {
  languageCode?: string;
  timeZone?: string;
  session?: SessionAware;
  user?: IdentityAware;
}

export type RequestContextResolver = (
  req: IncomingRequestLike,
) => ToPageRequestOptions;

export function toPageRequest(
  req: IncomingRequestLike,
  options: ToPageRequestOptions = {},
): PageRequest {
  return new PageRequest({
    method: req.method ?? 'GET',
    fullPath: req.url ?? '/',
    headers: req.headers,
    ...options,
  });
}

/**
 * Send a page response, producing a deferred body first. HEAD responses
 * carry the headers only.
 */
export async function writePageResponse(
  res: ServerResponseLike,
  response: CacheableResponse,
  method: string,
): Promise<void> {
  await response.deferred?.finalize();
  const { headers, body } = response.toSnapshot();
  const payload = Buffer.from(body, 'base64');
  res.writeHead(response.status, {
    ...headers,
    'content-length': String(payload.byteLength),
  });
  res.end(method.toUpperCase() === 'HEAD' ? undefined : payload);
}

export interface RequestListenerOptions {
  resolveContext?: RequestContextResolver;
}

/**
 * Node `http` request listener serving `handler` through the page cache.
 */
export function createRequestListener(
  cache: CacheMiddleware,
  handler: PageHandler<PageRequest>,
  options: RequestListenerOptions = {},
): (req: IncomingRequestLike, res: ServerResponseLike) => void {
  const logger: Logger = cache.options.logger;

  return (req, res) => {
    Promise.resolve()
      .then(async () => {
        const request = toPageRequest(req, options.resolveContext?.(req));
        const response = await cache.handle(request, handler);
        await writePageResponse(res, response, request.method);
      })
      .catch((error: unknown) => {
        logger.error({ err: error, path: req.url ?? '/' }, 'request failed');
        if (res.headersSent) {
          res.end();
          return;
        }
        res.writeHead(500, { 'content-type': 'text/plain; charset=utf-8' });
        res.end('Internal Server Error');
      })
      .catch((error: unknown) => {
        logger.error({ err: error, path: req.url ?? '/' }, 'error response failed');
      });
  };
}
