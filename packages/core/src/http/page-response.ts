import { PageCacheError } from '../errors/index.js';
import type {
  CacheableResponse,
  DeferredRenderable,
  FinalizeCallback,
  ResponseSnapshot,
} from '../types/index.js';

export type BodyRenderer = () => Promise<Buffer | string> | Buffer | string;

export interface PageResponseInit {
  status?: number;
  headers?: Record<string, string>;
  body?: Buffer | string;
  /**
   * Produce the body later. The response stays unfinalized until
   * `finalize()` is called.
   */
  render?: BodyRenderer;
}

function toBuffer(body: Buffer | string): Buffer {
  return typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
}

export class PageResponse implements CacheableResponse, DeferredRenderable {
  status: number;
  private readonly headerMap = new Map<string, string>();
  private content: Buffer | undefined;
  private readonly renderer: BodyRenderer | undefined;
  private readonly finalizeCallbacks: Array<FinalizeCallback> = [];

  constructor(init: PageResponseInit = {}) {
    this.status = init.status ?? 200;
    for (const [name, value] of Object.entries(init.headers ?? {})) {
      this.setHeader(name, value);
    }
    this.renderer = init.render;
    this.content = init.render ? undefined : toBuffer(init.body ?? '');
  }

  static fromSnapshot(snapshot: ResponseSnapshot): PageResponse {
    return new PageResponse({
      status: snapshot.status,
      headers: { ...snapshot.headers },
      body: Buffer.from(snapshot.body, 'base64'),
    });
  }

  get body(): Buffer | undefined {
    return this.content;
  }

  get isFinalized(): boolean {
    return this.content !== undefined;
  }

  get deferred(): DeferredRenderable | undefined {
    return this.renderer ? this : undefined;
  }

  hasHeader(name: string): boolean {
    return this.headerMap.has(name.toLowerCase());
  }

  getHeader(name: string): string | undefined {
    return this.headerMap.get(name.toLowerCase());
  }

  setHeader(name: string, value: string): void {
    this.headerMap.set(name.toLowerCase(), value);
  }

  removeHeader(name: string): void {
    this.headerMap.delete(name.toLowerCase());
  }

  /** Copy of the headers, keyed by lowercased name */
  headers(): Record<string, string> {
    return Object.fromEntries(this.headerMap);
  }

  text(): string | undefined {
    return this.content?.toString('utf8');
  }

  /**
   * Callbacks run in registration order during `finalize()`. A callback
   * registered after finalization runs on the next `finalize()` call.
   */
  onFinalize(callback: FinalizeCallback): void {
    this.finalizeCallbacks.push(callback);
  }

  async finalize(): Promise<void> {
    if (this.content === undefined && this.renderer) {
      this.content = toBuffer(await this.renderer());
    }
    const callbacks = this.finalizeCallbacks.splice(0);
    for (const callback of callbacks) {
      await callback(this);
    }
  }

  toSnapshot(): ResponseSnapshot {
    if (this.content === undefined) {
      throw new PageCacheError(
        'Cannot snapshot a response before its body is finalized',
      );
    }
    return {
      status: this.status,
      headers: this.headers(),
      body: this.content.toString('base64'),
    };
  }
}

export function isResponseSnapshot(value: unknown): value is ResponseSnapshot {
  if (typeof value !== 'object' || value === null) return false;
  if (!('status' in value) || typeof value.status !== 'number') return false;
  if (!('body' in value) || typeof value.body !== 'string') return false;
  if (
    !('headers' in value) ||
    typeof value.headers !== 'object' ||
    value.headers === null
  ) {
    return false;
  }
  return Object.values(value.headers).every((v) => typeof v === 'string');
}
