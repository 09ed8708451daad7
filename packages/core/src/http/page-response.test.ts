import { describe, it, expect, vi } from 'vitest';
import { PageCacheError } from '../errors/index.js';
import { PageResponse, isResponseSnapshot } from './page-response.js';

describe('PageResponse', () => {
  it('defaults to an empty 200 response', () => {
    const response = new PageResponse();
    expect(response.status).toBe(200);
    expect(response.text()).toBe('');
    expect(response.isFinalized).toBe(true);
    expect(response.deferred).toBeUndefined();
  });

  it('treats header names case-insensitively', () => {
    const response = new PageResponse({ headers: { 'Content-Type': 'text/html' } });
    expect(response.hasHeader('content-type')).toBe(true);
    expect(response.getHeader('CONTENT-TYPE')).toBe('text/html');
    response.removeHeader('Content-Type');
    expect(response.hasHeader('content-type')).toBe(false);
  });

  it('snapshots status, lowercased headers and a base64 body', () => {
    const response = new PageResponse({
      status: 200,
      headers: { 'Content-Type': 'text/plain' },
      body: 'hello world',
    });
    expect(response.toSnapshot()).toEqual({
      status: 200,
      headers: { 'content-type': 'text/plain' },
      body: 'aGVsbG8gd29ybGQ=',
    });
  });

  it('rebuilds an independent copy from a snapshot', () => {
    const snapshot = {
      status: 200,
      headers: { 'content-type': 'text/plain' },
      body: 'aGVsbG8gd29ybGQ=',
    };
    const copy = PageResponse.fromSnapshot(snapshot);
    copy.setHeader('X-Extra', '1');

    expect(copy.text()).toBe('hello world');
    expect(snapshot.headers).toEqual({ 'content-type': 'text/plain' });
  });

  describe('deferred bodies', () => {
    it('has no body until finalized', async () => {
      const response = new PageResponse({ render: async () => '<p>late</p>' });
      expect(response.deferred).toBe(response);
      expect(response.isFinalized).toBe(false);
      expect(response.body).toBeUndefined();
      expect(() => response.toSnapshot()).toThrow(PageCacheError);

      await response.finalize();

      expect(response.isFinalized).toBe(true);
      expect(response.text()).toBe('<p>late</p>');
    });

    it('runs finalize callbacks in order, once', async () => {
      const calls: Array<string> = [];
      const response = new PageResponse({ render: () => 'body' });
      response.onFinalize((r) => {
        calls.push(`first:${r.body?.toString('utf8') ?? ''}`);
      });
      response.onFinalize(async () => {
        calls.push('second');
      });

      await response.finalize();
      await response.finalize();

      expect(calls).toEqual(['first:body', 'second']);
    });

    it('renders only once', async () => {
      const render = vi.fn(() => 'body');
      const response = new PageResponse({ render });
      await response.finalize();
      await response.finalize();
      expect(render).toHaveBeenCalledTimes(1);
    });
  });
});

describe('isResponseSnapshot', () => {
  it('accepts a well-formed snapshot', () => {
    expect(isResponseSnapshot({ status: 200, headers: {}, body: '' })).toBe(true);
  });

  it('rejects other values', () => {
    expect(isResponseSnapshot(undefined)).toBe(false);
    expect(isResponseSnapshot(['HTTP_COOKIE'])).toBe(false);
    expect(isResponseSnapshot({ status: '200', headers: {}, body: '' })).toBe(false);
    expect(isResponseSnapshot({ status: 200, headers: { a: 1 }, body: '' })).toBe(false);
    expect(isResponseSnapshot({ status: 200, headers: null, body: '' })).toBe(false);
  });
});
