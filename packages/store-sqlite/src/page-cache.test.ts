import Database from 'better-sqlite3';
import { describe, it, expect, vi, afterEach } from 'vitest';
import pino from 'pino';
import {
  CacheMiddleware,
  CacheRegistry,
  PageRequest,
  PageResponse,
} from '@page-cache/core';
import { SQLiteCacheStore } from './sqlite-cache-store.js';

describe('page cache backed by SQLite', () => {
  const logger = pino({ level: 'silent' });
  let store: SQLiteCacheStore;

  afterEach(() => {
    store.destroy();
  });

  it('serves repeat requests per Accept-Language variant', async () => {
    const sqlite = new Database(':memory:');
    store = new SQLiteCacheStore({ database: sqlite, cleanupIntervalMs: 0 });
    const cache = new CacheMiddleware({
      registry: new CacheRegistry().register('default', store, { defaultTTL: 120 }),
      logger,
    });
    const handler = vi.fn(async (request: PageRequest) => {
      const language = request.headers['accept-language'];
      return new PageResponse({
        headers: { 'Content-Type': 'text/html', Vary: 'Accept-Language' },
        body: language === 'fr' ? '<p>Bonjour</p>' : '<p>Hello</p>',
      });
    });
    const get = (language: string) =>
      cache.handle(
        new PageRequest({
          fullPath: '/greeting',
          headers: { 'accept-language': language },
        }),
        handler,
      );

    await get('en');
    await get('fr');
    const en = await get('en');
    const fr = await get('fr');

    expect(handler).toHaveBeenCalledTimes(2);
    expect(en.body?.toString('utf8')).toBe('<p>Hello</p>');
    expect(fr.body?.toString('utf8')).toBe('<p>Bonjour</p>');
    expect(en.getHeader('Cache-Control')).toBe('max-age=120');
    // One header list and two page variants
    expect(sqlite.prepare('SELECT COUNT(*) AS n FROM cache').get()).toEqual({ n: 3 });
    sqlite.close();
  });

  it('keeps serving when the store has been closed', async () => {
    store = new SQLiteCacheStore({ cleanupIntervalMs: 0 });
    const cache = new CacheMiddleware({
      registry: new CacheRegistry().register('default', store),
      logger,
    });
    const handler = vi.fn(async () => new PageResponse({ body: 'fresh' }));
    store.destroy();

    const response = await cache.handle(new PageRequest({ fullPath: '/' }), handler);

    expect(response.status).toBe(200);
    expect(handler).toHaveBeenCalledTimes(1);
  });
});
