import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { ZodError } from 'zod';
import {
  DEFAULT_CACHE_SECONDS,
  resolveCacheOptions,
  settingsFromEnv,
  validateCacheSettings,
} from './config.js';
import { UnknownCacheAliasError } from './errors/index.js';
import { CacheRegistry } from './stores/index.js';
import { FakeCacheStore } from './test/fake-cache-store.js';

const logger = pino({ level: 'silent' });

describe('validateCacheSettings', () => {
  it('fills in defaults', () => {
    expect(validateCacheSettings()).toEqual({
      cacheAlias: 'default',
      keyPrefix: '',
      anonymousOnly: false,
      useI18n: false,
      useTz: false,
      languageCode: 'en-us',
      timeZone: 'UTC',
      useEtags: true,
      headPiggybacksOnGet: true,
      logLevel: 'info',
    });
  });

  it('rejects negative and fractional cache seconds', () => {
    expect(() => validateCacheSettings({ cacheSeconds: -1 })).toThrow(ZodError);
    expect(() => validateCacheSettings({ cacheSeconds: 1.5 })).toThrow(ZodError);
  });

  it('rejects an empty alias', () => {
    expect(() => validateCacheSettings({ cacheAlias: '' })).toThrow(
      'Cache alias must not be empty',
    );
  });
});

describe('settingsFromEnv', () => {
  it('reads PAGE_CACHE_* variables', () => {
    const settings = settingsFromEnv({
      PAGE_CACHE_ALIAS: 'pages',
      PAGE_CACHE_SECONDS: '120',
      PAGE_CACHE_KEY_PREFIX: 'site1',
      PAGE_CACHE_ANONYMOUS_ONLY: 'true',
      PAGE_CACHE_USE_I18N: '1',
      PAGE_CACHE_USE_TZ: '0',
      PAGE_CACHE_LANGUAGE_CODE: 'fr',
      PAGE_CACHE_TIME_ZONE: 'Europe/Paris',
      PAGE_CACHE_USE_ETAGS: 'false',
      PAGE_CACHE_HEAD_PIGGYBACKS_ON_GET: 'false',
      PAGE_CACHE_LOG_LEVEL: 'debug',
      HOME: '/home/test',
    });

    expect(settings).toEqual({
      cacheAlias: 'pages',
      cacheSeconds: 120,
      keyPrefix: 'site1',
      anonymousOnly: true,
      useI18n: true,
      useTz: false,
      languageCode: 'fr',
      timeZone: 'Europe/Paris',
      useEtags: false,
      headPiggybacksOnGet: false,
      logLevel: 'debug',
    });
  });

  it('treats empty variables as unset', () => {
    const settings = settingsFromEnv({ PAGE_CACHE_SECONDS: '', PAGE_CACHE_ALIAS: '' });
    expect(settings.cacheSeconds).toBeUndefined();
    expect(settings.cacheAlias).toBe('default');
  });

  it('rejects malformed values', () => {
    expect(() => settingsFromEnv({ PAGE_CACHE_SECONDS: 'soon' })).toThrow(ZodError);
    expect(() => settingsFromEnv({ PAGE_CACHE_USE_ETAGS: 'yes' })).toThrow(ZodError);
    expect(() => settingsFromEnv({ PAGE_CACHE_LOG_LEVEL: 'loud' })).toThrow(ZodError);
  });
});

describe('resolveCacheOptions', () => {
  const defaultStore = new FakeCacheStore();
  const pagesStore = new FakeCacheStore();
  const registry = new CacheRegistry()
    .register('default', defaultStore)
    .register('pages', pagesStore, { defaultTTL: 300 });

  it('uses built-in defaults', () => {
    const options = resolveCacheOptions({ registry, logger });
    expect(options.cache).toBe(defaultStore);
    expect(options.cacheAlias).toBe('default');
    expect(options.keyPrefix).toBe('');
    expect(options.cacheTimeout).toBe(DEFAULT_CACHE_SECONDS);
    expect(options.anonymousOnly).toBe(false);
    expect(options.useEtags).toBe(true);
    expect(options.headPiggybacksOnGet).toBe(true);
    expect(options.logger).toBe(logger);
  });

  it('prefers deployment settings over built-ins', () => {
    const options = resolveCacheOptions({
      registry,
      logger,
      settings: {
        cacheAlias: 'pages',
        keyPrefix: 'site1',
        cacheSeconds: 30,
        anonymousOnly: true,
      },
    });
    expect(options.cache).toBe(pagesStore);
    expect(options.keyPrefix).toBe('site1');
    expect(options.cacheTimeout).toBe(30);
    expect(options.anonymousOnly).toBe(true);
  });

  it('prefers explicit values over deployment settings', () => {
    const options = resolveCacheOptions({
      registry,
      logger,
      settings: { cacheAlias: 'pages', keyPrefix: 'site1', cacheSeconds: 30 },
      cacheAlias: 'default',
      keyPrefix: 'view',
      cacheTimeout: 5,
      anonymousOnly: true,
    });
    expect(options.cache).toBe(defaultStore);
    expect(options.keyPrefix).toBe('view');
    expect(options.cacheTimeout).toBe(5);
    expect(options.anonymousOnly).toBe(true);
  });

  it('maps explicit nulls to the built-in alias and prefix', () => {
    const options = resolveCacheOptions({
      registry,
      logger,
      settings: { cacheAlias: 'pages', keyPrefix: 'site1' },
      cacheAlias: null,
      keyPrefix: null,
    });
    expect(options.cacheAlias).toBe('default');
    expect(options.keyPrefix).toBe('');
  });

  it('falls back to the backend default TTL', () => {
    const options = resolveCacheOptions({ registry, logger, cacheAlias: 'pages' });
    expect(options.cacheTimeout).toBe(300);
  });

  it('accepts an explicit timeout of zero', () => {
    const options = resolveCacheOptions({
      registry,
      logger,
      cacheAlias: 'pages',
      cacheTimeout: 0,
    });
    expect(options.cacheTimeout).toBe(0);
  });

  it('rejects a negative timeout', () => {
    expect(() => resolveCacheOptions({ registry, logger, cacheTimeout: -1 })).toThrow(
      RangeError,
    );
  });

  it('throws for an unknown alias', () => {
    expect(() =>
      resolveCacheOptions({ registry, logger, cacheAlias: 'missing' }),
    ).toThrow(UnknownCacheAliasError);
  });

  it('builds the key context from settings', () => {
    const options = resolveCacheOptions({
      registry,
      logger,
      settings: { useI18n: true, languageCode: 'de' },
    });
    expect(options.keyContext).toEqual({
      useI18n: true,
      useTz: false,
      languageCode: 'de',
      timeZone: 'UTC',
    });
  });
});
