import { z } from 'zod';
import { DEFAULT_KEY_CONTEXT, type KeyContext } from './cache/index.js';
import { createLogger, type Logger } from './logger.js';
import {
  DEFAULT_CACHE_ALIAS,
  type CacheRegistry,
  type CacheStore,
} from './stores/index.js';

/** Cache timeout used when neither the caller, the settings nor the backend name one */
export const DEFAULT_CACHE_SECONDS = 600;

const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

const CacheSettingsSchema = z.object({
  cacheAlias: z
    .string()
    .min(1, 'Cache alias must not be empty')
    .default(DEFAULT_CACHE_ALIAS),
  cacheSeconds: z.number().int().nonnegative().optional(),
  keyPrefix: z.string().default(''),
  anonymousOnly: z.boolean().default(false),
  useI18n: z.boolean().default(DEFAULT_KEY_CONTEXT.useI18n),
  useTz: z.boolean().default(DEFAULT_KEY_CONTEXT.useTz),
  languageCode: z.string().min(1).default(DEFAULT_KEY_CONTEXT.languageCode),
  timeZone: z.string().min(1).default(DEFAULT_KEY_CONTEXT.timeZone),
  useEtags: z.boolean().default(true),
  headPiggybacksOnGet: z.boolean().default(true),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type CacheSettingsInput = z.input<typeof CacheSettingsSchema>;
export type CacheSettings = z.output<typeof CacheSettingsSchema>;

export function validateCacheSettings(
  settings: CacheSettingsInput = {},
): CacheSettings {
  return CacheSettingsSchema.parse(settings);
}

const envBoolean = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSettingsSchema = z.object({
  PAGE_CACHE_ALIAS: z.string().optional(),
  PAGE_CACHE_SECONDS: z.coerce.number().int().nonnegative().optional(),
  PAGE_CACHE_KEY_PREFIX: z.string().optional(),
  PAGE_CACHE_ANONYMOUS_ONLY: envBoolean.optional(),
  PAGE_CACHE_USE_I18N: envBoolean.optional(),
  PAGE_CACHE_USE_TZ: envBoolean.optional(),
  PAGE_CACHE_LANGUAGE_CODE: z.string().optional(),
  PAGE_CACHE_TIME_ZONE: z.string().optional(),
  PAGE_CACHE_USE_ETAGS: envBoolean.optional(),
  PAGE_CACHE_HEAD_PIGGYBACKS_ON_GET: envBoolean.optional(),
  PAGE_CACHE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

/**
 * Read deployment settings from `PAGE_CACHE_*` environment variables.
 * Empty variables count as unset.
 */
export function settingsFromEnv(
  env: Record<string, string | undefined> = process.env,
): CacheSettings {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => key.startsWith('PAGE_CACHE_') && value !== '',
    ),
  );
  const parsed = EnvSettingsSchema.parse(present);

  return validateCacheSettings({
    cacheAlias: parsed.PAGE_CACHE_ALIAS,
    cacheSeconds: parsed.PAGE_CACHE_SECONDS,
    keyPrefix: parsed.PAGE_CACHE_KEY_PREFIX,
    anonymousOnly: parsed.PAGE_CACHE_ANONYMOUS_ONLY,
    useI18n: parsed.PAGE_CACHE_USE_I18N,
    useTz: parsed.PAGE_CACHE_USE_TZ,
    languageCode: parsed.PAGE_CACHE_LANGUAGE_CODE,
    timeZone: parsed.PAGE_CACHE_TIME_ZONE,
    useEtags: parsed.PAGE_CACHE_USE_ETAGS,
    headPiggybacksOnGet: parsed.PAGE_CACHE_HEAD_PIGGYBACKS_ON_GET,
    logLevel: parsed.PAGE_CACHE_LOG_LEVEL,
  });
}

/**
 * Fully resolved configuration handed to each cache phase.
 */
export interface ResolvedCacheOptions {
  cache: CacheStore;
  cacheAlias: string;
  keyPrefix: string;
  /** Seconds to keep entries when the response names no max-age */
  cacheTimeout: number;
  anonymousOnly: boolean;
  keyContext: KeyContext;
  useEtags: boolean;
  headPiggybacksOnGet: boolean;
  logger: Logger;
}

export interface CacheOptionsInput {
  registry: CacheRegistry;
  /** Deployment-level settings */
  settings?: CacheSettingsInput;
  /** `null` selects the default alias */
  cacheAlias?: string | null;
  /** `null` selects an empty prefix */
  keyPrefix?: string | null;
  cacheTimeout?: number;
  anonymousOnly?: boolean;
  logger?: Logger;
}

/**
 * Resolve per-instance options against deployment settings.
 *
 * Precedence for every option: explicit argument, then deployment
 * settings, then the built-in default. The cache timeout additionally
 * falls back to the selected backend's own default TTL before the
 * built-in default.
 */
export function resolveCacheOptions(
  input: CacheOptionsInput,
): ResolvedCacheOptions {
  const settings = validateCacheSettings(input.settings);

  const cacheAlias =
    input.cacheAlias === undefined
      ? settings.cacheAlias
      : (input.cacheAlias ?? DEFAULT_CACHE_ALIAS);
  const keyPrefix =
    input.keyPrefix === undefined ? settings.keyPrefix : (input.keyPrefix ?? '');

  const backend = input.registry.get(cacheAlias);

  if (
    input.cacheTimeout !== undefined &&
    (!Number.isFinite(input.cacheTimeout) || input.cacheTimeout < 0)
  ) {
    throw new RangeError('cacheTimeout must be a non-negative number');
  }

  return {
    cache: backend.store,
    cacheAlias,
    keyPrefix,
    cacheTimeout:
      input.cacheTimeout ??
      settings.cacheSeconds ??
      backend.defaultTTL ??
      DEFAULT_CACHE_SECONDS,
    anonymousOnly: input.anonymousOnly ?? settings.anonymousOnly,
    keyContext: {
      useI18n: settings.useI18n,
      useTz: settings.useTz,
      languageCode: settings.languageCode,
      timeZone: settings.timeZone,
    },
    useEtags: settings.useEtags,
    headPiggybacksOnGet: settings.headPiggybacksOnGet,
    logger: input.logger ?? createLogger({ level: settings.logLevel }),
  };
}
