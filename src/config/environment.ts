import { DEFAULT_PRICE_CACHE_TTL_MS } from '../services/pricing/priceCache';
import {
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  DEFAULT_FETCH_ATTEMPTS,
  DEFAULT_FETCH_BACKOFF_MS
} from '../services/pricing/priceFetcher';
import { DEFAULT_SCRAPER_BASE_URL } from '../services/pricing/scraperPriceSource';
import { parseNonNegativeInteger, parsePositiveInteger } from '../utils/requestParsing';

const DEFAULT_PORT = 8080;
const DEFAULT_RECIPE_CONFIG_PATH = 'config/recipe.json';
/** Node's timers replace any longer delay with 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export type AppConfig = {
  port: number;
  priceSourceBaseUrl: string;
  cacheTtlMs: number;
  fetchTimeoutMs: number;
  fetchAttempts: number;
  fetchBackoffMs: number;
  recipeConfigPath: string;
  /** `null` allows any origin. */
  corsOrigins: string[] | null;
};

type IntegerParser = (value: unknown) => number | null;

/**
 * Read an integer setting, warning and falling back to the default when the value is unusable.
 */
const resolveIntegerSetting = (
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  parse: IntegerParser,
  max = Number.MAX_SAFE_INTEGER
): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim().length === 0) {
    return fallback;
  }

  const parsed = parse(raw.trim());
  if (parsed === null || parsed > max) {
    console.warn(`${key}="${raw}" is invalid; using ${fallback}.`);
    return fallback;
  }
  return parsed;
};

/**
 * Parse a comma-delimited list of origins from CORS_ORIGINS. Unset means any origin.
 */
const parseAllowedOrigins = (value: string | undefined): string[] | null => {
  if (!value) return null;
  const origins = value
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins.length > 0 ? origins : null;
};

const resolveBaseUrl = (value: string | undefined): string => {
  const trimmed = value?.trim();
  if (!trimmed) return DEFAULT_SCRAPER_BASE_URL;

  try {
    return new URL(trimmed).toString();
  } catch {
    console.warn(`PRICE_SOURCE_BASE_URL="${trimmed}" is not a valid URL; using ${DEFAULT_SCRAPER_BASE_URL}.`);
    return DEFAULT_SCRAPER_BASE_URL;
  }
};

/**
 * Resolve runtime settings once at startup. Nothing here is re-read per request.
 */
export function resolveAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: resolveIntegerSetting(env, 'PORT', DEFAULT_PORT, parsePositiveInteger),
    priceSourceBaseUrl: resolveBaseUrl(env.PRICE_SOURCE_BASE_URL),
    cacheTtlMs: resolveIntegerSetting(env, 'PRICE_CACHE_TTL_MS', DEFAULT_PRICE_CACHE_TTL_MS, parseNonNegativeInteger),
    fetchTimeoutMs: resolveIntegerSetting(
      env,
      'PRICE_FETCH_TIMEOUT_MS',
      DEFAULT_ATTEMPT_TIMEOUT_MS,
      parsePositiveInteger,
      MAX_TIMER_DELAY_MS
    ),
    fetchAttempts: resolveIntegerSetting(env, 'PRICE_FETCH_ATTEMPTS', DEFAULT_FETCH_ATTEMPTS, parsePositiveInteger),
    fetchBackoffMs: resolveIntegerSetting(
      env,
      'PRICE_FETCH_BACKOFF_MS',
      DEFAULT_FETCH_BACKOFF_MS,
      parseNonNegativeInteger,
      MAX_TIMER_DELAY_MS
    ),
    recipeConfigPath: env.RECIPE_CONFIG_PATH?.trim() || DEFAULT_RECIPE_CONFIG_PATH,
    corsOrigins: parseAllowedOrigins(env.CORS_ORIGINS)
  };
}
