import { isPlatformName, type PlatformName } from '@pricesync/types';

import { ConfigInvalidError } from './errors.js';
import {
  MERCADOLIBRE_API_URL_DEFAULT,
  MERCADOLIBRE_LOCALE_DEFAULT,
  TIENDANUBE_API_URL_DEFAULT,
  TIENDANUBE_USER_AGENT_DEFAULT,
  type MercadoLibreCredentials,
  type PlatformCredentials,
  type TiendaNubeCredentials,
} from './platforms.js';

export type NodeEnv = 'development' | 'staging' | 'production' | 'test';

export type SyncEnv = Readonly<{
  nodeEnv: NodeEnv;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  logFile: string | undefined;

  sourcePlatform: PlatformName;
  targetPlatform: PlatformName;

  tolerance: number;
  absoluteFloor: number;
  perPage: number;
  maxPages: number;
  dryRun: boolean;
  concurrency: number;
  includeInactive: boolean;

  commissionPercent: number;
  priceRoundDigits: number;

  requestIntervalMs: number;

  credentials: PlatformCredentials;
}>;

type EnvSource = Record<string, string | undefined>;

export const PER_PAGE_MAX = 200;
export const CONCURRENCY_MAX = 32;

function requiredString(env: EnvSource, key: string): string {
  const value = env[key];
  if (!value?.trim()) {
    throw new ConfigInvalidError(key, `Missing required environment variable: ${key}`);
  }
  return value.trim();
}

function optionalString(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (value == null) return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  const normalized = (value ?? 'development').trim();
  if (
    normalized === 'development' ||
    normalized === 'staging' ||
    normalized === 'production' ||
    normalized === 'test'
  ) {
    return normalized;
  }
  throw new ConfigInvalidError('NODE_ENV', `Invalid NODE_ENV: ${normalized}`);
}

function parseLogLevel(value: string | undefined): SyncEnv['logLevel'] {
  const normalized = (value ?? 'info').trim();
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error' ||
    normalized === 'fatal'
  ) {
    return normalized;
  }
  throw new ConfigInvalidError('LOG_LEVEL', `Invalid LOG_LEVEL: ${normalized}`);
}

function parsePlatform(env: EnvSource, key: string, fallback: PlatformName): PlatformName {
  const raw = (optionalString(env, key) ?? fallback).toLowerCase();
  if (!isPlatformName(raw)) {
    throw new ConfigInvalidError(key, `Invalid ${key}: ${raw} (expected mercadolibre|tiendanube)`);
  }
  return raw;
}

function parseNumber(
  raw: string,
  key: string,
  check: (n: number) => boolean,
  expectation: string
): number {
  const n = Number(raw);
  if (!raw || !Number.isFinite(n) || !check(n)) {
    throw new ConfigInvalidError(key, `Invalid ${key}: ${raw} (expected ${expectation})`);
  }
  return n;
}

function parseFraction(env: EnvSource, key: string): number {
  const raw = requiredString(env, key);
  return parseNumber(raw, key, (n) => n >= 0 && n < 1, 'a fraction in [0, 1)');
}

function parseIntInRange(
  env: EnvSource,
  key: string,
  options: { min: number; max?: number; fallback?: number }
): number {
  const raw = optionalString(env, key);
  if (raw == null) {
    if (options.fallback === undefined) {
      throw new ConfigInvalidError(key, `Missing required environment variable: ${key}`);
    }
    return options.fallback;
  }
  const max = options.max ?? Number.MAX_SAFE_INTEGER;
  return parseNumber(
    raw,
    key,
    (n) => Number.isInteger(n) && n >= options.min && n <= max,
    options.max === undefined
      ? `an integer >= ${options.min}`
      : `an integer in [${options.min}, ${options.max}]`
  );
}

function parseNonNegative(env: EnvSource, key: string, fallback: number): number {
  const raw = optionalString(env, key);
  if (raw == null) return fallback;
  return parseNumber(raw, key, (n) => n >= 0, 'a number >= 0');
}

function parseCommission(env: EnvSource): number {
  const raw = optionalString(env, 'SYNC_COMMISSION_PERCENT');
  if (raw == null) return 0;
  return parseNumber(
    raw,
    'SYNC_COMMISSION_PERCENT',
    (n) => n >= 0 && n < 100,
    'a percentage in [0, 100)'
  );
}

function parseBoolean(env: EnvSource, key: string): boolean {
  const v = (optionalString(env, key) ?? '').toLowerCase();
  if (!v) return false;
  if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true;
  if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false;
  throw new ConfigInvalidError(key, `Invalid ${key}: ${v} (expected a boolean)`);
}

function parseHttpUrl(env: EnvSource, key: string, fallback: string): string {
  const value = optionalString(env, key) ?? fallback;
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigInvalidError(key, `Invalid URL in ${key}: ${value}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigInvalidError(key, `Invalid URL protocol for ${key}: ${url.protocol}`);
  }
  return value.replace(/\/+$/, '');
}

function loadMercadoLibreCredentials(env: EnvSource): MercadoLibreCredentials {
  return {
    apiUrl: parseHttpUrl(env, 'MERCADOLIBRE_API_URL', MERCADOLIBRE_API_URL_DEFAULT),
    accessToken: requiredString(env, 'MERCADOLIBRE_ACCESS_TOKEN'),
    userId: requiredString(env, 'MERCADOLIBRE_USER_ID'),
    locale: optionalString(env, 'MERCADOLIBRE_LOCALE') ?? MERCADOLIBRE_LOCALE_DEFAULT,
  };
}

function loadTiendaNubeCredentials(env: EnvSource): TiendaNubeCredentials {
  return {
    apiUrl: parseHttpUrl(env, 'TIENDANUBE_API_URL', TIENDANUBE_API_URL_DEFAULT),
    accessToken: requiredString(env, 'TIENDANUBE_ACCESS_TOKEN'),
    storeId: requiredString(env, 'TIENDANUBE_STORE_ID'),
    userAgent: optionalString(env, 'TIENDANUBE_USER_AGENT') ?? TIENDANUBE_USER_AGENT_DEFAULT,
  };
}

/**
 * Reads and validates the sync configuration.
 *
 * Credentials are only required for the two platforms the run actually touches.
 * Throws ConfigInvalidError on the first missing or malformed variable.
 */
export function loadEnv(env: EnvSource = process.env): SyncEnv {
  const nodeEnv = parseNodeEnv(env['NODE_ENV']);
  const logLevel = parseLogLevel(env['LOG_LEVEL']);
  const logFile = optionalString(env, 'LOG_FILE');

  const sourcePlatform = parsePlatform(env, 'SYNC_SOURCE_PLATFORM', 'mercadolibre');
  const targetPlatform = parsePlatform(env, 'SYNC_TARGET_PLATFORM', 'tiendanube');
  if (sourcePlatform === targetPlatform) {
    throw new ConfigInvalidError(
      'SYNC_TARGET_PLATFORM',
      `SYNC_SOURCE_PLATFORM and SYNC_TARGET_PLATFORM must differ (both ${sourcePlatform})`
    );
  }

  const tolerance = parseFraction(env, 'SYNC_PRICE_TOLERANCE');
  const perPage = parseIntInRange(env, 'SYNC_PER_PAGE', { min: 1, max: PER_PAGE_MAX });
  const absoluteFloor = parseNonNegative(env, 'SYNC_ABSOLUTE_FLOOR', 0.01);
  const maxPages = parseIntInRange(env, 'SYNC_MAX_PAGES', { min: 1, fallback: 10_000 });
  const dryRun = parseBoolean(env, 'SYNC_DRY_RUN');
  const concurrency = parseIntInRange(env, 'SYNC_CONCURRENCY', {
    min: 1,
    max: CONCURRENCY_MAX,
    fallback: 4,
  });
  const includeInactive = parseBoolean(env, 'SYNC_INCLUDE_INACTIVE');

  const commissionPercent = parseCommission(env);
  const priceRoundDigits = parseIntInRange(env, 'SYNC_PRICE_ROUND_DIGITS', {
    min: 0,
    max: 4,
    fallback: 2,
  });

  const requestIntervalMs = parseIntInRange(env, 'SYNC_REQUEST_INTERVAL_MS', {
    min: 0,
    fallback: 500,
  });

  const used = new Set<PlatformName>([sourcePlatform, targetPlatform]);
  const credentials: PlatformCredentials = {
    mercadolibre: used.has('mercadolibre') ? loadMercadoLibreCredentials(env) : null,
    tiendanube: used.has('tiendanube') ? loadTiendaNubeCredentials(env) : null,
  };

  return {
    nodeEnv,
    logLevel,
    logFile,
    sourcePlatform,
    targetPlatform,
    tolerance,
    absoluteFloor,
    perPage,
    maxPages,
    dryRun,
    concurrency,
    includeInactive,
    commissionPercent,
    priceRoundDigits,
    requestIntervalMs,
    credentials,
  };
}
