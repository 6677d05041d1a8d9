/**
 * Provider Configuration
 *
 * Defaults for the torrent providers and the environment overrides
 * a deployment can set.
 *
 * Configuration:
 * - PROVIDER_USER_AGENT: User-Agent sent with every request
 * - PROVIDER_TIMEOUT_MS: per-request timeout in milliseconds
 * - L337X_BASE_URL, YTS_BASE_URL, EZTV_BASE_URL: site mirrors
 */

import { createLogger } from '../logger';

const logger = createLogger('Config');

/**
 * Hard cap on results returned by one provider search call
 */
export const MAX_PROVIDER_RESULTS = 20;

export const PROVIDER_DEFAULTS = {
  /** Indexing sites reject blank or library user agents */
  userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',

  /** Request timeout in milliseconds */
  timeoutMs: 30_000,

  baseUrls: {
    l337x: 'https://1337x.to',
    yts: 'https://yts.mx/api/v2',
    eztv: 'https://eztvx.to/api',
  },
} as const;

export interface ProviderBaseUrls {
  l337x: string;
  yts: string;
  eztv: string;
}

export interface ProviderConfig {
  userAgent: string;
  timeoutMs: number;
  baseUrls: ProviderBaseUrls;
}

type Env = Record<string, string | undefined>;

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function readBaseUrl(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? trimTrailingSlash(value) : fallback;
}

function readTimeout(env: Env): number {
  const raw = env.PROVIDER_TIMEOUT_MS?.trim();
  if (!raw) {
    return PROVIDER_DEFAULTS.timeoutMs;
  }

  const timeoutMs = Number(raw);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    logger.warn('Ignoring invalid PROVIDER_TIMEOUT_MS', { value: raw });
    return PROVIDER_DEFAULTS.timeoutMs;
  }

  return timeoutMs;
}

/**
 * Build the provider configuration from environment variables,
 * falling back to PROVIDER_DEFAULTS for anything unset.
 */
export function getProviderConfig(env: Env = process.env): ProviderConfig {
  return {
    userAgent: env.PROVIDER_USER_AGENT?.trim() || PROVIDER_DEFAULTS.userAgent,
    timeoutMs: readTimeout(env),
    baseUrls: {
      l337x: readBaseUrl(env, 'L337X_BASE_URL', PROVIDER_DEFAULTS.baseUrls.l337x),
      yts: readBaseUrl(env, 'YTS_BASE_URL', PROVIDER_DEFAULTS.baseUrls.yts),
      eztv: readBaseUrl(env, 'EZTV_BASE_URL', PROVIDER_DEFAULTS.baseUrls.eztv),
    },
  };
}
