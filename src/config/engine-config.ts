/**
 * Engine Configuration
 * centralized config for upstream access, caching and the http layer
 */

export interface EngineConfig {
  // http
  port: number;
  requestTimeoutMs: number;
  corsAllowedOrigins: string[];

  // upstream provider
  upstreamBaseUrl: string;
  upstreamTimeoutMs: number;
  upstreamPageSize: number;

  // result cache
  inProgressTtlMs: number;
  cacheMaxSeasons: number;
  /** load whole seasons on a miss, even for a round-bounded request */
  cachePrefetchFullSeason: boolean;
}

export const DEFAULT_UPSTREAM_BASE_URL = 'https://api.jolpi.ca/ergast/f1';

function parseIntEnv(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (!val) {
    return defaultValue;
  }
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseBoolEnv(key: string, defaultValue: boolean): boolean {
  const val = process.env[key];
  if (!val) {
    return defaultValue;
  }
  return val.toLowerCase() === 'true' || val === '1';
}

function parseListEnv(key: string): string[] {
  const val = process.env[key];
  if (!val) {
    return [];
  }
  return val.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

export function loadEngineConfig(): EngineConfig {
  return {
    port: parseIntEnv('PORT', 3000),
    requestTimeoutMs: parseIntEnv('REQUEST_TIMEOUT_MS', 30000),
    corsAllowedOrigins: parseListEnv('CORS_ALLOWED_ORIGINS'),

    upstreamBaseUrl: (process.env.UPSTREAM_BASE_URL || DEFAULT_UPSTREAM_BASE_URL).replace(/\/+$/, ''),
    upstreamTimeoutMs: parseIntEnv('UPSTREAM_TIMEOUT_MS', 15000),
    // the provider caps pages at 100 rows
    upstreamPageSize: Math.min(100, Math.max(1, parseIntEnv('UPSTREAM_PAGE_SIZE', 100))),

    // in-progress season only, concluded seasons never expire
    inProgressTtlMs: parseIntEnv('IN_PROGRESS_TTL_MS', 5 * 60 * 1000),
    cacheMaxSeasons: parseIntEnv('CACHE_MAX_SEASONS', 100),
    cachePrefetchFullSeason: parseBoolEnv('CACHE_PREFETCH_FULL_SEASON', true),
  };
}

// singleton config instance
let configInstance: EngineConfig | null = null;

export function getConfig(): EngineConfig {
  if (!configInstance) {
    configInstance = loadEngineConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
