import { fileURLToPath } from 'node:url';
import { ConfigError } from '../lib/errors.js';

export const DEFAULT_MARKET_API_URL = 'https://api.coingecko.com/api/v3';
export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../data/coins.json', import.meta.url));

export interface HttpSettings {
  timeoutMs: number;
  maxRetries: number;
}

export interface AppConfig {
  port: number;
  tokenSecret: string | null;
  tokenTtlSeconds: number;
  adminSecret: string | null;
  catalogPath: string;
  marketApiUrl: string;
  riskApiUrl: string | null;
  riskApiToken: string | null;
  /** Infinity means every risk request is dispatched at once. */
  riskMaxConcurrency: number;
  http: HttpSettings;
  refreshIntervalMs: number;
  allowedOrigins: string[];
}

type Env = Record<string, string | undefined>;

function optional(env: Env, ...names: string[]): string | null {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return null;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(name, raw, 'must be a positive integer');
  }
  return n;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: positiveInt(env, 'PORT', 3000),
    tokenSecret: optional(env, 'TOKEN_SECRET', 'SECRET_KEY'),
    tokenTtlSeconds: positiveInt(env, 'TOKEN_TTL_SECONDS', 30 * 24 * 60 * 60),
    adminSecret: optional(env, 'ADMIN_SECRET'),
    catalogPath: optional(env, 'CATALOG_PATH') ?? DEFAULT_CATALOG_PATH,
    marketApiUrl: optional(env, 'MARKET_API_URL') ?? DEFAULT_MARKET_API_URL,
    riskApiUrl: optional(env, 'RISK_API_URL'),
    riskApiToken: optional(env, 'RISK_API_TOKEN'),
    riskMaxConcurrency: positiveInt(env, 'RISK_MAX_CONCURRENCY', Number.POSITIVE_INFINITY),
    http: {
      timeoutMs: positiveInt(env, 'HTTP_TIMEOUT_MS', 5_000),
      maxRetries: positiveInt(env, 'HTTP_MAX_RETRIES', 3),
    },
    refreshIntervalMs: positiveInt(env, 'REFRESH_INTERVAL_MS', 30_000),
    allowedOrigins: (optional(env, 'ALLOWED_ORIGINS') ?? 'http://localhost:5173,http://localhost:3000')
      .split(',')
      .map((o) => o.trim())
      .filter((o) => o.length > 0),
  };
}
