/**
 * BaseHttpClient — shared HTTP plumbing for the data providers.
 *
 * Features:
 *  - per-request timeout
 *  - retry with exponential backoff
 *  - rate limit detection (HTTP 429 + Retry-After)
 *  - strict numeric parsing helpers
 *  - per-provider health and latency metrics
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import { ProviderFormatError, errorMessage } from '../lib/errors.js';
import type { ProviderMetrics } from '../observability/index.js';
import type { ProviderName } from './types.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface HttpConfig {
  /** Request timeout in ms. Default: 5000 */
  timeoutMs: number;
  /** Maximum attempts per request. Default: 3 */
  maxRetries: number;
  /** Base delay between retries in ms (doubles each attempt). Default: 1000 */
  retryBaseDelayMs: number;
  /** Longest we will honour a Retry-After header, in ms. Default: 60000 */
  maxRateLimitWaitMs: number;
}

const DEFAULT_HTTP_CONFIG: HttpConfig = {
  timeoutMs: 5_000,
  maxRetries: 3,
  retryBaseDelayMs: 1_000,
  maxRateLimitWaitMs: 60_000,
};

export interface HttpClientOptions {
  http?: Partial<HttpConfig>;
  /** Merged into the axios instance defaults (e.g. a custom adapter). */
  axiosConfig?: CreateAxiosDefaults;
  metrics?: ProviderMetrics;
}

export interface RequestOptions {
  params?: Record<string, string>;
  headers?: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

interface RateLimitState {
  limited: boolean;
  resetAt: number;
  consecutiveHits: number;
}

export interface ProviderHealth {
  provider: ProviderName;
  consecutiveFailures: number;
  lastSuccessAt: number;
  isRateLimited: boolean;
  lastLatencyMs: number;
}

// ---------------------------------------------------------------------------
// Base Class
// ---------------------------------------------------------------------------

export abstract class BaseHttpClient {
  abstract readonly name: ProviderName;

  protected readonly http: AxiosInstance;
  private readonly cfg: HttpConfig;
  private readonly metrics: ProviderMetrics | undefined;
  private readonly log: Logger;
  private rateLimit: RateLimitState = { limited: false, resetAt: 0, consecutiveHits: 0 };
  private failures = 0;
  private lastSuccess = 0;
  private lastLatency = 0;

  constructor(baseURL: string | undefined, options: HttpClientOptions = {}) {
    this.cfg = { ...DEFAULT_HTTP_CONFIG, ...options.http };
    this.metrics = options.metrics;

    this.http = axios.create({
      baseURL,
      timeout: this.cfg.timeoutMs,
      headers: {
        Accept: 'application/json',
        'User-Agent': 'riskboard/1.0',
      },
      ...options.axiosConfig,
    });

    this.log = rootLogger.child({ component: 'provider' });
  }

  /** Logger bound to the provider name (available after the subclass sets `name`). */
  protected get logger(): Logger {
    return this.log.child({ provider: this.name });
  }

  // -----------------------------------------------------------------------
  // GET with retry, backoff and Retry-After handling
  // -----------------------------------------------------------------------

  /** Resolves with the body of the first successful attempt; rethrows the last failure. */
  protected async get<T>(url: string, options: RequestOptions = {}): Promise<T> {
    await this.waitForRateLimit();

    const attempts = this.cfg.maxRetries;
    let lastError: unknown = new Error(`${this.name}: no attempt made for ${url}`);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const startedAt = Date.now();
      try {
        const response = await this.http.get<T>(url, { params: options.params, headers: options.headers });
        this.noteSuccess(Date.now() - startedAt);
        this.logger.debug({ url, attempt, status: response.status, latencyMs: this.lastLatency }, 'Request OK');
        return response.data;
      } catch (err) {
        lastError = err;
        const isLast = attempt === attempts;
        const retryAfterMs = this.rateLimitDelay(err);

        if (retryAfterMs !== null) {
          this.logger.warn({ url, retryAfterMs, hits: this.rateLimit.consecutiveHits }, 'Rate limit hit');
          if (!isLast) await sleep(retryAfterMs);
          continue;
        }

        this.logger.warn(
          {
            url,
            attempt,
            maxRetries: attempts,
            status: axios.isAxiosError(err) ? err.response?.status : undefined,
            errMsg: errorMessage(err),
          },
          isLast ? 'Request failed' : 'Request failed, retrying',
        );
        if (!isLast) await sleep(this.cfg.retryBaseDelayMs * 2 ** (attempt - 1));
      }
    }

    this.failures++;
    this.metrics?.recordError(this.name, errorMessage(lastError));
    this.logger.error({ url, consecutiveFailures: this.failures, errMsg: errorMessage(lastError) }, 'All retries exhausted');
    throw lastError;
  }

  private async waitForRateLimit(): Promise<void> {
    const waitMs = this.rateLimit.limited ? this.rateLimit.resetAt - Date.now() : 0;
    if (waitMs <= 0) return;
    this.logger.warn({ waitMs }, 'Waiting for rate limit reset');
    await sleep(Math.min(waitMs, this.cfg.maxRateLimitWaitMs));
  }

  private noteSuccess(latencyMs: number): void {
    this.lastLatency = latencyMs;
    this.lastSuccess = Date.now();
    this.failures = 0;
    this.rateLimit = { limited: false, resetAt: 0, consecutiveHits: 0 };
    this.metrics?.recordSuccess(this.name, latencyMs);
  }

  /** For a 429, records the limit and returns the capped wait in ms; null for any other error. */
  private rateLimitDelay(err: unknown): number | null {
    if (!axios.isAxiosError(err) || err.response?.status !== 429) return null;
    const header: unknown = err.response.headers['retry-after'];
    const seconds = typeof header === 'string' ? parseInt(header, 10) : NaN;
    const waitMs = (Number.isFinite(seconds) && seconds > 0 ? seconds : 60) * 1_000;
    this.rateLimit = {
      limited: true,
      resetAt: Date.now() + waitMs,
      consecutiveHits: this.rateLimit.consecutiveHits + 1,
    };
    return Math.min(waitMs, this.cfg.maxRateLimitWaitMs);
  }

  // -----------------------------------------------------------------------
  // Validation helpers
  // -----------------------------------------------------------------------

  /** Both providers send JSON numbers; strings, arrays and other values are rejected, not coerced. */
  protected toFiniteNumber(raw: unknown, field: string): number {
    if (typeof raw !== 'number' || !Number.isFinite(raw)) {
      throw new ProviderFormatError(this.name, field, raw, 'Must be a finite number');
    }
    return raw;
  }

  // -----------------------------------------------------------------------
  // Health
  // -----------------------------------------------------------------------

  getHealth(): ProviderHealth {
    return {
      provider: this.name,
      consecutiveFailures: this.failures,
      lastSuccessAt: this.lastSuccess,
      isRateLimited: this.rateLimit.limited && Date.now() < this.rateLimit.resetAt,
      lastLatencyMs: this.lastLatency,
    };
  }
}

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
