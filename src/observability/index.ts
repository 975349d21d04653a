/**
 * Observability & health
 *
 * - Latency samples per provider
 * - Error rate tracking
 * - Health endpoint data
 */

import type { ProviderHealth } from '../providers/base.js';
import { PROVIDER_NAMES, type ProviderName } from '../providers/types.js';

// ---------------------------------------------------------------------------
// Provider Metrics
// ---------------------------------------------------------------------------

/** Most recent latency samples, overwritten oldest-first once full. */
class LatencyRing {
  private readonly slots: number[] = [];
  private next = 0;

  constructor(private readonly capacity: number) {}

  add(ms: number): void {
    if (this.slots.length < this.capacity) this.slots.push(ms);
    else this.slots[this.next] = ms;
    this.next = (this.next + 1) % this.capacity;
  }

  sorted(): number[] {
    return [...this.slots].sort((a, b) => a - b);
  }
}

interface ProviderCounters {
  latency: LatencyRing;
  successes: number;
  failures: number;
  lastError: { message: string; at: number } | null;
}

export interface LatencySummary {
  p50: number;
  p95: number;
  p99: number;
  avg: number;
}

export interface ProviderLatencyStats extends LatencySummary {
  provider: ProviderName;
  sampleCount: number;
  errorCount: number;
  successCount: number;
  errorRate: number;
  lastError: string | null;
  lastErrorAt: number;
}

/** Counters for the market and risk clients; a failure is one exhausted request, not one attempt. */
export class ProviderMetrics {
  private readonly counters: Record<ProviderName, ProviderCounters>;

  constructor(sampleCapacity = 100) {
    const fresh = (): ProviderCounters => ({
      latency: new LatencyRing(sampleCapacity),
      successes: 0,
      failures: 0,
      lastError: null,
    });
    this.counters = { market: fresh(), risk: fresh() };
  }

  recordSuccess(provider: ProviderName, latencyMs: number): void {
    const c = this.counters[provider];
    c.latency.add(latencyMs);
    c.successes++;
  }

  recordError(provider: ProviderName, message: string): void {
    const c = this.counters[provider];
    c.failures++;
    c.lastError = { message, at: Date.now() };
  }

  getStats(provider: ProviderName): ProviderLatencyStats {
    const c = this.counters[provider];
    const samples = c.latency.sorted();
    const requests = c.successes + c.failures;

    return {
      provider,
      ...summarizeLatency(samples),
      sampleCount: samples.length,
      errorCount: c.failures,
      successCount: c.successes,
      errorRate: requests === 0 ? 0 : c.failures / requests,
      lastError: c.lastError?.message ?? null,
      lastErrorAt: c.lastError?.at ?? 0,
    };
  }

  /** Always both providers, market first. */
  getAllStats(): ProviderLatencyStats[] {
    return PROVIDER_NAMES.map((p) => this.getStats(p));
  }
}

/** Nearest-rank percentiles over ascending samples; all zero when empty. */
export function summarizeLatency(sorted: readonly number[]): LatencySummary {
  if (sorted.length === 0) return { p50: 0, p95: 0, p99: 0, avg: 0 };
  const rank = (q: number) => sorted[Math.min(sorted.length - 1, Math.max(0, Math.ceil(q * sorted.length) - 1))];
  const total = sorted.reduce((sum, ms) => sum + ms, 0);
  return { p50: rank(0.5), p95: rank(0.95), p99: rank(0.99), avg: total / sorted.length };
}

// ---------------------------------------------------------------------------
// Health Check
// ---------------------------------------------------------------------------

export interface ProviderHealthEntry extends ProviderHealth {
  status: 'up' | 'degraded' | 'down';
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  uptime: number;
  timestamp: string;
  providers: ProviderHealthEntry[];
  websocket: { clientCount: number };
  catalog: { assetCount: number };
  latency: ProviderLatencyStats[];
}

export interface HealthSource {
  getHealth(): ProviderHealth;
}

const startTime = Date.now();

export function providerStatus(h: ProviderHealth): ProviderHealthEntry['status'] {
  if (h.consecutiveFailures >= 5) return 'down';
  if (h.consecutiveFailures >= 2 || h.isRateLimited) return 'degraded';
  return 'up';
}

export function buildHealthStatus(
  sources: readonly HealthSource[],
  wsClientCount: number,
  assetCount: number,
  metrics: ProviderMetrics,
): HealthStatus {
  const providers = sources.map((s) => {
    const h = s.getHealth();
    return { ...h, status: providerStatus(h) };
  });

  // The market provider is the one every view depends on
  const market = providers.find((p) => p.provider === 'market');
  let status: HealthStatus['status'] = 'healthy';
  if (market?.status === 'down') status = 'unhealthy';
  else if (providers.some((p) => p.status !== 'up')) status = 'degraded';

  return {
    status,
    uptime: Date.now() - startTime,
    timestamp: new Date().toISOString(),
    providers,
    websocket: { clientCount: wsClientCount },
    catalog: { assetCount },
    latency: metrics.getAllStats(),
  };
}
