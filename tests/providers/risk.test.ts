// ─────────────────────────────────────────────────────────────
// Tests — Risk data client (fan-out, isolation, ordering)
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { RiskDataClient } from '../../src/providers/risk.js';
import type { RiskCredentials } from '../../src/providers/types.js';
import { FAST_HTTP, delay, httpError, stubTransport, type StubHandler } from '../helpers/http.js';

const BASE_URL = 'https://risk.test/v1/risk/';
const CREDENTIALS: RiskCredentials = { baseUrl: BASE_URL, token: 'test-token' };

function envelope(rows: Array<[number, number]>) {
  return { data: { USD: rows } };
}

function assetOf(url: string | undefined): string {
  return (url ?? '').slice(BASE_URL.length);
}

function clientFor(handler: StubHandler, options: { maxConcurrency?: number; credentials?: RiskCredentials } = {}) {
  const transport = stubTransport(handler);
  const client = new RiskDataClient({
    credentials: options.credentials ?? CREDENTIALS,
    maxConcurrency: options.maxConcurrency,
    http: FAST_HTTP,
    axiosConfig: { adapter: transport.adapter },
  });
  return { client, calls: transport.calls };
}

describe('RiskDataClient.fetchRiskCurves', () => {
  it('requests baseUrl + id with the bearer token', async () => {
    const { client, calls } = clientFor(() => envelope([]));
    await client.fetchRiskCurves(['bitcoin']);

    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://risk.test/v1/risk/bitcoin');
    expect(calls[0].headers.get('Authorization')).toBe('Bearer test-token');
  });

  it('scales raw risk fractions to percent', async () => {
    const { client } = clientFor(() => envelope([[40000, 0.1], [60000, 0.3]]));
    const [curve] = await client.fetchRiskCurves(['bitcoin']);

    expect(curve).toHaveLength(2);
    expect(curve?.[0].price).toBe(40000);
    expect(curve?.[0].riskPct).toBeCloseTo(10.0);
    expect(curve?.[1].price).toBe(60000);
    expect(curve?.[1].riskPct).toBeCloseTo(30.0);
  });

  it('keeps input order regardless of completion order', async () => {
    const latency: Record<string, number> = { a: 30, b: 0, c: 15 };
    const { client } = clientFor(async (config) => {
      const id = assetOf(config.url);
      await delay(latency[id]);
      return envelope([[latency[id] + 1, 0.5]]);
    });

    const curves = await client.fetchRiskCurves(['a', 'b', 'c']);
    expect(curves.map((c) => c?.[0].price)).toEqual([31, 1, 16]);
  });

  it('isolates a failing asset: [A, B, C] with B throwing gives [curveA, null, curveC]', async () => {
    const { client, calls } = clientFor((config) => {
      const id = assetOf(config.url);
      if (id === 'b') throw httpError(config, 500);
      return envelope([[id === 'a' ? 100 : 300, 0.2]]);
    });

    const curves = await client.fetchRiskCurves(['a', 'b', 'c']);
    expect(curves).toHaveLength(3);
    expect(curves[0]?.[0].price).toBe(100);
    expect(curves[1]).toBeNull();
    expect(curves[2]?.[0].price).toBe(300);
    expect(calls).toHaveLength(3);
  });

  it('nulls an asset whose envelope has no data field', async () => {
    const { client } = clientFor((config) =>
      assetOf(config.url) === 'unknown' ? { message: 'not covered' } : envelope([[1, 0.01]]),
    );
    const curves = await client.fetchRiskCurves(['bitcoin', 'unknown']);
    expect(curves[0]).toEqual([{ price: 1, riskPct: 1 }]);
    expect(curves[1]).toBeNull();
  });

  it('nulls an asset whose data is malformed', async () => {
    const bodies: Record<string, unknown> = {
      'no-usd': { data: { EUR: [[1, 0.1]] } },
      'bad-row': { data: { USD: [[1, 0.1], [2]] } },
      'bad-number': { data: { USD: [[1, 'high']] } },
      good: envelope([[5, 0.5]]),
    };
    const { client } = clientFor((config) => bodies[assetOf(config.url)]);

    const curves = await client.fetchRiskCurves(['no-usd', 'bad-row', 'bad-number', 'good']);
    expect(curves).toEqual([null, null, null, [{ price: 5, riskPct: 50 }]]);
  });

  it('nulls an asset whose pairs hold anything but JSON numbers', async () => {
    const bodies: Record<string, unknown> = {
      'empty-array': { data: { USD: [[[], 0.1]] } },
      'numeric-string': { data: { USD: [['40000abc', 0.2]] } },
      'wrapped': { data: { USD: [[[60000], [0.3]]] } },
      'plain-string': { data: { USD: [['40000', 0.2]] } },
    };
    const { client } = clientFor((config) => bodies[assetOf(config.url)]);

    const curves = await client.fetchRiskCurves(['empty-array', 'numeric-string', 'wrapped', 'plain-string']);
    expect(curves).toEqual([null, null, null, null]);
  });

  it('keeps an empty curve as an empty array', async () => {
    const { client } = clientFor(() => envelope([]));
    expect(await client.fetchRiskCurves(['bitcoin'])).toEqual([[]]);
  });

  it('returns an empty batch without any request when credentials are missing', async () => {
    const { client, calls } = clientFor(() => envelope([[1, 0.1]]), {
      credentials: { baseUrl: BASE_URL, token: null },
    });
    expect(await client.fetchRiskCurves(['bitcoin', 'ethereum'])).toEqual([]);

    const noUrl = await client.fetchRiskCurves(['bitcoin'], { baseUrl: null, token: 'test-token' });
    expect(noUrl).toEqual([]);
    expect(calls).toHaveLength(0);
  });

  it('accepts per-call credentials', async () => {
    const { client, calls } = clientFor(() => envelope([]), { credentials: { baseUrl: null, token: null } });
    await client.fetchRiskCurves(['x'], { baseUrl: 'https://other.test/r/', token: 'other-token' });
    expect(calls[0].url).toBe('https://other.test/r/x');
    expect(calls[0].headers.get('Authorization')).toBe('Bearer other-token');
  });

  it('bounds in-flight requests when maxConcurrency is set', async () => {
    let inFlight = 0;
    let peak = 0;
    const { client } = clientFor(
      async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(5);
        inFlight--;
        return envelope([[1, 0.1]]);
      },
      { maxConcurrency: 2 },
    );

    const curves = await client.fetchRiskCurves(['a', 'b', 'c', 'd', 'e']);
    expect(curves).toHaveLength(5);
    expect(peak).toBe(2);
  });
});
