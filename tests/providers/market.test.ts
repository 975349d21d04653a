// ─────────────────────────────────────────────────────────────
// Tests — Market data client
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { MarketDataClient } from '../../src/providers/market.js';
import { ProviderMetrics } from '../../src/observability/index.js';
import { TransportError } from '../../src/lib/errors.js';
import { FAST_HTTP, httpError, stubTransport, type StubHandler } from '../helpers/http.js';

const BASE_URL = 'https://market.test/api/v3';

function clientFor(handler: StubHandler, extra: { maxRetries?: number; metrics?: ProviderMetrics } = {}) {
  const transport = stubTransport(handler);
  const client = new MarketDataClient({
    baseUrl: BASE_URL,
    http: { ...FAST_HTTP, maxRetries: extra.maxRetries ?? 1 },
    axiosConfig: { adapter: transport.adapter },
    metrics: extra.metrics,
  });
  return { client, calls: transport.calls };
}

describe('MarketDataClient.fetchPrices', () => {
  it('issues one batched request with USD and 24h change', async () => {
    const { client, calls } = clientFor(() => ({}));
    await client.fetchPrices(['bitcoin', 'ethereum']);

    expect(calls).toHaveLength(1);
    expect(calls[0].baseURL).toBe(BASE_URL);
    expect(calls[0].url).toBe('/simple/price');
    expect(calls[0].params).toEqual({
      ids: 'bitcoin,ethereum',
      vs_currencies: 'USD',
      include_24hr_change: 'true',
    });
  });

  it('maps each returned asset to a quote', async () => {
    const { client } = clientFor(() => ({
      bitcoin: { usd: 50000, usd_24h_change: 2.1 },
      ethereum: { usd: 3000, usd_24h_change: -1.0 },
    }));

    const quotes = await client.fetchPrices(['bitcoin', 'ethereum']);
    expect(quotes.get('bitcoin')).toEqual({ assetId: 'bitcoin', priceUsd: 50000, change24hPct: 2.1 });
    expect(quotes.get('ethereum')).toEqual({ assetId: 'ethereum', priceUsd: 3000, change24hPct: -1.0 });
  });

  it('leaves out assets the provider did not return or could not price', async () => {
    const { client } = clientFor(() => ({
      bitcoin: { usd: 50000, usd_24h_change: 2.1 },
      solana: { usd: null, usd_24h_change: 1 },
      cardano: 'n/a',
      unrequested: { usd: 1, usd_24h_change: 1 },
    }));

    const quotes = await client.fetchPrices(['bitcoin', 'ethereum', 'solana', 'cardano']);
    expect([...quotes.keys()]).toEqual(['bitcoin']);
  });

  it('does not coerce non-numeric prices', async () => {
    const { client } = clientFor(() => ({
      bitcoin: { usd: [], usd_24h_change: 1 },
      ethereum: { usd: '3000 USD', usd_24h_change: 1 },
      solana: { usd: [150], usd_24h_change: 1 },
      cardano: { usd: '0.45', usd_24h_change: 1 },
      dogecoin: { usd: 0.12, usd_24h_change: 1 },
    }));

    const quotes = await client.fetchPrices(['bitcoin', 'ethereum', 'solana', 'cardano', 'dogecoin']);
    expect([...quotes.keys()]).toEqual(['dogecoin']);
  });

  it('reports a missing 24h change as 0', async () => {
    const { client } = clientFor(() => ({ dogecoin: { usd: 0.12 } }));
    const quotes = await client.fetchPrices(['dogecoin']);
    expect(quotes.get('dogecoin')).toEqual({ assetId: 'dogecoin', priceUsd: 0.12, change24hPct: 0 });
  });

  it('fails the whole call with TransportError when the request fails', async () => {
    const { client, calls } = clientFor(
      (config) => {
        throw httpError(config, 503);
      },
      { maxRetries: 2 },
    );

    await expect(client.fetchPrices(['bitcoin'])).rejects.toBeInstanceOf(TransportError);
    expect(calls).toHaveLength(2);
    expect(client.getHealth().consecutiveFailures).toBe(1);
  });

  it('fails the whole call when the body is not an object', async () => {
    const { client } = clientFor(() => [1, 2, 3]);
    await expect(client.fetchPrices(['bitcoin'])).rejects.toThrow('[market] Price response is not a JSON object');
  });

  it('does not call the provider for an empty id list', async () => {
    const { client, calls } = clientFor(() => ({}));
    const quotes = await client.fetchPrices([]);
    expect(quotes.size).toBe(0);
    expect(calls).toHaveLength(0);
  });

  it('records success and failure in the shared metrics', async () => {
    const metrics = new ProviderMetrics();
    let fail = false;
    const { client } = clientFor(
      (config) => {
        if (fail) throw httpError(config, 500);
        return {};
      },
      { metrics },
    );

    await client.fetchPrices(['bitcoin']);
    fail = true;
    await expect(client.fetchPrices(['bitcoin'])).rejects.toBeInstanceOf(TransportError);

    const stats = metrics.getStats('market');
    expect(stats.successCount).toBe(1);
    expect(stats.errorCount).toBe(1);
    expect(stats.errorRate).toBe(0.5);
    expect(stats.lastError).toBe('Request failed with status code 500');
  });
});
