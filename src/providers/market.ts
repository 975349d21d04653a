import { BaseHttpClient, type HttpClientOptions } from './base.js';
import { DEFAULT_MARKET_API_URL } from '../config/index.js';
import { TransportError, errorMessage } from '../lib/errors.js';
import { isRecord } from '../lib/guards.js';
import type { MarketDataSource, PriceMap, PriceQuote } from './types.js';

export interface MarketClientOptions extends HttpClientOptions {
  baseUrl?: string;
}

/**
 * Spot prices from a CoinGecko-compatible `simple/price` endpoint.
 *
 * One request per call for the whole id list. A failed request or a body that
 * is not a JSON object fails the whole call with TransportError; an id the
 * provider left out simply has no entry in the returned map.
 */
export class MarketDataClient extends BaseHttpClient implements MarketDataSource {
  readonly name = 'market';

  constructor(options: MarketClientOptions = {}) {
    super(options.baseUrl ?? DEFAULT_MARKET_API_URL, options);
  }

  async fetchPrices(assetIds: readonly string[]): Promise<PriceMap> {
    const quotes: PriceMap = new Map();
    if (assetIds.length === 0) return quotes;

    let body: unknown;
    try {
      body = await this.get<unknown>('/simple/price', {
        params: {
          ids: assetIds.join(','),
          vs_currencies: 'USD',
          include_24hr_change: 'true',
        },
      });
    } catch (err) {
      throw new TransportError(this.name, `Price request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!isRecord(body)) {
      throw new TransportError(this.name, 'Price response is not a JSON object');
    }

    for (const assetId of assetIds) {
      const entry = body[assetId];
      if (entry === undefined) continue;
      const quote = this.parseQuote(assetId, entry);
      if (quote) quotes.set(assetId, quote);
    }

    this.logger.debug({ requested: assetIds.length, quoted: quotes.size }, 'Prices fetched');
    return quotes;
  }

  private parseQuote(assetId: string, entry: unknown): PriceQuote | null {
    if (!isRecord(entry)) {
      this.logger.warn({ assetId }, 'Ignoring non-object price entry');
      return null;
    }

    let priceUsd: number;
    try {
      priceUsd = this.toFiniteNumber(entry.usd, 'usd');
    } catch (err) {
      this.logger.warn({ assetId, err: errorMessage(err) }, 'Ignoring price entry');
      return null;
    }

    const change = entry.usd_24h_change;
    const change24hPct = typeof change === 'number' && Number.isFinite(change) ? change : 0;

    return { assetId, priceUsd, change24hPct };
  }
}
