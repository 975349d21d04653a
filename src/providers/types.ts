export const PROVIDER_NAMES = ['market', 'risk'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export interface Asset {
  id: string;          // Provider id, e.g. "bitcoin"
  displayName: string; // Title-cased for display
}

export interface PriceQuote {
  assetId: string;
  priceUsd: number;
  change24hPct: number; // Already in percent (2.1 = +2.1%)
}

/** Keyed by asset id. A missing key means the provider had nothing for that asset. */
export type PriceMap = Map<string, PriceQuote>;

export interface RiskPoint {
  price: number;
  riskPct: number;     // Provider fraction × 100
}

/** Provider order, not re-sorted. */
export type RiskCurve = RiskPoint[];

export interface RiskCredentials {
  baseUrl: string | null;
  token: string | null;
}

export interface MarketDataSource {
  readonly name: string;
  fetchPrices(assetIds: readonly string[]): Promise<PriceMap>;
}

export interface RiskDataSource {
  readonly name: string;
  fetchRiskCurves(assetIds: readonly string[], credentials?: RiskCredentials): Promise<Array<RiskCurve | null>>;
}
