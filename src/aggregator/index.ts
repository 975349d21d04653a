import { logger as rootLogger } from '../lib/logger.js';
import type {
  Asset,
  MarketDataSource,
  PriceMap,
  PriceQuote,
  RiskCurve,
  RiskDataSource,
  RiskPoint,
} from '../providers/types.js';

const log = rootLogger.child({ component: 'aggregator' });

export type RiskView =
  | { kind: 'hidden' }                                    // Viewer gets no privileged data
  | { kind: 'no-data' }                                   // Renderer shows "No Chart Data"
  | { kind: 'matched'; point: RiskPoint; curve: RiskCurve };

export interface DisplayRecord {
  asset: Asset;
  quote: PriceQuote;
  matchedRisk: RiskPoint | null;
  risk: RiskView;
}

export interface FetchedData {
  quotes: PriceMap;
  /** Positionally aligned with the requested ids; empty when no risk data was loaded. */
  curves: Array<RiskCurve | null>;
}

/**
 * The point with the largest price not above `price`. The curve is sorted by
 * price first (stable, on a copy), so provider order does not change the
 * answer. Null when the curve is empty or the price is below every point.
 */
export function matchRiskPoint(curve: readonly RiskPoint[], price: number): RiskPoint | null {
  const sorted = [...curve].sort((a, b) => a.price - b.price);
  let match: RiskPoint | null = null;
  for (const point of sorted) {
    if (point.price > price) break;
    match = point;
  }
  return match;
}

function riskViewFor(
  curve: RiskCurve | null | undefined,
  price: number,
): RiskView {
  if (!curve || curve.length === 0) return { kind: 'no-data' };
  const point = matchRiskPoint(curve, price);
  return point ? { kind: 'matched', point, curve } : { kind: 'no-data' };
}

export function buildDisplayRecords(
  catalog: readonly Asset[],
  quotes: PriceMap,
  curves: ReadonlyArray<RiskCurve | null>,
  authenticated: boolean,
): DisplayRecord[] {
  const showRisk = authenticated && curves.length > 0;
  const records: DisplayRecord[] = [];

  catalog.forEach((asset, i) => {
    const quote = quotes.get(asset.id);
    if (!quote) return;

    const risk: RiskView = showRisk ? riskViewFor(curves[i], quote.priceUsd) : { kind: 'hidden' };
    records.push({
      asset,
      quote,
      matchedRisk: risk.kind === 'matched' ? risk.point : null,
      risk,
    });
  });

  return records;
}

export class DashboardAggregator {
  constructor(
    private readonly market: MarketDataSource,
    private readonly risk: RiskDataSource,
  ) {}

  /**
   * Market prices always; risk curves only for an authenticated viewer. Both
   * run concurrently and the join waits for every request to settle.
   */
  async fetchAll(assetIds: readonly string[], authenticated: boolean): Promise<FetchedData> {
    const [quotes, curves] = await Promise.all([
      this.market.fetchPrices(assetIds),
      authenticated ? this.risk.fetchRiskCurves(assetIds) : Promise.resolve<Array<RiskCurve | null>>([]),
    ]);
    return { quotes, curves };
  }

  aggregate(catalog: readonly Asset[], data: FetchedData, authenticated: boolean): DisplayRecord[] {
    const records = buildDisplayRecords(catalog, data.quotes, data.curves, authenticated);
    log.debug(
      {
        assets: catalog.length,
        records: records.length,
        matched: records.filter((r) => r.risk.kind === 'matched').length,
      },
      'Display records built',
    );
    return records;
  }

  async run(catalog: readonly Asset[], authenticated: boolean): Promise<DisplayRecord[]> {
    const data = await this.fetchAll(catalog.map((a) => a.id), authenticated);
    return this.aggregate(catalog, data, authenticated);
  }
}
