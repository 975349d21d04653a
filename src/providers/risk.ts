import { BaseHttpClient, type HttpClientOptions } from './base.js';
import { AuthConfigError, ProviderFormatError, errorMessage } from '../lib/errors.js';
import { isRecord } from '../lib/guards.js';
import { mapConcurrent } from '../lib/concurrency.js';
import type { RiskCredentials, RiskCurve, RiskDataSource, RiskPoint } from './types.js';

export interface RiskClientOptions extends HttpClientOptions {
  credentials?: RiskCredentials;
  /** Upper bound on in-flight requests per batch. Default: unbounded. */
  maxConcurrency?: number;
}

interface RequestContext {
  baseUrl: string;
  headers: Record<string, string>;
}

/**
 * Privileged risk curves, one authenticated GET per asset (`baseUrl + id`).
 *
 * Every slot is isolated: a failed or malformed response only nulls that
 * asset. Missing credentials degrade the whole batch to an empty result.
 */
export class RiskDataClient extends BaseHttpClient implements RiskDataSource {
  readonly name = 'risk';

  private readonly credentials: RiskCredentials;
  private readonly maxConcurrency: number;

  constructor(options: RiskClientOptions = {}) {
    super(undefined, options);
    this.credentials = options.credentials ?? { baseUrl: null, token: null };
    this.maxConcurrency = options.maxConcurrency ?? Number.POSITIVE_INFINITY;
  }

  async fetchRiskCurves(
    assetIds: readonly string[],
    credentials: RiskCredentials = this.credentials,
  ): Promise<Array<RiskCurve | null>> {
    let context: RequestContext;
    try {
      context = this.openContext(credentials);
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Risk data unavailable for this cycle');
      return [];
    }

    const t0 = Date.now();
    const curves = await mapConcurrent(assetIds, this.maxConcurrency, (assetId) =>
      this.fetchCurve(assetId, context),
    );

    this.logger.debug(
      {
        requested: assetIds.length,
        received: curves.filter((c) => c !== null).length,
        durationMs: Date.now() - t0,
      },
      'Risk curves fetched',
    );
    return curves;
  }

  private openContext(credentials: RiskCredentials): RequestContext {
    if (!credentials.baseUrl) throw new AuthConfigError('Risk API base URL is not configured');
    if (!credentials.token) throw new AuthConfigError('Risk API token is not configured');
    return {
      baseUrl: credentials.baseUrl,
      headers: { Authorization: `Bearer ${credentials.token}` },
    };
  }

  private async fetchCurve(assetId: string, context: RequestContext): Promise<RiskCurve | null> {
    try {
      const body = await this.get<unknown>(context.baseUrl + encodeURIComponent(assetId), {
        headers: context.headers,
      });
      if (!isRecord(body) || !('data' in body)) {
        this.logger.info({ assetId }, 'No risk data for asset');
        return null;
      }
      return this.parseCurve(body.data);
    } catch (err) {
      this.logger.warn({ assetId, err: errorMessage(err) }, 'Risk curve fetch failed');
      return null;
    }
  }

  private parseCurve(data: unknown): RiskCurve {
    if (!isRecord(data) || !Array.isArray(data.USD)) {
      throw new ProviderFormatError(this.name, 'data.USD', data, 'Expected an array of [price, risk] pairs');
    }

    return data.USD.map((row: unknown, i): RiskPoint => {
      if (!Array.isArray(row) || row.length < 2) {
        throw new ProviderFormatError(this.name, `data.USD[${i}]`, row, 'Expected a [price, risk] pair');
      }
      const price = this.toFiniteNumber(row[0], `data.USD[${i}][0]`);
      const raw = this.toFiniteNumber(row[1], `data.USD[${i}][1]`);
      return { price, riskPct: raw * 100 };
    });
  }
}
