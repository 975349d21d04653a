import { DashboardAggregator, type DisplayRecord } from '../aggregator/index.js';
import { advanceSession, type Session, type StatusMessage, type UserAction } from '../auth/session.js';
import { validateToken } from '../auth/token.js';
import { logger as rootLogger } from '../lib/logger.js';
import type { Asset, MarketDataSource, RiskDataSource } from '../providers/types.js';

const log = rootLogger.child({ component: 'dashboard' });

export interface DashboardDeps {
  catalog: readonly Asset[];
  market: MarketDataSource;
  risk: RiskDataSource;
  tokenSecret: string | null;
  /** Epoch seconds; injectable for tests. */
  clock?: () => number;
}

export interface SessionUpdate {
  session: Session;
  message: StatusMessage | null;
}

export interface RenderResult extends SessionUpdate {
  authenticated: boolean;
  records: DisplayRecord[];
  timestamp: number;
}

export type CycleOutcome =
  | { ok: true; result: RenderResult }
  | { ok: false; update: SessionUpdate; error: Error };

/**
 * One render cycle = fold the visitor's actions into their session, run the
 * render transition, then fetch and join the data that session may see.
 */
export class DashboardService {
  readonly catalog: readonly Asset[];
  private readonly aggregator: DashboardAggregator;
  private readonly tokenSecret: string | null;
  private readonly clock: (() => number) | undefined;

  constructor(deps: DashboardDeps) {
    this.catalog = deps.catalog;
    this.aggregator = new DashboardAggregator(deps.market, deps.risk);
    this.tokenSecret = deps.tokenSecret;
    this.clock = deps.clock;

    if (!this.tokenSecret) {
      log.warn('No token secret configured, every access token will be rejected');
    }
  }

  verifyToken = (token: string): boolean => {
    if (!this.tokenSecret) return false;
    return validateToken(token, this.tokenSecret, this.clock?.()).valid;
  };

  /** Synchronous half of a cycle; never touches the network. */
  updateSession(session: Session, actions: readonly UserAction[] = []): SessionUpdate {
    const result = advanceSession(session, actions, this.verifyToken);
    if (result.message) {
      log.debug({ status: result.session.status, message: result.message.text }, 'Session message');
    }
    return result;
  }

  async loadRecords(authenticated: boolean): Promise<DisplayRecord[]> {
    return this.aggregator.run(this.catalog, authenticated);
  }

  /**
   * One full cycle. Never rejects: the session update is returned on both
   * branches so a caller that owns the session keeps the transition even
   * when market data could not be loaded.
   */
  async runCycle(session: Session, actions: readonly UserAction[] = []): Promise<CycleOutcome> {
    const update = this.updateSession(session, actions);
    try {
      const records = await this.loadRecords(update.session.authenticated);
      return {
        ok: true,
        result: {
          ...update,
          authenticated: update.session.authenticated,
          records,
          timestamp: Date.now(),
        },
      };
    } catch (err) {
      return { ok: false, update, error: err instanceof Error ? err : new Error(String(err)) };
    }
  }

  /** Rejects with TransportError when market data cannot be loaded. */
  async renderCycle(session: Session, actions: readonly UserAction[] = []): Promise<RenderResult> {
    const outcome = await this.runCycle(session, actions);
    if (!outcome.ok) throw outcome.error;
    return outcome.result;
  }
}
