import { EventEmitter } from 'events';
import { createSession, type Session, type UserAction } from '../auth/session.js';
import type { DashboardService, RenderResult } from '../dashboard/index.js';

export interface MonitorConfig {
  intervalMs: number;  // Polling interval in milliseconds
  token?: string;      // Submitted once, before the first cycle
}

/**
 * Polls the dashboard for a single local viewer. Emits `render` with a
 * RenderResult after every cycle and `error` when market data fails. The
 * monitor owns that viewer's session; ticks never overlap because the next one is only
 * scheduled after the previous one finished.
 */
export class DashboardMonitor extends EventEmitter {
  private session: Session = createSession();
  private pending: UserAction[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private isRunning = false;
  private lastResult: RenderResult | null = null;

  constructor(
    private readonly service: DashboardService,
    private readonly config: MonitorConfig,
  ) {
    super();
    if (config.token) {
      this.pending.push({ type: 'tokenSubmitted', token: config.token });
    }
  }

  async start(): Promise<void> {
    if (this.isRunning) return;
    this.isRunning = true;
    await this.tick();
    this.schedule();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.isRunning = false;
  }

  /** Queues a token for the next cycle. */
  submitToken(token: string): void {
    this.pending.push({ type: 'tokenSubmitted', token });
  }

  async tick(): Promise<void> {
    const actions = this.pending;
    this.pending = [];

    const outcome = await this.service.runCycle(this.session, actions);
    if (outcome.ok) {
      this.session = outcome.result.session;
      this.lastResult = outcome.result;
      this.emit('render', outcome.result);
    } else {
      this.session = outcome.update.session;
      this.emit('error', outcome.error);
    }
  }

  getSession(): Session {
    return this.session;
  }

  getLastResult(): RenderResult | null {
    return this.lastResult;
  }

  isActive(): boolean {
    return this.isRunning;
  }

  private schedule(): void {
    if (!this.isRunning) return;
    this.timer = setTimeout(() => {
      this.tick()
        .catch((err: unknown) => {
          this.emit('error', err instanceof Error ? err : new Error(String(err)));
        })
        .finally(() => this.schedule());
    }, this.config.intervalMs);
  }
}
