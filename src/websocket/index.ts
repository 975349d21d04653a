import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { Server } from 'http';
import { createSession, type Session, type UserAction } from '../auth/session.js';
import type { DashboardService } from '../dashboard/index.js';
import { logger as rootLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { isRecord } from '../lib/guards.js';

const log = rootLogger.child({ component: 'websocket' });

export interface WSMessage {
  type: 'connected' | 'render' | 'error' | 'pong';
  payload?: unknown;
  timestamp: number;
}

export type ClientMessage =
  | { type: 'authenticate'; token: string }
  | { type: 'refresh' }
  | { type: 'ping' };

interface ClientState {
  session: Session;
  /** Actions received since the last cycle started. */
  pending: UserAction[];
  /** Another cycle is owed once the running one finishes. */
  queued: boolean;
  running: boolean;
}

export function parseClientMessage(data: string): ClientMessage | null {
  let message: unknown;
  try {
    message = JSON.parse(data);
  } catch {
    return null;
  }
  if (!isRecord(message)) return null;

  switch (message.type) {
    case 'authenticate':
      return typeof message.token === 'string' ? { type: 'authenticate', token: message.token } : null;
    case 'refresh':
      return { type: 'refresh' };
    case 'ping':
      return { type: 'ping' };
    default:
      return null;
  }
}

/**
 * One session per connection. A render cycle runs on connect, on every
 * `authenticate` / `refresh` frame, and for every idle client on the refresh
 * interval. At most one cycle per client is in flight; frames that arrive
 * meanwhile fold into the single follow-up cycle.
 */
export class DashboardSocket {
  private wss: WebSocketServer;
  private clients = new Map<WebSocket, ClientState>();
  private refreshTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    server: Server,
    private readonly service: DashboardService,
    refreshIntervalMs: number,
  ) {
    this.wss = new WebSocketServer({ server, path: '/ws' });
    this.init(refreshIntervalMs);
  }

  private init(refreshIntervalMs: number): void {
    this.wss.on('connection', (ws: WebSocket) => {
      const state: ClientState = { session: createSession(), pending: [], queued: false, running: false };
      this.clients.set(ws, state);
      log.info({ totalClients: this.clients.size }, 'Client connected');

      this.send(ws, {
        type: 'connected',
        payload: { assets: this.service.catalog },
        timestamp: Date.now(),
      });
      this.request(ws, state, []);

      ws.on('message', (data: RawData) => {
        const message = parseClientMessage(data.toString());
        if (!message) {
          log.warn('Ignoring malformed client message');
          return;
        }
        switch (message.type) {
          case 'ping':
            this.send(ws, { type: 'pong', timestamp: Date.now() });
            break;
          case 'authenticate':
            this.request(ws, state, [{ type: 'tokenSubmitted', token: message.token }]);
            break;
          case 'refresh':
            this.request(ws, state, []);
            break;
        }
      });

      ws.on('close', () => {
        this.clients.delete(ws);
        log.info({ totalClients: this.clients.size }, 'Client disconnected');
      });

      ws.on('error', (error) => {
        log.error({ err: error.message }, 'Client error');
        this.clients.delete(ws);
      });
    });

    this.wss.on('error', (error) => {
      log.error({ err: error.message }, 'WebSocket server error');
    });

    this.refreshTimer = setInterval(() => {
      for (const [ws, state] of this.clients) {
        if (!state.running) this.request(ws, state, []);
      }
    }, refreshIntervalMs);
  }

  private request(ws: WebSocket, state: ClientState, actions: UserAction[]): void {
    state.pending.push(...actions);
    state.queued = true;
    if (state.running) return;

    state.running = true;
    this.drain(ws, state).catch((err: unknown) => {
      log.error({ err: errorMessage(err) }, 'Render loop failed');
    });
  }

  private async drain(ws: WebSocket, state: ClientState): Promise<void> {
    try {
      while (state.queued && ws.readyState === WebSocket.OPEN) {
        state.queued = false;
        const actions = state.pending;
        state.pending = [];
        await this.runCycle(ws, state, actions);
      }
    } finally {
      state.running = false;
    }
  }

  private async runCycle(ws: WebSocket, state: ClientState, actions: UserAction[]): Promise<void> {
    const outcome = await this.service.runCycle(state.session, actions);

    if (outcome.ok) {
      const { result } = outcome;
      state.session = result.session;
      this.send(ws, {
        type: 'render',
        payload: { authenticated: result.authenticated, message: result.message, records: result.records },
        timestamp: result.timestamp,
      });
      return;
    }

    state.session = outcome.update.session;
    log.error({ err: outcome.error.message }, 'Render cycle failed');
    this.send(ws, {
      type: 'error',
      payload: { error: outcome.error.message, message: outcome.update.message },
      timestamp: Date.now(),
    });
  }

  private send(ws: WebSocket, message: WSMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  getClientCount(): number {
    return this.clients.size;
  }

  close(): void {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
    }
    for (const ws of this.clients.keys()) {
      ws.close();
    }
    this.wss.close();
  }
}
