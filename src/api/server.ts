import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import { createServer, type Server } from 'http';
import { createSession, type UserAction } from '../auth/session.js';
import { DashboardService } from '../dashboard/index.js';
import { loadCatalog } from '../catalog/index.js';
import { loadConfig, type AppConfig } from '../config/index.js';
import { MarketDataClient } from '../providers/market.js';
import { RiskDataClient } from '../providers/risk.js';
import { ProviderMetrics, buildHealthStatus, type HealthSource } from '../observability/index.js';
import { DashboardSocket } from '../websocket/index.js';
import { TransportError, errorMessage } from '../lib/errors.js';
import { logger as rootLogger } from '../lib/logger.js';
import { createAuthRouter } from './routes/auth.js';

const log = rootLogger.child({ component: 'api-server' });

export interface AppDeps {
  config: Pick<AppConfig, 'tokenSecret' | 'adminSecret' | 'tokenTtlSeconds' | 'allowedOrigins'>;
  service: DashboardService;
  providers: readonly HealthSource[];
  metrics: ProviderMetrics;
  /** Live WebSocket client count for the health endpoint. */
  wsClientCount?: () => number;
}

function bearerToken(req: Request): string | null {
  const header = req.header('authorization');
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match ? match[1].trim() : null;
}

export function createApp(deps: AppDeps): Express {
  const { config, service } = deps;
  const app = express();

  app.use(express.json({ limit: '16kb' }));

  // CORS: only the configured origins get credentials
  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (origin && config.allowedOrigins.includes(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Access-Control-Allow-Credentials', 'true');
    }
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Origin, Content-Type, Accept, Authorization, X-Admin-Secret');
    res.header('Access-Control-Max-Age', '86400');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    log.info({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.get('/api/v1/health', (_req: Request, res: Response) => {
    res.json(
      buildHealthStatus(deps.providers, deps.wsClientCount?.() ?? 0, service.catalog.length, deps.metrics),
    );
  });

  app.get('/api/v1/assets', (_req: Request, res: Response) => {
    res.json({ success: true, assets: service.catalog });
  });

  // Stateless render cycle: a bearer token counts as this request's auth attempt
  app.get('/api/v1/dashboard', async (req: Request, res: Response) => {
    const token = bearerToken(req);
    const actions: UserAction[] = token ? [{ type: 'tokenSubmitted', token }] : [];

    try {
      const result = await service.renderCycle(createSession(), actions);
      res.json({
        success: true,
        authenticated: result.authenticated,
        message: result.message,
        records: result.records,
        timestamp: result.timestamp,
      });
    } catch (error) {
      log.error({ err: errorMessage(error) }, 'Dashboard cycle failed');
      res.status(error instanceof TransportError ? 502 : 500).json({
        success: false,
        error: errorMessage(error),
      });
    }
  });

  app.use(
    '/api/v1/auth',
    createAuthRouter({
      tokenSecret: config.tokenSecret,
      adminSecret: config.adminSecret,
      defaultTtlSeconds: config.tokenTtlSeconds,
    }),
  );

  return app;
}

export interface RunningServer {
  server: Server;
  socket: DashboardSocket;
  close(): Promise<void>;
}

/** Wires config, catalog, providers and the socket server, then listens. */
export async function startServer(config: AppConfig = loadConfig()): Promise<RunningServer> {
  const catalog = loadCatalog(config.catalogPath);
  const metrics = new ProviderMetrics();
  const http = { timeoutMs: config.http.timeoutMs, maxRetries: config.http.maxRetries };

  const market = new MarketDataClient({ baseUrl: config.marketApiUrl, http, metrics });
  const risk = new RiskDataClient({
    credentials: { baseUrl: config.riskApiUrl, token: config.riskApiToken },
    maxConcurrency: config.riskMaxConcurrency,
    http,
    metrics,
  });
  const service = new DashboardService({ catalog, market, risk, tokenSecret: config.tokenSecret });

  let socket: DashboardSocket | null = null;
  const app = createApp({
    config,
    service,
    providers: [market, risk],
    metrics,
    wsClientCount: () => socket?.getClientCount() ?? 0,
  });

  const server = createServer(app);
  socket = new DashboardSocket(server, service, config.refreshIntervalMs);
  const ws = socket;

  try {
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(config.port, () => {
        server.off('error', reject);
        resolve();
      });
    });
  } catch (err) {
    ws.close();
    log.error({ port: config.port, err: errorMessage(err) }, 'Dashboard server failed to listen');
    throw err;
  }

  log.info(
    {
      port: config.port,
      assetCount: catalog.length,
      riskConfigured: Boolean(config.riskApiUrl && config.riskApiToken),
      refreshIntervalSec: config.refreshIntervalMs / 1000,
    },
    'Dashboard server started',
  );

  return {
    server,
    socket: ws,
    close: () =>
      new Promise<void>((resolve, reject) => {
        ws.close();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
