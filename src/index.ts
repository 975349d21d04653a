export { issueToken, validateToken, currentTimeSeconds, type TokenValidation } from './auth/token.js';
export {
  createSession,
  transition,
  advanceSession,
  MESSAGES,
  type Session,
  type SessionEvent,
  type SessionStatus,
  type StatusMessage,
  type UserAction,
} from './auth/session.js';
export * from './providers/index.js';
export {
  DashboardAggregator,
  buildDisplayRecords,
  matchRiskPoint,
  type DisplayRecord,
  type RiskView,
} from './aggregator/index.js';
export { DashboardService, type CycleOutcome, type RenderResult } from './dashboard/index.js';
export { renderDashboard } from './dashboard/render.js';
export { DashboardMonitor } from './monitor/index.js';
export { loadCatalog, parseCatalog } from './catalog/index.js';
export { loadConfig, type AppConfig } from './config/index.js';
export { createApp, startServer } from './api/server.js';
export { TransportError, ProviderFormatError, AuthConfigError, ConfigError } from './lib/errors.js';
