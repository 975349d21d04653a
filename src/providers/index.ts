export * from './types.js';
export { BaseHttpClient, type HttpClientOptions, type HttpConfig, type ProviderHealth } from './base.js';
export { MarketDataClient, type MarketClientOptions } from './market.js';
export { RiskDataClient, type RiskClientOptions } from './risk.js';
