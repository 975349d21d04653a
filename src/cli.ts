#!/usr/bin/env node
import { startServer } from './api/server.js';
import { issueToken, validateToken } from './auth/token.js';
import { loadCatalog } from './catalog/index.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { DashboardService, type RenderResult } from './dashboard/index.js';
import { renderDashboard } from './dashboard/render.js';
import { DashboardMonitor } from './monitor/index.js';
import { MarketDataClient } from './providers/market.js';
import { RiskDataClient } from './providers/risk.js';
import { parseArgs, numericFlag, type ParsedArgs } from './lib/args.js';
import { errorMessage } from './lib/errors.js';
import { logger as rootLogger } from './lib/logger.js';

const log = rootLogger.child({ component: 'cli' });

const USAGE = `Usage: riskboard <command> [options]

Commands:
  serve                         Start the HTTP + WebSocket server
  issue-token [--ttl <seconds>] Print a new access token
  verify-token <token>          Check a token (exit code 1 when invalid)
  watch [--token <token>] [--interval <ms>] [--curves]
                                Terminal dashboard
`;

const w = (s: string) => process.stdout.write(s + '\n');

function requireSecret(config: AppConfig): string {
  if (!config.tokenSecret) {
    throw new Error('TOKEN_SECRET is not set');
  }
  return config.tokenSecret;
}

function clearScreen(): void {
  process.stdout.write('\x1B[2J\x1B[0f');
}

function printCycle(result: RenderResult, showCurves: boolean): void {
  clearScreen();
  w('╔════════════════════════════════════════════════════════════╗');
  w('║                  RISKBOARD - Crypto Risk                   ║');
  w('╚════════════════════════════════════════════════════════════╝');
  w(`  Updated: ${new Date(result.timestamp).toLocaleTimeString()}`);
  w('');
  for (const line of renderDashboard(result, { showCurves })) {
    w(line);
  }
  w('');
  w('  Press Ctrl+C to stop');
}

async function watch(config: AppConfig, args: ParsedArgs): Promise<void> {
  const token = args.flags.get('token');
  const http = { timeoutMs: config.http.timeoutMs, maxRetries: config.http.maxRetries };

  const service = new DashboardService({
    catalog: loadCatalog(config.catalogPath),
    market: new MarketDataClient({ baseUrl: config.marketApiUrl, http }),
    risk: new RiskDataClient({
      credentials: { baseUrl: config.riskApiUrl, token: config.riskApiToken },
      maxConcurrency: config.riskMaxConcurrency,
      http,
    }),
    tokenSecret: config.tokenSecret,
  });

  const monitor = new DashboardMonitor(service, {
    intervalMs: numericFlag(args.flags, 'interval', config.refreshIntervalMs),
    token: typeof token === 'string' ? token : undefined,
  });
  const showCurves = args.flags.get('curves') === true;

  monitor.on('render', (result: RenderResult) => printCycle(result, showCurves));
  monitor.on('error', (error: Error) => {
    log.error({ err: error.message }, 'Render cycle failed');
  });

  process.on('SIGINT', () => {
    w('\nShutting down...');
    monitor.stop();
    process.exit(0);
  });

  await monitor.start();
}

async function main(argv: readonly string[]): Promise<number> {
  const args = parseArgs(argv);
  const config = loadConfig();

  switch (args.command) {
    case 'serve': {
      const running = await startServer(config);
      process.on('SIGINT', () => {
        log.info('Shutting down dashboard server');
        running.close().then(
          () => process.exit(0),
          (err: unknown) => {
            log.error({ err: errorMessage(err) }, 'Error during shutdown');
            process.exit(1);
          },
        );
      });
      return 0;
    }

    case 'issue-token': {
      const ttl = numericFlag(args.flags, 'ttl', config.tokenTtlSeconds);
      w(issueToken(requireSecret(config), ttl));
      return 0;
    }

    case 'verify-token': {
      const [token] = args.positionals;
      if (!token) {
        w(USAGE);
        return 2;
      }
      const result = validateToken(token, requireSecret(config));
      if (result.valid) {
        w(`valid, expires ${new Date(result.expiry * 1000).toISOString()}`);
        return 0;
      }
      w('invalid');
      return 1;
    }

    case 'watch':
      await watch(config, args);
      return 0;

    default:
      w(USAGE);
      return args.command === null || args.command === 'help' ? 0 : 2;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    if (code !== 0) process.exitCode = code;
  },
  (err: unknown) => {
    log.fatal({ err: errorMessage(err) }, 'Command failed');
    process.exitCode = 1;
  },
);
