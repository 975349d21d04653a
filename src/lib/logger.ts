/**
 * Structured JSON Logger
 *
 * Thin wrapper over pino so every component logs the same record shape:
 * `{ level, time, service, component, ...context, msg }`.
 *
 * No console.log in library code; all output goes through this logger.
 * Call form is pino's: `log.info({ key: value }, 'message')` or `log.info('message')`.
 */

import { pino, type Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

const LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

type LevelName = (typeof LEVELS)[number];

function isLevelName(value: string): value is LevelName {
  return LEVELS.some((level) => level === value);
}

export function parseLogLevel(level: string | undefined): LevelName {
  const normalized = (level ?? '').trim().toLowerCase();
  return isLevelName(normalized) ? normalized : 'info';
}

export function createLogger(bindings: Record<string, unknown> = {}, level?: string): Logger {
  return pino({
    level: parseLogLevel(level ?? process.env.LOG_LEVEL),
    base: { service: 'riskboard', ...bindings },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

/** Root application logger */
export const logger: Logger = createLogger();
