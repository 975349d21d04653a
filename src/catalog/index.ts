import { readFileSync } from 'node:fs';
import { logger as rootLogger } from '../lib/logger.js';
import { ConfigError, errorMessage } from '../lib/errors.js';
import { isRecord } from '../lib/guards.js';
import type { Asset } from '../providers/types.js';

const log = rootLogger.child({ component: 'catalog' });

export function titleCase(name: string): string {
  return name
    .split(/(\s+|-)/)
    .map((part) => (part.length > 0 ? part[0].toUpperCase() + part.slice(1).toLowerCase() : part))
    .join('');
}

/** Parses `{ "coins": [{ "id", "name" }] }`, keeping file order. */
export function parseCatalog(raw: unknown, source = 'catalog'): readonly Asset[] {
  if (!isRecord(raw) || !Array.isArray(raw.coins)) {
    throw new ConfigError('CATALOG_PATH', source, 'expected an object with a "coins" array');
  }

  const seen = new Set<string>();
  const assets: Asset[] = [];

  raw.coins.forEach((coin: unknown, i) => {
    if (!isRecord(coin) || typeof coin.id !== 'string' || coin.id.trim() === '') {
      throw new ConfigError('CATALOG_PATH', source, `coins[${i}] needs a non-empty string "id"`);
    }
    const id = coin.id.trim();
    if (seen.has(id)) {
      throw new ConfigError('CATALOG_PATH', source, `duplicate asset id "${id}"`);
    }
    seen.add(id);
    const name = typeof coin.name === 'string' && coin.name.trim() !== '' ? coin.name.trim() : id;
    assets.push(Object.freeze({ id, displayName: titleCase(name) }));
  });

  return Object.freeze(assets);
}

export function loadCatalog(path: string): readonly Asset[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigError('CATALOG_PATH', path, errorMessage(err));
  }
  const assets = parseCatalog(raw, path);
  log.info({ path, assetCount: assets.length }, 'Asset catalog loaded');
  return assets;
}
