import { describe, it, expect } from 'vitest';
import { loadCatalog, parseCatalog, titleCase } from '../../src/catalog/index.js';
import { DEFAULT_CATALOG_PATH } from '../../src/config/index.js';
import { ConfigError } from '../../src/lib/errors.js';

describe('titleCase', () => {
  it('capitalizes each word', () => {
    expect(titleCase('bitcoin')).toBe('Bitcoin');
    expect(titleCase('binance coin')).toBe('Binance Coin');
    expect(titleCase('SHIBA-inu')).toBe('Shiba-Inu');
  });
});

describe('parseCatalog', () => {
  it('keeps file order and title-cases names', () => {
    const assets = parseCatalog({
      coins: [
        { id: 'bitcoin', name: 'bitcoin' },
        { id: 'ethereum', name: 'ethereum' },
      ],
    });
    expect(assets).toEqual([
      { id: 'bitcoin', displayName: 'Bitcoin' },
      { id: 'ethereum', displayName: 'Ethereum' },
    ]);
    expect(Object.isFrozen(assets)).toBe(true);
  });

  it('falls back to the id when the name is missing', () => {
    expect(parseCatalog({ coins: [{ id: 'dogecoin' }] })).toEqual([{ id: 'dogecoin', displayName: 'Dogecoin' }]);
  });

  it('rejects a bad shape, a missing id and duplicates', () => {
    expect(() => parseCatalog([])).toThrow(ConfigError);
    expect(() => parseCatalog({ coins: [{ name: 'bitcoin' }] })).toThrow(
      'Invalid CATALOG_PATH="catalog": coins[0] needs a non-empty string "id"',
    );
    expect(() => parseCatalog({ coins: [{ id: 'bitcoin' }, { id: 'bitcoin' }] }, 'coins.json')).toThrow(
      'Invalid CATALOG_PATH="coins.json": duplicate asset id "bitcoin"',
    );
  });
});

describe('loadCatalog', () => {
  it('loads the bundled catalog', () => {
    const assets = loadCatalog(DEFAULT_CATALOG_PATH);
    expect(assets).toHaveLength(12);
    expect(assets[0]).toEqual({ id: 'bitcoin', displayName: 'Bitcoin' });
    expect(assets.find((a) => a.id === 'binancecoin')?.displayName).toBe('Binance Coin');
  });

  it('wraps a missing file in ConfigError', () => {
    expect(() => loadCatalog('/nonexistent/coins.json')).toThrow(ConfigError);
  });
});
