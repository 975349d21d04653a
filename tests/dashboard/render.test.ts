import { describe, it, expect } from 'vitest';
import {
  formatChange,
  formatMessage,
  formatRisk,
  formatUsd,
  renderDashboard,
} from '../../src/dashboard/render.js';
import { createSession, MESSAGES } from '../../src/auth/session.js';
import type { RenderResult } from '../../src/dashboard/index.js';
import type { DisplayRecord } from '../../src/aggregator/index.js';

const BTC_RECORD: DisplayRecord = {
  asset: { id: 'bitcoin', displayName: 'Bitcoin' },
  quote: { assetId: 'bitcoin', priceUsd: 50000, change24hPct: 2.1 },
  matchedRisk: { price: 40000, riskPct: 10 },
  risk: {
    kind: 'matched',
    point: { price: 40000, riskPct: 10 },
    curve: [
      { price: 40000, riskPct: 10 },
      { price: 60000, riskPct: 30 },
    ],
  },
};

const ETH_RECORD: DisplayRecord = {
  asset: { id: 'ethereum', displayName: 'Ethereum' },
  quote: { assetId: 'ethereum', priceUsd: 3000, change24hPct: -1.0 },
  matchedRisk: null,
  risk: { kind: 'no-data' },
};

function result(records: DisplayRecord[], message: RenderResult['message']): RenderResult {
  return { session: createSession(), message, authenticated: false, records, timestamp: 0 };
}

describe('formatters', () => {
  it('formats USD with grouping and up to 8 decimals', () => {
    expect(formatUsd(50000)).toBe('$50,000');
    expect(formatUsd(0.12345678)).toBe('$0.12345678');
    expect(formatUsd(1234.5)).toBe('$1,234.5');
  });

  it('signs the 24h change', () => {
    expect(formatChange(2.1)).toBe('+2.10');
    expect(formatChange(0)).toBe('+0.00');
    expect(formatChange(-1)).toBe('-1.00');
  });

  it('formats risk as a percentage', () => {
    expect(formatRisk(10)).toBe('10.00%');
  });

  it('prefixes messages by level', () => {
    expect(formatMessage(MESSAGES.authenticated)).toBe('✓ Successfully Authenticated');
    expect(formatMessage(MESSAGES.invalidToken)).toBe('✗ Invalid Token');
    expect(formatMessage(MESSAGES.pleaseAuthenticate)).toBe('! Please Authenticate');
  });
});

describe('renderDashboard', () => {
  it('renders one block per record with the message last', () => {
    expect(renderDashboard(result([BTC_RECORD, ETH_RECORD], MESSAGES.authenticated))).toEqual([
      'Bitcoin',
      '  Price  $50,000          24h +2.10%',
      '  Risk   10.00%',
      '',
      'Ethereum',
      '  Price  $3,000           24h -1.00%',
      '  No Chart Data',
      '',
      '✓ Successfully Authenticated',
    ]);
  });

  it('prints the curve rows on request', () => {
    expect(renderDashboard(result([BTC_RECORD], null), { showCurves: true })).toEqual([
      'Bitcoin',
      '  Price  $50,000          24h +2.10%',
      '  Risk   10.00%',
      '             $40,000    10.00%',
      '             $60,000    30.00%',
      '',
    ]);
  });

  it('omits the risk line when risk is hidden', () => {
    const hidden: DisplayRecord = { ...ETH_RECORD, risk: { kind: 'hidden' } };
    expect(renderDashboard(result([hidden], MESSAGES.pleaseAuthenticate))).toEqual([
      'Ethereum',
      '  Price  $3,000           24h -1.00%',
      '',
      '! Please Authenticate',
    ]);
  });

  it('says so when there is no price data', () => {
    expect(renderDashboard(result([], null))).toEqual(['No price data', '']);
  });
});
