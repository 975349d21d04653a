import type { DisplayRecord } from '../aggregator/index.js';
import type { StatusMessage } from '../auth/session.js';
import type { RenderResult } from './index.js';

export function formatUsd(value: number): string {
  return `$${value.toLocaleString('en-US', { maximumFractionDigits: 8 })}`;
}

export function formatChange(pct: number): string {
  const fixed = pct.toFixed(2);
  return pct >= 0 ? `+${fixed}` : fixed;
}

export function formatRisk(pct: number): string {
  return `${pct.toFixed(2)}%`;
}

export function formatMessage(message: StatusMessage): string {
  switch (message.level) {
    case 'success': return `✓ ${message.text}`;
    case 'error': return `✗ ${message.text}`;
    case 'warning': return `! ${message.text}`;
  }
}

export interface RenderOptions {
  /** Print the full risk curve under each matched asset. */
  showCurves?: boolean;
}

function renderRecord(record: DisplayRecord, options: RenderOptions): string[] {
  const { asset, quote, risk } = record;
  const lines = [
    asset.displayName,
    `  Price  ${formatUsd(quote.priceUsd).padEnd(16)} 24h ${formatChange(quote.change24hPct)}%`,
  ];

  if (risk.kind === 'no-data') {
    lines.push('  No Chart Data');
  } else if (risk.kind === 'matched') {
    lines.push(`  Risk   ${formatRisk(risk.point.riskPct)}`);
    if (options.showCurves) {
      for (const point of risk.curve) {
        lines.push(`    ${formatUsd(point.price).padStart(16)}  ${formatRisk(point.riskPct).padStart(8)}`);
      }
    }
  }

  return lines;
}

/** Terminal rendering of one cycle: one block per record, status message last. */
export function renderDashboard(result: RenderResult, options: RenderOptions = {}): string[] {
  const lines: string[] = [];
  for (const record of result.records) {
    lines.push(...renderRecord(record, options), '');
  }
  if (result.records.length === 0) {
    lines.push('No price data', '');
  }
  if (result.message) {
    lines.push(formatMessage(result.message));
  }
  return lines;
}
