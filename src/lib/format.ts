/**
 * Display formatting for metric values. Unavailable values print as N/D.
 */

import type { Metric } from '@/types/metrics';

export const NOT_AVAILABLE = 'N/D';

const currencyFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

function present(value: Metric | undefined): value is number {
  return value !== null && value !== undefined && Number.isFinite(value);
}

export function formatNumber(value: Metric | undefined, decimals: number = 2): string {
  return present(value) ? value.toFixed(decimals) : NOT_AVAILABLE;
}

/** Fraction to percent: 0.1234 -> "12.34%". */
export function formatPercent(value: Metric | undefined, decimals: number = 2): string {
  return present(value) ? `${(value * 100).toFixed(decimals)}%` : NOT_AVAILABLE;
}

/** Value-creation spread is already in percentage points. */
export function formatSpread(value: Metric | undefined, decimals: number = 2): string {
  return present(value) ? `${value.toFixed(decimals)}%` : NOT_AVAILABLE;
}

export function formatPrice(value: Metric | undefined): string {
  if (!present(value)) return NOT_AVAILABLE;
  const sign = value < 0 ? '-' : '';
  return `${sign}$${currencyFormat.format(Math.abs(value))}`;
}

/** Market cap in billions: 2_500_000_000 -> "$2.50B". */
export function formatMarketCap(value: Metric | undefined): string {
  if (!present(value)) return NOT_AVAILABLE;
  return `$${currencyFormat.format(value / 1e9)}B`;
}

export function formatText(value: string | null | undefined): string {
  return value && value.trim() ? value : NOT_AVAILABLE;
}
