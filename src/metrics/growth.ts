import type { Metric, StatementRow } from '@/types/metrics';
import { isAvailable } from './statement';

export const CAGR_MAX_PERIODS = 4;

/**
 * Compound growth over the most recent usable periods of a row
 * (most recent first): (newest / oldest)^(1 / (n - 1)) - 1.
 *
 * Missing cells are dropped before the window is taken. Fewer than two
 * values or a zero oldest value give null, as does a sign change that has
 * no real root.
 */
export function cagr(row: StatementRow, maxPeriods: number = CAGR_MAX_PERIODS): Metric {
  const values = row.filter(isAvailable).slice(0, maxPeriods);
  if (values.length < 2) return null;

  const newest = values[0];
  const oldest = values[values.length - 1];
  if (oldest === 0) return null;

  const growth = Math.pow(newest / oldest, 1 / (values.length - 1)) - 1;
  return Number.isFinite(growth) ? growth : null;
}
