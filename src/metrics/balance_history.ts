import { format, isValid, parseISO } from 'date-fns';
import type { BalanceHistoryPoint, Metric, StatementTable } from '@/types/metrics';
import { STATEMENT_ALIASES } from './aliases';
import { isAvailable, resolveRow, type ResolvedRow } from './statement';

export const BALANCE_HISTORY_PERIODS = 4;

export function periodLabel(period: string): string {
  const parsed = parseISO(period);
  return isValid(parsed) ? format(parsed, 'yyyy') : period;
}

function cellAt(row: ResolvedRow, index: number): Metric {
  // The zero row stands in for a missing line item; history shows it as a gap.
  if (row.key === null) return null;
  const value = row.values[index];
  return isAvailable(value) ? value : null;
}

/**
 * Assets, liabilities and equity for the most recent balance sheet periods.
 */
export function buildBalanceHistory(
  balanceSheet: StatementTable,
  maxPeriods: number = BALANCE_HISTORY_PERIODS
): BalanceHistoryPoint[] {
  const periods = balanceSheet.periods.slice(0, maxPeriods);
  if (periods.length === 0) return [];

  const assets = resolveRow(balanceSheet, STATEMENT_ALIASES.totalAssets);
  const liabilities = resolveRow(balanceSheet, STATEMENT_ALIASES.totalLiabilities);
  const equity = resolveRow(balanceSheet, STATEMENT_ALIASES.historyEquity);

  return periods.map((period, index) => ({
    period,
    label: periodLabel(period),
    totalAssets: cellAt(assets, index),
    totalLiabilities: cellAt(liabilities, index),
    totalEquity: cellAt(equity, index),
  }));
}
