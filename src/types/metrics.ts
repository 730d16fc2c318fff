/**
 * Statement inputs and derived per-company metrics.
 *
 * `null` marks a value that is unavailable. Derived metrics are always a
 * finite number or `null`.
 */

export type Metric = number | null;

export type StatementCell = number | null;
export type StatementRow = readonly StatementCell[];

export interface StatementTable {
  /** Reporting period labels, most recent first. */
  periods: string[];
  /** Line item name to values aligned with `periods`. */
  rows: Record<string, StatementCell[]>;
}

export type InfoValue = number | string | boolean | null;
export type InfoMap = Record<string, InfoValue | undefined>;

export interface RawStatements {
  symbol: string;
  balanceSheet: StatementTable;
  incomeStatement: StatementTable;
  cashFlow: StatementTable;
  info: InfoMap;
}

export interface BalanceHistoryPoint {
  period: string;
  label: string;
  totalAssets: Metric;
  totalLiabilities: Metric;
  totalEquity: Metric;
}

export interface CompanyMetrics {
  symbol: string;
  name: string;
  country: string | null;
  industry: string | null;
  sector: string;

  price: Metric;
  peRatio: Metric;
  pbRatio: Metric;
  pfcfRatio: Metric;

  roa: Metric;
  roe: Metric;
  operatingMargin: Metric;
  profitMargin: Metric;

  currentRatio: Metric;
  quickRatio: Metric;
  debtToEquity: Metric;
  ltDebtToEquity: Metric;

  costOfEquity: Metric;
  costOfDebt: Metric;
  taxRate: Metric;
  wacc: Metric;

  roic: Metric;
  /** (ROIC - WACC) x 100, in percentage points. */
  valueSpread: Metric;

  revenueGrowth: Metric;
  earningsGrowth: Metric;
  fcfGrowth: Metric;

  dividendYield: Metric;
  payoutRatio: Metric;
  marketCap: Metric;

  balanceHistory: BalanceHistoryPoint[];
}

export interface FetchError {
  symbol: string;
  error: string;
}

export type ValueCreationVerdict = 'creates' | 'destroys' | 'insufficient';
