/**
 * Cost of capital and return ratios.
 *
 * Pure functions over already extracted scalars. A missing or undefined
 * input yields `null` instead of an exception so that one company's gaps
 * never stop a batch.
 */

import type { Metric } from '@/types/metrics';
import { isAvailable } from './statement';

export interface MetricsConfig {
  /** Annual risk-free rate as a fraction (0.0435 = 4.35%). */
  riskFreeRate: number;
  /** Expected annual market return as a fraction. */
  marketReturn: number;
  /** Tax rate used when earnings before tax are zero or missing. */
  defaultTaxRate: number;
}

export const DEFAULT_METRICS_CONFIG: MetricsConfig = {
  riskFreeRate: 0.0435,
  marketReturn: 0.085,
  defaultTaxRate: 0.21,
};

function finiteOrNull(value: number): Metric {
  return Number.isFinite(value) ? value : null;
}

/** CAPM. A missing beta is treated as market beta (1). */
export function costOfEquity(beta: Metric, riskFreeRate: number, marketReturn: number): number {
  const b = isAvailable(beta) ? beta : 1;
  return riskFreeRate + b * (marketReturn - riskFreeRate);
}

/**
 * Interest expense over total debt. Zero debt means zero cost of debt;
 * outstanding debt with unknown interest is unavailable.
 */
export function costOfDebt(interestExpense: Metric, totalDebt: Metric): Metric {
  if (!isAvailable(totalDebt) || totalDebt === 0) return 0;
  if (!isAvailable(interestExpense)) return null;
  return finiteOrNull(interestExpense / totalDebt);
}

export function effectiveTaxRate(
  incomeTaxExpense: Metric,
  earningsBeforeTax: Metric,
  defaultTaxRate: number
): number {
  if (!isAvailable(earningsBeforeTax) || earningsBeforeTax === 0) return defaultTaxRate;
  if (!isAvailable(incomeTaxExpense)) return defaultTaxRate;
  return finiteOrNull(incomeTaxExpense / earningsBeforeTax) ?? defaultTaxRate;
}

export function wacc(
  equityValue: Metric,
  totalDebt: Metric,
  costOfEquityRate: number,
  costOfDebtRate: Metric,
  taxRate: number
): Metric {
  const equity = isAvailable(equityValue) ? equityValue : 0;
  const debt = isAvailable(totalDebt) ? totalDebt : 0;
  const total = equity + debt;
  if (total === 0) return null;

  let debtCost = 0;
  if (debt !== 0) {
    if (!isAvailable(costOfDebtRate)) return null;
    debtCost = (debt / total) * costOfDebtRate * (1 - taxRate);
  }

  return finiteOrNull((equity / total) * costOfEquityRate + debtCost);
}

export function investedCapital(equity: Metric, totalDebt: Metric, cash: Metric): number {
  return (equity ?? 0) + (totalDebt ?? 0) - (cash ?? 0);
}

/** NOPAT over invested capital (equity + debt - cash). */
export function roic(
  ebit: Metric,
  taxRate: number,
  equity: Metric,
  totalDebt: Metric,
  cash: Metric
): Metric {
  if (!isAvailable(ebit)) return null;
  const capital = investedCapital(equity, totalDebt, cash);
  if (capital === 0) return null;
  const nopat = ebit * (1 - taxRate);
  return finiteOrNull(nopat / capital);
}

/** (ROIC - WACC) in percentage points; positive means value creation. */
export function valueSpread(roicRate: Metric, waccRate: Metric): Metric {
  if (!isAvailable(roicRate) || !isAvailable(waccRate)) return null;
  return (roicRate - waccRate) * 100;
}

export function priceToFreeCashFlow(
  price: Metric,
  freeCashFlow: Metric,
  sharesOutstanding: Metric
): Metric {
  if (!isAvailable(freeCashFlow) || freeCashFlow === 0) return null;
  if (!isAvailable(sharesOutstanding) || sharesOutstanding === 0) return null;
  if (!isAvailable(price)) return null;
  return finiteOrNull(price / (freeCashFlow / sharesOutstanding));
}
