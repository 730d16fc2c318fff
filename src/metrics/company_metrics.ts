/**
 * Company Metrics Builder
 * Turns one ticker's raw statements into a normalized CompanyMetrics record.
 */

import type {
  CompanyMetrics,
  FetchError,
  RawStatements,
  ValueCreationVerdict,
} from '@/types/metrics';
import { createChildLogger } from '@/utils/logger';
import { INFO_KEYS, STATEMENT_ALIASES } from './aliases';
import { buildBalanceHistory } from './balance_history';
import { cagr } from './growth';
import {
  costOfDebt,
  costOfEquity,
  effectiveTaxRate,
  priceToFreeCashFlow,
  roic,
  valueSpread,
  wacc,
  type MetricsConfig,
} from './ratios';
import { infoNumber, infoText, isEmptyTable, latestOf, resolveRow } from './statement';

const logger = createChildLogger('company_metrics');

export const UNKNOWN_SECTOR = 'Unknown';

export type BuildResult =
  | { ok: true; metrics: CompanyMetrics }
  | { ok: false; error: FetchError };

function computeMetrics(
  symbol: string,
  statements: RawStatements,
  config: MetricsConfig
): CompanyMetrics {
  const { balanceSheet: bs, incomeStatement: fin, cashFlow: cf, info } = statements;

  const beta = infoNumber(info, INFO_KEYS.beta);
  const ke = costOfEquity(beta, config.riskFreeRate, config.marketReturn);

  // A zero statement debt usually means the vendor omitted it.
  const statementDebt = latestOf(bs, STATEMENT_ALIASES.totalDebt);
  const debt = statementDebt || infoNumber(info, INFO_KEYS.totalDebt) || 0;
  const cash = latestOf(bs, STATEMENT_ALIASES.cash);
  const equity = latestOf(bs, STATEMENT_ALIASES.equity);

  const interest = latestOf(fin, STATEMENT_ALIASES.interestExpense);
  const ebt = latestOf(fin, STATEMENT_ALIASES.earningsBeforeTax);
  const taxExpense = latestOf(fin, STATEMENT_ALIASES.incomeTaxExpense);
  const ebit = latestOf(fin, STATEMENT_ALIASES.ebit);

  const kd = costOfDebt(interest, debt);
  const tax = effectiveTaxRate(taxExpense, ebt, config.defaultTaxRate);
  const marketCap = infoNumber(info, INFO_KEYS.marketCap);
  const waccRate = wacc(marketCap, debt, ke, kd, tax);
  const roicRate = roic(ebit, tax, equity, debt, cash);

  const price = infoNumber(info, INFO_KEYS.price);
  const fcf = latestOf(cf, STATEMENT_ALIASES.freeCashFlow);
  const shares = infoNumber(info, INFO_KEYS.sharesOutstanding);

  const fcfGrowth =
    cagr(resolveRow(cf, STATEMENT_ALIASES.freeCashFlow).values) ??
    cagr(resolveRow(cf, STATEMENT_ALIASES.operatingCashFlow).values);

  return {
    symbol,
    name: infoText(info, INFO_KEYS.name) ?? symbol,
    country: infoText(info, INFO_KEYS.country),
    industry: infoText(info, INFO_KEYS.industry),
    sector: infoText(info, INFO_KEYS.sector) ?? UNKNOWN_SECTOR,

    price,
    peRatio: infoNumber(info, INFO_KEYS.peRatio),
    pbRatio: infoNumber(info, INFO_KEYS.pbRatio),
    pfcfRatio: priceToFreeCashFlow(price, fcf, shares),

    roa: infoNumber(info, INFO_KEYS.roa),
    roe: infoNumber(info, INFO_KEYS.roe),
    operatingMargin: infoNumber(info, INFO_KEYS.operatingMargin),
    profitMargin: infoNumber(info, INFO_KEYS.profitMargin),

    currentRatio: infoNumber(info, INFO_KEYS.currentRatio),
    quickRatio: infoNumber(info, INFO_KEYS.quickRatio),
    debtToEquity: infoNumber(info, INFO_KEYS.debtToEquity),
    ltDebtToEquity: infoNumber(info, INFO_KEYS.ltDebtToEquity),

    costOfEquity: ke,
    costOfDebt: kd,
    taxRate: tax,
    wacc: waccRate,

    roic: roicRate,
    valueSpread: valueSpread(roicRate, waccRate),

    revenueGrowth: cagr(resolveRow(fin, STATEMENT_ALIASES.totalRevenue).values),
    earningsGrowth: cagr(resolveRow(fin, STATEMENT_ALIASES.netIncome).values),
    fcfGrowth,

    dividendYield: infoNumber(info, INFO_KEYS.dividendYield),
    payoutRatio: infoNumber(info, INFO_KEYS.payoutRatio),
    marketCap,

    balanceHistory: buildBalanceHistory(bs),
  };
}

/**
 * Builds the metrics record for one ticker. Never throws: malformed input
 * is reported as a fetch error for this ticker alone.
 */
export function buildCompanyMetrics(
  symbol: string,
  statements: RawStatements,
  config: MetricsConfig
): BuildResult {
  try {
    const { balanceSheet, incomeStatement, cashFlow } = statements;
    if ([balanceSheet, incomeStatement, cashFlow].every(isEmptyTable)) {
      logger.debug({ symbol }, 'All statements empty, metrics come from info only');
    }
    const metrics = computeMetrics(symbol, statements, config);
    logger.debug(
      { symbol, wacc: metrics.wacc, roic: metrics.roic, spread: metrics.valueSpread },
      'Company metrics built'
    );
    return { ok: true, metrics };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn({ symbol, error: message }, 'Failed to build company metrics');
    return { ok: false, error: { symbol, error: message } };
  }
}

export function valueCreationVerdict(
  metrics: Pick<CompanyMetrics, 'roic' | 'wacc'>
): ValueCreationVerdict {
  if (metrics.roic === null || metrics.wacc === null) return 'insufficient';
  return metrics.roic > metrics.wacc ? 'creates' : 'destroys';
}
