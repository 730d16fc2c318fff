/**
 * Plain-text analysis report: sector-grouped summary, fetch errors,
 * chunked per-sector metric blocks, and value-creation verdicts.
 */

import type { AnalysisResult } from '@/metrics/engine';
import { chunk, DEFAULT_CHUNK_SIZE, type SectorGroup } from '@/metrics/portfolio';
import { valueCreationVerdict } from '@/metrics/company_metrics';
import type { CompanyMetrics, FetchError, ValueCreationVerdict } from '@/types/metrics';
import {
  formatMarketCap,
  formatNumber,
  formatPercent,
  formatPrice,
  formatSpread,
  formatText,
} from './format';

export interface ReportOptions {
  chunkSize?: number;
}

const VERDICT_TEXT: Record<ValueCreationVerdict, string> = {
  creates: 'creates value (ROIC > WACC)',
  destroys: 'destroys value (ROIC <= WACC)',
  insufficient: 'insufficient data to compare ROIC and WACC',
};

export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, col) =>
    Math.max(header.length, ...rows.map((row) => (row[col] ?? '').length))
  );
  const line = (cells: string[]) =>
    cells
      .map((cell, col) => cell.padEnd(widths[col]))
      .join('  ')
      .trimEnd();

  return [line(headers), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(line)];
}

function summaryRow(c: CompanyMetrics): string[] {
  return [
    c.symbol,
    c.name,
    formatText(c.country),
    formatText(c.industry),
    formatPrice(c.price),
    formatNumber(c.peRatio),
    formatNumber(c.pbRatio),
    formatNumber(c.pfcfRatio),
    formatPercent(c.dividendYield),
    formatPercent(c.roe),
    formatNumber(c.currentRatio),
    formatNumber(c.debtToEquity),
    formatPercent(c.wacc),
    formatPercent(c.roic),
    formatSpread(c.valueSpread),
    formatMarketCap(c.marketCap),
  ];
}

const SUMMARY_HEADERS = [
  'Ticker',
  'Name',
  'Country',
  'Industry',
  'Price',
  'P/E',
  'P/B',
  'P/FCF',
  'Div Yield',
  'ROE',
  'Current',
  'Debt/Eq',
  'WACC',
  'ROIC',
  'Spread',
  'Market Cap',
];

export function renderErrors(errors: readonly FetchError[]): string[] {
  if (errors.length === 0) return [];
  return [
    'Tickers with errors',
    ...renderTable(
      ['Ticker', 'Error'],
      errors.map((e) => [e.symbol, e.error])
    ),
  ];
}

function renderChunked(
  title: string,
  groups: readonly SectorGroup[],
  chunkSize: number,
  headers: string[],
  toRow: (c: CompanyMetrics) => string[]
): string[] {
  const lines = [title];
  for (const group of groups) {
    lines.push('', `Sector: ${group.sector} (${group.companies.length} companies)`);
    chunk(group.companies, chunkSize).forEach((block, i) => {
      lines.push(`Block ${i + 1}`, ...renderTable(headers, block.map(toRow)));
    });
  }
  return lines;
}

export function renderReport(result: AnalysisResult, options: ReportOptions = {}): string {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const { portfolio, errors } = result;

  if (result.status === 'no_usable_records') {
    return ['No usable records for the requested tickers.', ...renderErrors(errors)].join('\n');
  }

  const lines: string[] = ['Summary (grouped by sector)'];
  for (const group of portfolio.groups) {
    lines.push('', `Sector: ${group.sector} (${group.companies.length} companies)`);
    lines.push(...renderTable(SUMMARY_HEADERS, group.companies.map(summaryRow)));
  }

  const errorLines = renderErrors(errors);
  if (errorLines.length > 0) {
    lines.push('', ...errorLines);
  }

  lines.push(
    '',
    ...renderChunked(
      'Growth (CAGR, up to 4 periods)',
      portfolio.groups,
      chunkSize,
      ['Ticker', 'Revenue', 'Earnings', 'FCF'],
      (c) => [
        c.symbol,
        formatPercent(c.revenueGrowth),
        formatPercent(c.earningsGrowth),
        formatPercent(c.fcfGrowth),
      ]
    )
  );

  lines.push(
    '',
    ...renderChunked(
      'Valuation',
      portfolio.groups,
      chunkSize,
      ['Ticker', 'P/E', 'P/B', 'P/FCF', 'Div Yield', 'Payout'],
      (c) => [
        c.symbol,
        formatNumber(c.peRatio),
        formatNumber(c.pbRatio),
        formatNumber(c.pfcfRatio),
        formatPercent(c.dividendYield),
        formatPercent(c.payoutRatio),
      ]
    )
  );

  lines.push(
    '',
    ...renderChunked(
      'Profitability',
      portfolio.groups,
      chunkSize,
      ['Ticker', 'ROE', 'ROA', 'Oper Margin', 'Profit Margin'],
      (c) => [
        c.symbol,
        formatPercent(c.roe),
        formatPercent(c.roa),
        formatPercent(c.operatingMargin),
        formatPercent(c.profitMargin),
      ]
    )
  );

  lines.push(
    '',
    ...renderChunked(
      'Capital structure and liquidity',
      portfolio.groups,
      chunkSize,
      ['Ticker', 'Current', 'Quick', 'Debt/Eq', 'LT Debt/Eq', 'Ke', 'Kd', 'Tax'],
      (c) => [
        c.symbol,
        formatNumber(c.currentRatio),
        formatNumber(c.quickRatio),
        formatNumber(c.debtToEquity),
        formatNumber(c.ltDebtToEquity),
        formatPercent(c.costOfEquity),
        formatPercent(c.costOfDebt),
        formatPercent(c.taxRate),
      ]
    )
  );

  lines.push('', 'Value creation');
  for (const company of portfolio.companies) {
    lines.push(`${company.symbol}: ${VERDICT_TEXT[valueCreationVerdict(company)]}`);
  }

  return lines.join('\n');
}
