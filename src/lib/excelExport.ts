import ExcelJS from 'exceljs';
import type { AnalysisResult } from '@/metrics/engine';
import { sectorRank } from '@/metrics/portfolio';
import { valueCreationVerdict } from '@/metrics/company_metrics';
import type { CompanyMetrics, Metric } from '@/types/metrics';
import { NOT_AVAILABLE } from './format';

const HEADER_BG = '1A1F36';
const HEADER_FONT = 'FFFFFF';
const GREEN_BG = 'C6EFCE';
const GREEN_FONT = '006100';
const RED_BG = 'FFC7CE';
const RED_FONT = '9C0006';

const PERCENT_FMT = '0.00%';
const RATIO_FMT = '0.00';
const MONEY_FMT = '#,##0.00';

type ColumnFormat = 'text' | 'ratio' | 'percent' | 'money' | 'spread';

interface ColumnDef {
  header: string;
  width: number;
  format: ColumnFormat;
  value: (c: CompanyMetrics) => Metric | string;
}

const SUMMARY_COLUMNS: ColumnDef[] = [
  { header: 'Sector', width: 22, format: 'text', value: (c) => c.sector },
  { header: 'Ticker', width: 10, format: 'text', value: (c) => c.symbol },
  { header: 'Name', width: 28, format: 'text', value: (c) => c.name },
  { header: 'Country', width: 14, format: 'text', value: (c) => c.country ?? NOT_AVAILABLE },
  { header: 'Industry', width: 24, format: 'text', value: (c) => c.industry ?? NOT_AVAILABLE },
  { header: 'Price', width: 12, format: 'money', value: (c) => c.price },
  { header: 'P/E', width: 9, format: 'ratio', value: (c) => c.peRatio },
  { header: 'P/B', width: 9, format: 'ratio', value: (c) => c.pbRatio },
  { header: 'P/FCF', width: 9, format: 'ratio', value: (c) => c.pfcfRatio },
  { header: 'Dividend Yield', width: 14, format: 'percent', value: (c) => c.dividendYield },
  { header: 'Payout Ratio', width: 13, format: 'percent', value: (c) => c.payoutRatio },
  { header: 'ROA', width: 9, format: 'percent', value: (c) => c.roa },
  { header: 'ROE', width: 9, format: 'percent', value: (c) => c.roe },
  { header: 'Current Ratio', width: 13, format: 'ratio', value: (c) => c.currentRatio },
  { header: 'Quick Ratio', width: 12, format: 'ratio', value: (c) => c.quickRatio },
  { header: 'Debt/Eq', width: 10, format: 'ratio', value: (c) => c.debtToEquity },
  { header: 'LT Debt/Eq', width: 11, format: 'ratio', value: (c) => c.ltDebtToEquity },
  { header: 'Oper Margin', width: 12, format: 'percent', value: (c) => c.operatingMargin },
  { header: 'Profit Margin', width: 13, format: 'percent', value: (c) => c.profitMargin },
  { header: 'WACC', width: 9, format: 'percent', value: (c) => c.wacc },
  { header: 'ROIC', width: 9, format: 'percent', value: (c) => c.roic },
  { header: 'Spread (ROIC - WACC)', width: 20, format: 'spread', value: (c) => c.valueSpread },
  { header: 'Revenue Growth', width: 15, format: 'percent', value: (c) => c.revenueGrowth },
  { header: 'EPS Growth', width: 12, format: 'percent', value: (c) => c.earningsGrowth },
  { header: 'FCF Growth', width: 12, format: 'percent', value: (c) => c.fcfGrowth },
  { header: 'Market Cap', width: 18, format: 'money', value: (c) => c.marketCap },
];

function styleHeaderRow(row: ExcelJS.Row) {
  row.height = 20;
  row.eachCell((cell) => {
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_BG } };
    cell.font = { bold: true, color: { argb: HEADER_FONT }, size: 11 };
    cell.alignment = { horizontal: 'center', vertical: 'middle' };
  });
}

function freezeHeader(sheet: ExcelJS.Worksheet) {
  sheet.views = [{ state: 'frozen', ySplit: 1 }];
}

function applyFormat(cell: ExcelJS.Cell, format: ColumnFormat) {
  const value = cell.value;
  if (typeof value !== 'number') {
    cell.alignment = { horizontal: format === 'text' ? 'left' : 'center' };
    return;
  }
  cell.alignment = { horizontal: 'right' };
  if (format === 'percent') cell.numFmt = PERCENT_FMT;
  if (format === 'ratio') cell.numFmt = RATIO_FMT;
  if (format === 'money') cell.numFmt = MONEY_FMT;
  if (format === 'spread') {
    cell.numFmt = '0.00"%"';
    const positive = value > 0;
    cell.fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: positive ? GREEN_BG : RED_BG },
    };
    cell.font = { color: { argb: positive ? GREEN_FONT : RED_FONT } };
  }
}

function addSummarySheet(workbook: ExcelJS.Workbook, companies: readonly CompanyMetrics[]) {
  const sheet = workbook.addWorksheet('Summary');
  sheet.columns = SUMMARY_COLUMNS.map((col) => ({ header: col.header, width: col.width }));
  styleHeaderRow(sheet.getRow(1));
  freezeHeader(sheet);

  for (const company of companies) {
    const row = sheet.addRow(
      SUMMARY_COLUMNS.map((col) => col.value(company) ?? NOT_AVAILABLE)
    );
    SUMMARY_COLUMNS.forEach((col, index) => applyFormat(row.getCell(index + 1), col.format));
  }
}

function addSectorSheet(workbook: ExcelJS.Workbook, result: AnalysisResult) {
  const sheet = workbook.addWorksheet('Sectors');
  sheet.columns = [
    { header: 'Rank', width: 8 },
    { header: 'Sector', width: 24 },
    { header: 'Companies', width: 11 },
    { header: 'Creating Value', width: 15 },
    { header: 'Tickers', width: 60 },
  ];
  styleHeaderRow(sheet.getRow(1));

  for (const group of result.portfolio.groups) {
    const creating = group.companies.filter((c) => valueCreationVerdict(c) === 'creates');
    sheet.addRow([
      sectorRank(group.sector),
      group.sector,
      group.companies.length,
      creating.length,
      group.companies.map((c) => c.symbol).join(', '),
    ]);
  }
}

function addBalanceHistorySheet(workbook: ExcelJS.Workbook, companies: readonly CompanyMetrics[]) {
  const sheet = workbook.addWorksheet('Balance History');
  sheet.columns = [
    { header: 'Ticker', width: 10 },
    { header: 'Period', width: 10 },
    { header: 'Total Assets', width: 18 },
    { header: 'Total Liabilities', width: 18 },
    { header: 'Total Equity', width: 18 },
  ];
  styleHeaderRow(sheet.getRow(1));

  for (const company of companies) {
    for (const point of company.balanceHistory) {
      const row = sheet.addRow([
        company.symbol,
        point.label,
        point.totalAssets ?? NOT_AVAILABLE,
        point.totalLiabilities ?? NOT_AVAILABLE,
        point.totalEquity ?? NOT_AVAILABLE,
      ]);
      [3, 4, 5].forEach((index) => applyFormat(row.getCell(index), 'money'));
    }
  }
}

function addErrorSheet(workbook: ExcelJS.Workbook, result: AnalysisResult) {
  const sheet = workbook.addWorksheet('Errors');
  sheet.columns = [
    { header: 'Ticker', width: 10 },
    { header: 'Error', width: 80 },
  ];
  styleHeaderRow(sheet.getRow(1));
  for (const error of result.errors) {
    sheet.addRow([error.symbol, error.error]);
  }
}

export function buildAnalysisWorkbook(result: AnalysisResult, createdAt: Date = new Date()): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'spread-analyzer';
  workbook.created = createdAt;

  const companies = result.portfolio.companies;
  addSummarySheet(workbook, companies);
  addSectorSheet(workbook, result);
  addBalanceHistorySheet(workbook, companies);
  addErrorSheet(workbook, result);

  return workbook;
}

export async function writeAnalysisWorkbook(result: AnalysisResult, filePath: string): Promise<void> {
  await buildAnalysisWorkbook(result).xlsx.writeFile(filePath);
}
