/**
 * Vendor naming variants per accounting concept, in priority order.
 */

export const STATEMENT_ALIASES = {
  totalDebt: ['Total Debt', 'Long Term Debt'],
  cash: [
    'Cash And Cash Equivalents',
    'Cash And Cash Equivalents At Carrying Value',
    'Cash Cash Equivalents And Short Term Investments',
  ],
  equity: ['Common Stock Equity', 'Total Stockholder Equity', 'Stockholders Equity'],
  totalAssets: ['Total Assets', 'TotalAssets'],
  totalLiabilities: [
    'Total Liabilities',
    'TotalLiab',
    'Total Liabilities Net Minority Interest',
  ],
  historyEquity: ['Total Stockholder Equity', 'Stockholders Equity', 'Common Stock Equity'],

  interestExpense: ['Interest Expense'],
  earningsBeforeTax: ['Ebt', 'EBT', 'Pretax Income'],
  incomeTaxExpense: ['Income Tax Expense', 'Tax Provision'],
  ebit: ['EBIT', 'Operating Income', 'Earnings Before Interest and Taxes'],
  totalRevenue: ['Total Revenue'],
  netIncome: ['Net Income'],

  freeCashFlow: ['Free Cash Flow'],
  operatingCashFlow: ['Operating Cash Flow'],
} as const satisfies Record<string, readonly string[]>;

export const INFO_KEYS = {
  name: ['longName', 'shortName', 'displayName'],
  country: ['country', 'countryCode'],
  industry: ['industry', 'industryKey', 'industryDisp'],
  sector: ['sector'],

  beta: ['beta'],
  totalDebt: ['totalDebt'],
  marketCap: ['marketCap'],
  price: ['currentPrice', 'regularMarketPrice'],
  sharesOutstanding: ['sharesOutstanding'],

  peRatio: ['trailingPE'],
  pbRatio: ['priceToBook'],
  currentRatio: ['currentRatio'],
  quickRatio: ['quickRatio'],
  debtToEquity: ['debtToEquity'],
  ltDebtToEquity: ['longTermDebtToEquity'],
  operatingMargin: ['operatingMargins'],
  profitMargin: ['profitMargins'],
  roa: ['returnOnAssets'],
  roe: ['returnOnEquity'],
  dividendYield: ['dividendYield'],
  payoutRatio: ['payoutRatio'],
} as const satisfies Record<string, readonly string[]>;
