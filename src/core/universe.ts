/**
 * Ticker working set - turns free text into the symbols to analyze
 */

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * Splits on commas, semicolons and whitespace, upper-cases, drops blanks
 * and repeats (first occurrence wins), and keeps at most `maxTickers`.
 */
export function parseTickerList(text: string, maxTickers: number = Number.POSITIVE_INFINITY): string[] {
  const symbols: string[] = [];
  const seen = new Set<string>();

  for (const part of text.split(/[,;\s]+/)) {
    const symbol = normalizeSymbol(part);
    if (!symbol || seen.has(symbol)) continue;
    seen.add(symbol);
    symbols.push(symbol);
  }

  return symbols.slice(0, Math.max(0, maxTickers));
}

/**
 * Tickers a run was asked for: the parsed text when given, else the
 * configured defaults. Not truncated; the engine applies `max_tickers`.
 */
export function requestedTickers(text: string | undefined, defaults: readonly string[]): string[] {
  return text ? parseTickerList(text) : parseTickerList(defaults.join(','));
}

export interface SymbolLimitResult {
  symbols: string[];
  truncated: boolean;
}

export function applySymbolLimit(symbols: readonly string[], maxTickers: number): SymbolLimitResult {
  if (symbols.length <= maxTickers) {
    return { symbols: symbols.slice(), truncated: false };
  }
  return { symbols: symbols.slice(0, maxTickers), truncated: true };
}
