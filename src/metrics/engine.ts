/**
 * Analysis Engine
 * Fetches statements per ticker, builds company metrics and aggregates the
 * portfolio view. One ticker's failure never stops the batch.
 */

import { createChildLogger } from '@/utils/logger';
import { RequestThrottler } from '@/utils/throttler';
import { applySymbolLimit, normalizeSymbol } from '@/core/universe';
import { toMetricsConfig, type AnalysisConfig } from '@/core/config';
import type { StatementProvider } from '@/providers/types';
import type { CompanyMetrics, FetchError, RawStatements } from '@/types/metrics';
import { buildCompanyMetrics } from './company_metrics';
import { aggregatePortfolio, type PortfolioView } from './portfolio';

const logger = createChildLogger('analysis_engine');

export type AnalysisStatus = 'ok' | 'no_usable_records';

export interface AnalysisProgress {
  symbol: string;
  /** 1-based position of the ticker being processed. */
  index: number;
  total: number;
}

export interface AnalysisOptions {
  provider: StatementProvider;
  config: AnalysisConfig;
  throttler?: RequestThrottler;
  onProgress?: (progress: AnalysisProgress) => void;
  signal?: AbortSignal;
}

export interface AnalysisResult {
  status: AnalysisStatus;
  portfolio: PortfolioView;
  errors: FetchError[];
  metadata: {
    analyzedAt: number;
    provider: string;
    requestedCount: number;
    analyzedCount: number;
    failedCount: number;
    truncated: boolean;
    cancelled: boolean;
    requestsMade: number;
    symbolsUsed: string[];
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function analyzeTickers(
  symbols: readonly string[],
  options: AnalysisOptions
): Promise<AnalysisResult> {
  const { provider, config, onProgress, signal } = options;
  const throttler = options.throttler ?? new RequestThrottler(config.throttleMs);
  const metricsConfig = toMetricsConfig(config);
  const analyzedAt = Date.now();

  const uniqueSymbols = Array.from(new Set(symbols.map(normalizeSymbol).filter(Boolean)));
  const { symbols: symbolsToAnalyze, truncated } = applySymbolLimit(
    uniqueSymbols,
    config.maxTickers
  );
  if (truncated) {
    logger.warn(
      { requested: uniqueSymbols.length, maxTickers: config.maxTickers },
      'Ticker list truncated to max_tickers'
    );
  }

  logger.info(
    { symbolCount: symbolsToAnalyze.length, provider: provider.name },
    'Starting analysis'
  );

  const records: CompanyMetrics[] = [];
  const errors: FetchError[] = [];
  const symbolsUsed: string[] = [];
  let cancelled = false;

  for (const [i, symbol] of symbolsToAnalyze.entries()) {
    if (signal?.aborted) {
      cancelled = true;
      logger.warn({ processed: i, total: symbolsToAnalyze.length }, 'Analysis cancelled');
      break;
    }

    onProgress?.({ symbol, index: i + 1, total: symbolsToAnalyze.length });
    symbolsUsed.push(symbol);

    let statements: RawStatements;
    try {
      statements = await throttler.schedule(() => provider.getStatements(symbol), signal);
    } catch (error) {
      if (signal?.aborted) {
        symbolsUsed.pop();
        cancelled = true;
        break;
      }
      const message = errorMessage(error);
      errors.push({ symbol, error: message });
      logger.error({ symbol, error: message }, 'Failed to fetch statements');
      continue;
    }

    const result = buildCompanyMetrics(symbol, statements, metricsConfig);
    if (result.ok) {
      records.push(result.metrics);
      logger.debug({ symbol, sector: result.metrics.sector }, 'Symbol analyzed');
    } else {
      errors.push(result.error);
    }
  }

  const portfolio = aggregatePortfolio(records);
  const status: AnalysisStatus = records.length > 0 ? 'ok' : 'no_usable_records';

  logger.info(
    {
      analyzed: records.length,
      failed: errors.length,
      sectors: portfolio.groups.length,
      status,
    },
    'Analysis complete'
  );

  return {
    status,
    portfolio,
    errors,
    metadata: {
      analyzedAt,
      provider: provider.name,
      requestedCount: symbols.length,
      analyzedCount: records.length,
      failedCount: errors.length,
      truncated,
      cancelled,
      requestsMade: provider.getRequestCount(),
      symbolsUsed,
    },
  };
}
