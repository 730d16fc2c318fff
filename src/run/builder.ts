/**
 * Run Record Builder
 * Constructs the run.json output structure from an analysis result
 */

import { formatDate, getRunId } from '@/core/time';
import { contentHash } from '@/core/seed';
import type { AnalysisConfig } from '@/core/config';
import type { AnalysisResult } from '@/metrics/engine';
import { valueCreationVerdict } from '@/metrics/company_metrics';
import type { RunRecord } from '@/types/run';

export function buildRunRecord(
  result: AnalysisResult,
  config: AnalysisConfig,
  tickersRequested: readonly string[],
  now: Date = new Date()
): RunRecord {
  const runDate = formatDate(now);
  const companies = [...result.portfolio.companies];
  const runConfig = {
    risk_free_rate: config.riskFreeRate,
    market_return: config.marketReturn,
    default_tax_rate: config.defaultTaxRate,
    max_tickers: config.maxTickers,
    chunk_size: config.chunkSize,
  };

  // Same inputs on the same day map to the same run id
  const inputsHash = contentHash({
    config: runConfig,
    tickers: tickersRequested,
    companies,
    errors: result.errors,
  });

  return {
    schema_version: 'run.v1',
    run_id: getRunId(now, inputsHash),
    run_date: runDate,
    generated_at: now.toISOString(),
    provider: result.metadata.provider,
    status: result.status,
    config: runConfig,
    tickers_requested: [...tickersRequested],
    sector_order: result.portfolio.groups.map((group) => ({
      sector: group.sector,
      rank: group.rank,
      symbols: group.companies.map((c) => c.symbol),
    })),
    companies,
    errors: [...result.errors],
    summary: {
      analyzed: result.metadata.analyzedCount,
      failed: result.metadata.failedCount,
      truncated: result.metadata.truncated,
      cancelled: result.metadata.cancelled,
      value_creators: companies
        .filter((c) => valueCreationVerdict(c) === 'creates')
        .map((c) => c.symbol),
    },
  };
}
