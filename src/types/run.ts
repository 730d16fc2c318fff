import type { CompanyMetrics, FetchError } from './metrics';

export interface RunConfigSnapshot {
  risk_free_rate: number;
  market_return: number;
  default_tax_rate: number;
  max_tickers: number;
  chunk_size: number;
}

export interface RunSectorEntry {
  sector: string;
  rank: number;
  symbols: string[];
}

export interface RunRecord {
  schema_version: 'run.v1';
  run_id: string;
  run_date: string;
  generated_at: string;
  provider: string;
  status: 'ok' | 'no_usable_records';
  config: RunConfigSnapshot;
  tickers_requested: string[];
  sector_order: RunSectorEntry[];
  companies: CompanyMetrics[];
  errors: FetchError[];
  summary: {
    analyzed: number;
    failed: number;
    truncated: boolean;
    cancelled: boolean;
    value_creators: string[];
  };
}
