/**
 * Analysis configuration loaded from config/analysis.json
 * with environment overrides, validated against
 * schemas/analysis_config.v1.schema.json.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { validateAnalysisConfig } from '@/validation/ajv_instance';
import type { MetricsConfig } from '@/metrics/ratios';

export interface RawAnalysisConfig {
  risk_free_rate: number;
  market_return: number;
  default_tax_rate: number;
  max_tickers: number;
  chunk_size: number;
  throttle_ms: number;
  snapshots_dir: string;
  default_tickers: string[];
}

export interface AnalysisConfig extends MetricsConfig {
  maxTickers: number;
  chunkSize: number;
  throttleMs: number;
  /** Absolute directory holding per-ticker statement snapshots. */
  snapshotsDir: string;
  defaultTickers: string[];
  projectRoot: string;
}

export const DEFAULT_RAW_CONFIG: RawAnalysisConfig = {
  risk_free_rate: 0.0435,
  market_return: 0.085,
  default_tax_rate: 0.21,
  max_tickers: 50,
  chunk_size: 10,
  throttle_ms: 0,
  snapshots_dir: join('data', 'snapshots'),
  default_tickers: [],
};

const ENV_OVERRIDES: Array<{ env: string; key: keyof RawAnalysisConfig; numeric: boolean }> = [
  { env: 'RISK_FREE_RATE', key: 'risk_free_rate', numeric: true },
  { env: 'MARKET_RETURN', key: 'market_return', numeric: true },
  { env: 'DEFAULT_TAX_RATE', key: 'default_tax_rate', numeric: true },
  { env: 'MAX_TICKERS', key: 'max_tickers', numeric: true },
  { env: 'CHUNK_SIZE', key: 'chunk_size', numeric: true },
  { env: 'THROTTLE_MS', key: 'throttle_ms', numeric: true },
  { env: 'SNAPSHOTS_DIR', key: 'snapshots_dir', numeric: false },
];

export interface LoadConfigOptions {
  projectRoot?: string;
  env?: NodeJS.ProcessEnv;
  /** Values that win over file and environment, e.g. CLI flags. */
  overrides?: Partial<RawAnalysisConfig>;
}

let cachedConfig: AnalysisConfig | null = null;

function resolveFromRoot(projectRoot: string, path: string): string {
  return isAbsolute(path) ? path : join(projectRoot, path);
}

function readConfigFile(path: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Analysis config ${path} must contain a JSON object`);
  }
  return { ...parsed };
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const { env: name, key, numeric } of ENV_OVERRIDES) {
    const raw = env[name]?.trim();
    if (!raw) continue;
    if (!numeric) {
      overrides[key] = raw;
      continue;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new Error(`Environment variable ${name} must be numeric, got "${raw}"`);
    }
    overrides[key] = value;
  }
  return overrides;
}

export function loadConfig(options: LoadConfigOptions = {}): AnalysisConfig {
  const projectRoot = options.projectRoot ?? process.cwd();
  const env = options.env ?? process.env;

  const explicitPath = env.ANALYSIS_CONFIG?.trim();
  const configPath = explicitPath
    ? resolveFromRoot(projectRoot, explicitPath)
    : join(projectRoot, 'config', 'analysis.json');

  let fromFile: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    fromFile = readConfigFile(configPath);
  } else if (explicitPath) {
    throw new Error(`Analysis config not found: ${configPath}`);
  }

  const merged: Record<string, unknown> = {
    ...DEFAULT_RAW_CONFIG,
    ...fromFile,
    ...readEnvOverrides(env),
    ...options.overrides,
  };

  const result = validateAnalysisConfig(merged);
  if (!result.valid || !result.data) {
    throw new Error(`Invalid analysis config: ${result.errors?.join('; ') ?? 'Unknown error'}`);
  }
  const raw = result.data;

  return {
    riskFreeRate: raw.risk_free_rate,
    marketReturn: raw.market_return,
    defaultTaxRate: raw.default_tax_rate,
    maxTickers: raw.max_tickers,
    chunkSize: raw.chunk_size,
    throttleMs: raw.throttle_ms,
    snapshotsDir: resolveFromRoot(projectRoot, raw.snapshots_dir),
    defaultTickers: raw.default_tickers,
    projectRoot,
  };
}

export function getConfig(): AnalysisConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}

export function toMetricsConfig(config: AnalysisConfig): MetricsConfig {
  return {
    riskFreeRate: config.riskFreeRate,
    marketReturn: config.marketReturn,
    defaultTaxRate: config.defaultTaxRate,
  };
}
