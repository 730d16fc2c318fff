import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { getConfig, loadConfig, resetConfig, toMetricsConfig } from '@/core/config';

let tempDir: string;

function writeConfig(dir: string, content: Record<string, unknown>, name = 'analysis.json') {
  const configDir = join(dir, 'config');
  mkdirSync(configDir, { recursive: true });
  writeFileSync(join(configDir, name), JSON.stringify(content));
}

describe('analysis config loader', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'config-test-'));
  });

  afterEach(() => {
    resetConfig();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('uses defaults when no config file exists', () => {
    const config = loadConfig({ projectRoot: tempDir, env: {} });

    expect(config.riskFreeRate).toBe(0.0435);
    expect(config.marketReturn).toBe(0.085);
    expect(config.defaultTaxRate).toBe(0.21);
    expect(config.maxTickers).toBe(50);
    expect(config.chunkSize).toBe(10);
    expect(config.throttleMs).toBe(0);
    expect(config.snapshotsDir).toBe(join(tempDir, 'data', 'snapshots'));
    expect(config.defaultTickers).toEqual([]);
    expect(config.projectRoot).toBe(tempDir);
  });

  it('merges config/analysis.json over the defaults', () => {
    writeConfig(tempDir, { risk_free_rate: 0.05, default_tickers: ['AAPL', 'XOM'] });
    const config = loadConfig({ projectRoot: tempDir, env: {} });

    expect(config.riskFreeRate).toBe(0.05);
    expect(config.marketReturn).toBe(0.085);
    expect(config.defaultTickers).toEqual(['AAPL', 'XOM']);
  });

  it('applies environment overrides over the file', () => {
    writeConfig(tempDir, { risk_free_rate: 0.05 });
    const snapshots = join(tempDir, 'elsewhere');
    const config = loadConfig({
      projectRoot: tempDir,
      env: { RISK_FREE_RATE: '0.03', THROTTLE_MS: '250', SNAPSHOTS_DIR: snapshots },
    });

    expect(config.riskFreeRate).toBe(0.03);
    expect(config.throttleMs).toBe(250);
    expect(config.snapshotsDir).toBe(snapshots);
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig({
      projectRoot: tempDir,
      env: { CHUNK_SIZE: '20' },
      overrides: { chunk_size: 5 },
    });
    expect(config.chunkSize).toBe(5);
  });

  it('reads the file named by ANALYSIS_CONFIG', () => {
    writeConfig(tempDir, { max_tickers: 12 }, 'custom.json');
    const config = loadConfig({
      projectRoot: tempDir,
      env: { ANALYSIS_CONFIG: join('config', 'custom.json') },
    });
    expect(config.maxTickers).toBe(12);
  });

  it('fails when ANALYSIS_CONFIG points at a missing file', () => {
    expect(() =>
      loadConfig({ projectRoot: tempDir, env: { ANALYSIS_CONFIG: 'missing.json' } })
    ).toThrow(`Analysis config not found: ${join(tempDir, 'missing.json')}`);
  });

  it('rejects values outside the documented ranges', () => {
    expect(() => loadConfig({ projectRoot: tempDir, env: { RISK_FREE_RATE: '0.5' } })).toThrow(
      'Invalid analysis config: /risk_free_rate: must be <= 0.2'
    );
    expect(() => loadConfig({ projectRoot: tempDir, env: {}, overrides: { chunk_size: 0 } })).toThrow(
      'Invalid analysis config: /chunk_size: must be >= 1'
    );
  });

  it('rejects unknown keys in the file', () => {
    writeConfig(tempDir, { risk_free: 0.05 });
    expect(() => loadConfig({ projectRoot: tempDir, env: {} })).toThrow(
      'Invalid analysis config: root: must NOT have additional properties'
    );
  });

  it('rejects non-numeric environment values', () => {
    expect(() => loadConfig({ projectRoot: tempDir, env: { MAX_TICKERS: 'many' } })).toThrow(
      'Environment variable MAX_TICKERS must be numeric, got "many"'
    );
  });

  it('extracts the metrics config', () => {
    const config = loadConfig({ projectRoot: tempDir, env: { DEFAULT_TAX_RATE: '0.25' } });
    expect(toMetricsConfig(config)).toEqual({
      riskFreeRate: 0.0435,
      marketReturn: 0.085,
      defaultTaxRate: 0.25,
    });
  });

  it('caches getConfig until reset', () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
