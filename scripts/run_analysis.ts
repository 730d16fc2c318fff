/**
 * Analysis Run Script
 * Derives company metrics for a ticker list, prints the sector report
 * and writes the run record.
 *
 * Usage: npx tsx scripts/run_analysis.ts --tickers=AAPL,MSFT,XOM [--excel=out.xlsx]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { loadConfig, type RawAnalysisConfig } from '../src/core/config';
import { requestedTickers } from '../src/core/universe';
import { SnapshotProvider } from '../src/providers/snapshot_provider';
import { analyzeTickers } from '../src/metrics/engine';
import { renderReport } from '../src/lib/report';
import { writeAnalysisWorkbook } from '../src/lib/excelExport';
import { buildRunRecord } from '../src/run/builder';
import { writeRunRecord } from '../src/run/writer';
import { validateAndThrow, checkRunConsistency } from '../src/run/validator';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_analysis');

interface AnalysisCliArgs {
  tickers?: string;
  excelPath?: string;
  writeRun: boolean;
  overrides: Partial<RawAnalysisConfig>;
}

function readFlag(name: string): string | undefined {
  const equalsArg = process.argv.find((arg) => arg.startsWith(`${name}=`));
  if (equalsArg) return equalsArg.slice(name.length + 1);
  const index = process.argv.indexOf(name);
  return index >= 0 ? process.argv[index + 1] : undefined;
}

function readNumberFlag(name: string): number | undefined {
  const raw = readFlag(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be numeric, got "${raw}"`);
  }
  return value;
}

function parseCliArgs(): AnalysisCliArgs {
  const overrides: Partial<RawAnalysisConfig> = {};

  const numericFlags: Array<[string, 'max_tickers' | 'risk_free_rate' | 'market_return' | 'default_tax_rate' | 'chunk_size']> = [
    ['--max', 'max_tickers'],
    ['--risk-free', 'risk_free_rate'],
    ['--market-return', 'market_return'],
    ['--tax-rate', 'default_tax_rate'],
    ['--chunk-size', 'chunk_size'],
  ];
  for (const [flag, key] of numericFlags) {
    const value = readNumberFlag(flag);
    if (value !== undefined) overrides[key] = value;
  }

  const snapshots = readFlag('--snapshots');
  if (snapshots) overrides.snapshots_dir = snapshots;

  return {
    tickers: readFlag('--tickers'),
    excelPath: readFlag('--excel'),
    writeRun: !process.argv.includes('--no-write'),
    overrides,
  };
}

async function main() {
  const startTime = Date.now();
  const cliArgs = parseCliArgs();
  const config = loadConfig({ overrides: cliArgs.overrides });

  const requested = requestedTickers(cliArgs.tickers, config.defaultTickers);

  if (requested.length === 0) {
    console.error('No tickers given. Pass --tickers=AAPL,MSFT or set default_tickers in config/analysis.json.');
    process.exitCode = 1;
    return;
  }

  const provider = new SnapshotProvider(config.snapshotsDir);
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, finishing current ticker');
    controller.abort();
  });

  try {
    const result = await analyzeTickers(requested, {
      provider,
      config,
      signal: controller.signal,
      onProgress: ({ symbol, index, total }) =>
        logger.info({ symbol, progress: `${index}/${total}` }, 'Analyzing'),
    });

    console.log(renderReport(result, { chunkSize: config.chunkSize }));

    if (cliArgs.writeRun) {
      const runRecord = validateAndThrow(buildRunRecord(result, config, requested));
      const consistency = checkRunConsistency(runRecord);
      if (!consistency.passed) {
        logger.warn({ issues: consistency.issues }, 'Run consistency issues detected');
      }
      const writeResult = writeRunRecord(runRecord);
      console.log(`\nRun record: ${writeResult.filePath}`);
    }

    if (cliArgs.excelPath && result.status === 'ok') {
      const excelPath = resolve(process.cwd(), cliArgs.excelPath);
      await writeAnalysisWorkbook(result, excelPath);
      console.log(`Workbook:   ${excelPath}`);
    }

    const duration = (Date.now() - startTime) / 1000;
    logger.info(
      {
        analyzed: result.metadata.analyzedCount,
        failed: result.metadata.failedCount,
        duration: `${duration.toFixed(1)}s`,
      },
      'Analysis run finished'
    );

    if (result.status === 'no_usable_records') {
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error({ error }, 'Analysis run failed');
    console.error('Analysis run failed:', error);
    process.exitCode = 1;
  } finally {
    provider.close();
  }
}

main().catch(console.error);
