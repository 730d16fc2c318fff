import { readFile } from 'fs/promises';
import { join } from 'path';
import type { RawStatements } from '@/types/metrics';
import { validateStatementSnapshot } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import { ProviderError, type StatementProvider } from './types';

const logger = createChildLogger('snapshot_provider');

/**
 * Reads per-ticker statement snapshots (`<SYMBOL>.json`) written by an
 * external fetch job.
 */
export class SnapshotProvider implements StatementProvider {
  readonly name = 'snapshot';
  private requestCount = 0;
  private statementsCache = new Map<string, Promise<RawStatements>>();

  constructor(private readonly snapshotsDir: string) {}

  getStatements(symbol: string): Promise<RawStatements> {
    const cached = this.statementsCache.get(symbol);
    if (cached) return cached;

    const promise = this.readSnapshot(symbol).catch((error: unknown) => {
      // Do not cache failures
      this.statementsCache.delete(symbol);
      throw error;
    });
    this.statementsCache.set(symbol, promise);
    return promise;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  close(): void {
    this.statementsCache.clear();
  }

  snapshotPath(symbol: string): string {
    return join(this.snapshotsDir, `${symbol.replace(/[^A-Za-z0-9.\-^=]/g, '_')}.json`);
  }

  private async readSnapshot(symbol: string): Promise<RawStatements> {
    const filePath = this.snapshotPath(symbol);
    this.requestCount += 1;

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw this.fail(symbol, `No statement snapshot for ${symbol}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw this.fail(symbol, `Malformed statement snapshot for ${symbol}`, error);
    }

    const result = validateStatementSnapshot(parsed);
    if (!result.valid || !result.data) {
      throw this.fail(
        symbol,
        `Invalid statement snapshot for ${symbol}: ${result.errors?.join('; ') ?? 'unknown error'}`
      );
    }

    if (result.data.symbol.toUpperCase() !== symbol.toUpperCase()) {
      throw this.fail(
        symbol,
        `Snapshot ${filePath} holds ${result.data.symbol}, expected ${symbol}`
      );
    }

    logger.debug({ symbol, filePath }, 'Statement snapshot loaded');
    return result.data;
  }

  private fail(symbol: string, message: string, cause?: unknown): ProviderError {
    return new ProviderError(
      message,
      this.name,
      symbol,
      'getStatements',
      cause instanceof Error ? cause : undefined
    );
  }
}
