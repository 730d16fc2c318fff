import type { StatementProvider } from '@/providers/types';
import type { RawStatements } from '@/types/metrics';

/** In-process provider serving canned statements or failures per symbol. */
export class FakeStatementProvider implements StatementProvider {
  readonly name = 'fake';
  readonly calls: string[] = [];

  constructor(private readonly responses: Record<string, RawStatements | Error>) {}

  async getStatements(symbol: string): Promise<RawStatements> {
    this.calls.push(symbol);
    const response = this.responses[symbol];
    if (response === undefined) {
      throw new Error(`No data for ${symbol}`);
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }

  getRequestCount(): number {
    return this.calls.length;
  }

  close(): void {}
}
