/**
 * Shared types for statement data providers.
 *
 * A provider supplies the three statement tables and the info map for one
 * ticker. It throws ProviderError when nothing usable could be obtained;
 * empty tables are a successful fetch.
 */
import type { RawStatements } from '@/types/metrics';

export interface StatementProvider {
  readonly name: string;
  getStatements(symbol: string): Promise<RawStatements>;
  getRequestCount(): number;
  close(): void;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
