import { describe, it, expect } from 'vitest';
import {
  aggregatePortfolio,
  chunk,
  findSector,
  sectorRank,
  UNRANKED_SECTOR_RANK,
} from '@/metrics/portfolio';
import { buildCompanyMetrics } from '@/metrics/company_metrics';
import { DEFAULT_METRICS_CONFIG } from '@/metrics/ratios';
import type { CompanyMetrics } from '@/types/metrics';
import { emptyStatements } from '../fixtures/statements';

function company(symbol: string, sector?: string): CompanyMetrics {
  const info = sector ? { sector } : {};
  const result = buildCompanyMetrics(symbol, emptyStatements(symbol, info), DEFAULT_METRICS_CONFIG);
  if (!result.ok) throw new Error(result.error.error);
  return result.metrics;
}

describe('portfolio aggregation', () => {
  it('ranks known sectors from the fixed table', () => {
    expect(sectorRank('Technology')).toBe(4);
    expect(sectorRank('Energy')).toBe(8);
    expect(sectorRank('Unknown')).toBe(99);
  });

  it('ranks unrecognised sectors after every named sector', () => {
    expect(sectorRank('Crypto')).toBe(UNRANKED_SECTOR_RANK);
    expect(sectorRank('constructor')).toBe(UNRANKED_SECTOR_RANK);
  });

  it('orders Technology before Energy before Unknown, then by ticker', () => {
    const view = aggregatePortfolio([
      company('ZZZ'),
      company('XOM', 'Energy'),
      company('MSFT', 'Technology'),
      company('CVX', 'Energy'),
      company('AAPL', 'Technology'),
    ]);

    expect(view.companies.map((c) => c.symbol)).toEqual(['AAPL', 'MSFT', 'CVX', 'XOM', 'ZZZ']);
    expect(view.groups.map((g) => [g.sector, g.rank, g.companies.length])).toEqual([
      ['Technology', 4, 2],
      ['Energy', 8, 2],
      ['Unknown', 99, 1],
    ]);
  });

  it('breaks equal ranks by sector name', () => {
    const view = aggregatePortfolio([company('AAA', 'Unknown'), company('BBB', 'Crypto')]);
    expect(view.groups.map((g) => g.sector)).toEqual(['Crypto', 'Unknown']);
  });

  it('does not mutate the input collection', () => {
    const records = [company('B', 'Energy'), company('A', 'Technology')];
    aggregatePortfolio(records);
    expect(records.map((c) => c.symbol)).toEqual(['B', 'A']);
  });

  it('gives an empty view for no records', () => {
    const view = aggregatePortfolio([]);
    expect(view.companies).toEqual([]);
    expect(view.groups).toEqual([]);
  });

  it('finds a sector group by name', () => {
    const view = aggregatePortfolio([company('KO', 'Consumer Defensive')]);
    expect(findSector(view, 'Consumer Defensive')?.companies.map((c) => c.symbol)).toEqual(['KO']);
    expect(findSector(view, 'Energy')).toBeNull();
  });
});

describe('chunk', () => {
  it('splits 23 items into windows of 10, 10 and 3 preserving order', () => {
    const items = Array.from({ length: 23 }, (_, i) => i);
    const chunks = chunk(items);

    expect(chunks.map((c) => c.length)).toEqual([10, 10, 3]);
    expect(chunks.flat()).toEqual(items);
  });

  it('returns no windows for no items', () => {
    expect(chunk([], 5)).toEqual([]);
  });

  it('rejects a non-positive or fractional size', () => {
    expect(() => chunk([1], 0)).toThrow('Chunk size must be a positive integer, got 0');
    expect(() => chunk([1], 2.5)).toThrow('Chunk size must be a positive integer, got 2.5');
  });
});
