/**
 * Portfolio Aggregator
 * Orders company records by sector rank and exposes sector groups.
 */

import type { CompanyMetrics } from '@/types/metrics';

export const SECTOR_RANK: Readonly<Record<string, number>> = Object.freeze({
  'Consumer Defensive': 1,
  'Consumer Cyclical': 2,
  Healthcare: 3,
  Technology: 4,
  'Financial Services': 5,
  Industrials: 6,
  'Communication Services': 7,
  Energy: 8,
  'Real Estate': 9,
  Utilities: 10,
  'Basic Materials': 11,
  Unknown: 99,
});

/** Rank for any sector missing from the table; above every named sector. */
export const UNRANKED_SECTOR_RANK = 99;

export const DEFAULT_CHUNK_SIZE = 10;

export interface SectorGroup {
  sector: string;
  rank: number;
  companies: readonly CompanyMetrics[];
}

export interface PortfolioView {
  companies: readonly CompanyMetrics[];
  groups: readonly SectorGroup[];
}

export function sectorRank(sector: string): number {
  return Object.prototype.hasOwnProperty.call(SECTOR_RANK, sector)
    ? SECTOR_RANK[sector]
    : UNRANKED_SECTOR_RANK;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareCompanies(a: CompanyMetrics, b: CompanyMetrics): number {
  const rankDiff = sectorRank(a.sector) - sectorRank(b.sector);
  if (rankDiff !== 0) return rankDiff;
  return compareText(a.sector, b.sector) || compareText(a.symbol, b.symbol);
}

export function groupBySector(sorted: readonly CompanyMetrics[]): SectorGroup[] {
  const groups: SectorGroup[] = [];
  let current: { sector: string; rank: number; companies: CompanyMetrics[] } | null = null;

  for (const company of sorted) {
    if (!current || current.sector !== company.sector) {
      current = { sector: company.sector, rank: sectorRank(company.sector), companies: [] };
      groups.push(current);
    }
    current.companies.push(company);
  }

  return groups;
}

/**
 * Sorts by (sector rank, sector name, symbol). Input records are not
 * mutated; an empty input gives an empty view.
 */
export function aggregatePortfolio(records: readonly CompanyMetrics[]): PortfolioView {
  const companies = Object.freeze(records.slice().sort(compareCompanies));
  const groups = Object.freeze(groupBySector(companies));
  return { companies, groups };
}

export function findSector(view: PortfolioView, sector: string): SectorGroup | null {
  return view.groups.find((group) => group.sector === sector) ?? null;
}

/**
 * Splits items into consecutive windows of `size`, preserving order.
 */
export function chunk<T>(items: readonly T[], size: number = DEFAULT_CHUNK_SIZE): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
