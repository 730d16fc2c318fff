import { describe, it, expect } from 'vitest';
import {
  formatMarketCap,
  formatNumber,
  formatPercent,
  formatPrice,
  formatSpread,
  formatText,
  NOT_AVAILABLE,
} from '@/lib/format';

describe('format', () => {
  it('prints unavailable values as N/D', () => {
    expect(NOT_AVAILABLE).toBe('N/D');
    expect(formatNumber(null)).toBe('N/D');
    expect(formatPercent(undefined)).toBe('N/D');
    expect(formatSpread(Number.NaN)).toBe('N/D');
    expect(formatPrice(null)).toBe('N/D');
    expect(formatMarketCap(null)).toBe('N/D');
    expect(formatText(null)).toBe('N/D');
    expect(formatText('  ')).toBe('N/D');
  });

  it('formats ratios with two decimals', () => {
    expect(formatNumber(1.234)).toBe('1.23');
    expect(formatNumber(2)).toBe('2.00');
    expect(formatNumber(3.14159, 3)).toBe('3.142');
  });

  it('formats fractions as percentages', () => {
    expect(formatPercent(0.1234)).toBe('12.34%');
    expect(formatPercent(-0.05)).toBe('-5.00%');
  });

  it('formats the spread without rescaling', () => {
    expect(formatSpread(2.5)).toBe('2.50%');
    expect(formatSpread(-1.234)).toBe('-1.23%');
  });

  it('formats prices and market caps as currency', () => {
    expect(formatPrice(1234.5)).toBe('$1,234.50');
    expect(formatPrice(-3)).toBe('-$3.00');
    expect(formatMarketCap(2_500_000_000)).toBe('$2.50B');
    expect(formatMarketCap(3_000_000_000_000)).toBe('$3,000.00B');
  });

  it('passes text through', () => {
    expect(formatText('Software')).toBe('Software');
  });
});
