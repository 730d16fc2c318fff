import { describe, it, expect } from 'vitest';
import {
  costOfDebt,
  costOfEquity,
  effectiveTaxRate,
  investedCapital,
  priceToFreeCashFlow,
  roic,
  valueSpread,
  wacc,
} from '@/metrics/ratios';

describe('ratio calculators', () => {
  describe('costOfEquity', () => {
    it('applies CAPM', () => {
      expect(costOfEquity(1.2, 0.0435, 0.085)).toBeCloseTo(0.0933, 10);
    });

    it('treats a missing beta as market beta', () => {
      expect(costOfEquity(null, 0.0435, 0.085)).toBeCloseTo(0.085, 10);
    });
  });

  describe('costOfDebt', () => {
    it('divides interest by debt', () => {
      expect(costOfDebt(10, 200)).toBe(0.05);
    });

    it('is zero for zero or missing debt', () => {
      expect(costOfDebt(10, 0)).toBe(0);
      expect(costOfDebt(null, 0)).toBe(0);
      expect(costOfDebt(10, null)).toBe(0);
    });

    it('is unavailable when debt is outstanding but interest is unknown', () => {
      expect(costOfDebt(null, 200)).toBeNull();
    });
  });

  describe('effectiveTaxRate', () => {
    it('divides tax expense by earnings before tax', () => {
      expect(effectiveTaxRate(20, 100, 0.21)).toBe(0.2);
    });

    it('uses the default when EBT is zero or missing', () => {
      expect(effectiveTaxRate(20, 0, 0.21)).toBe(0.21);
      expect(effectiveTaxRate(20, null, 0.3)).toBe(0.3);
    });

    it('uses the default when tax expense is missing', () => {
      expect(effectiveTaxRate(null, 100, 0.21)).toBe(0.21);
    });

    it('uses the default when the quotient overflows', () => {
      expect(effectiveTaxRate(1e10, 5e-324, 0.21)).toBe(0.21);
      expect(effectiveTaxRate(-1e10, 5e-324, 0.3)).toBe(0.3);
    });
  });

  describe('wacc', () => {
    it('weights equity and after-tax debt by market value', () => {
      expect(wacc(800, 200, 0.0933, 0.05, 0.2)).toBeCloseTo(0.08264, 10);
    });

    it('is unavailable when equity and debt are both zero', () => {
      expect(wacc(0, 0, 0.09, 0, 0.21)).toBeNull();
      expect(wacc(null, null, 0.09, 0, 0.21)).toBeNull();
    });

    it('is the cost of equity for an all-equity company', () => {
      expect(wacc(500, 0, 0.09, 0, 0.21)).toBe(0.09);
    });

    it('is unavailable when debt is outstanding with an unknown cost', () => {
      expect(wacc(800, 200, 0.09, null, 0.21)).toBeNull();
    });

    it('counts a missing market cap as zero equity', () => {
      expect(wacc(null, 100, 0.09, 0.05, 0.2)).toBeCloseTo(0.04, 10);
    });
  });

  describe('roic', () => {
    it('divides NOPAT by equity plus debt minus cash', () => {
      expect(investedCapital(750, 200, 50)).toBe(900);
      expect(roic(120, 0.2, 750, 200, 50)).toBeCloseTo(96 / 900, 10);
    });

    it('is unavailable without EBIT or with zero invested capital', () => {
      expect(roic(null, 0.2, 750, 200, 50)).toBeNull();
      expect(roic(120, 0.2, 100, 0, 100)).toBeNull();
    });
  });

  describe('valueSpread', () => {
    it('is (ROIC - WACC) x 100', () => {
      expect(valueSpread(0.15, 0.05)).toBe((0.15 - 0.05) * 100);
      expect(valueSpread(0.04, 0.08)).toBe((0.04 - 0.08) * 100);
    });

    it('requires both inputs', () => {
      expect(valueSpread(null, 0.08)).toBeNull();
      expect(valueSpread(0.1, null)).toBeNull();
    });
  });

  describe('priceToFreeCashFlow', () => {
    it('divides price by FCF per share', () => {
      expect(priceToFreeCashFlow(50, 100, 10)).toBe(5);
    });

    it('is unavailable for zero or missing FCF and shares', () => {
      expect(priceToFreeCashFlow(50, 0, 10)).toBeNull();
      expect(priceToFreeCashFlow(50, 100, 0)).toBeNull();
      expect(priceToFreeCashFlow(50, null, 10)).toBeNull();
      expect(priceToFreeCashFlow(null, 100, 10)).toBeNull();
    });
  });
});
