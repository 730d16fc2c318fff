import { describe, it, expect } from 'vitest';
import { contentHash, deterministicHash, stableStringify } from '@/core/seed';
import { getRunId } from '@/core/time';

describe('seed', () => {
  describe('deterministicHash', () => {
    it('produces consistent hash for same input', () => {
      expect(deterministicHash('test-input')).toBe(deterministicHash('test-input'));
    });

    it('produces different hash for different input', () => {
      expect(deterministicHash('input-a')).not.toBe(deterministicHash('input-b'));
    });

    it('returns 64-character hex string', () => {
      expect(deterministicHash('any-input')).toMatch(/^[a-f0-9]{64}$/);
    });
  });

  describe('stableStringify', () => {
    it('sorts keys at every depth and drops undefined values', () => {
      expect(stableStringify({ b: 1, a: { d: [1, null], c: undefined } })).toBe(
        '{"a":{"d":[1,null]},"b":1}'
      );
    });
  });

  describe('contentHash', () => {
    it('ignores key order', () => {
      expect(contentHash({ a: 1, b: 2 })).toBe(contentHash({ b: 2, a: 1 }));
    });

    it('changes when a value changes', () => {
      expect(contentHash({ wacc: 0.08 })).not.toBe(contentHash({ wacc: 0.09 }));
    });
  });

  it('builds run ids from the date and the first eight hash characters', () => {
    expect(getRunId(new Date(2026, 0, 15), 'abcdef0123456789')).toBe('2026-01-15__abcdef01');
  });
});
