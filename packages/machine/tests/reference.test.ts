import { describe, expect, it } from 'vitest';

import { formatRef, isRefId, refId, ROOT_REF } from '../src/core/reference.js';

describe('reference identities', () => {
  it('brands non-negative integers', () => {
    expect(refId(3)).toBe(3);
    expect(ROOT_REF).toBe(0);
    expect(formatRef(refId(12))).toBe('#12');
  });

  it('rejects negative and fractional identities', () => {
    expect(() => refId(-1)).toThrow(RangeError);
    expect(() => refId(1.5)).toThrow('Reference identity must be a non-negative integer, got 1.5');
  });

  it('validates identities with isRefId()', () => {
    expect(isRefId(0)).toBe(true);
    expect(isRefId(7)).toBe(true);
    expect(isRefId(-2)).toBe(false);
    expect(isRefId('1')).toBe(false);
    expect(isRefId(Number.NaN)).toBe(false);
  });
});
