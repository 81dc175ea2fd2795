import { describe, it, expect } from 'vitest';
import { calculateFee, feePerShare, DEFAULT_FEE_POLICY } from './fees.js';

describe('calculateFee', () => {
  it('charges 100 shares at 0.50 exactly 1.5625', () => {
    expect(calculateFee(100, 0.5)).toBe(1.5625);
  });

  it('is zero when the policy does not apply', () => {
    expect(calculateFee(100, 0.5, DEFAULT_FEE_POLICY, false)).toBe(0);
  });

  it('is zero at the price bounds and for no shares', () => {
    expect(calculateFee(100, 0)).toBe(0);
    expect(calculateFee(100, 1)).toBe(0);
    expect(calculateFee(0, 0.5)).toBe(0);
    expect(calculateFee(-5, 0.5)).toBe(0);
  });

  it('is symmetric around 0.5 and peaks there', () => {
    expect(calculateFee(100, 0.2)).toBe(calculateFee(100, 0.8));
    expect(calculateFee(100, 0.3)).toBeLessThan(calculateFee(100, 0.5));
  });

  it('rounds to six decimals', () => {
    // 10 * 0.25 * (0.3 * 0.7)^2 = 0.11025
    expect(calculateFee(10, 0.3)).toBe(0.11025);
    // 1 * 0.25 * (0.01 * 0.99)^2 = 0.0000245025
    expect(calculateFee(1, 0.01)).toBe(0.000025);
  });

  it('scales linearly in shares', () => {
    expect(calculateFee(200, 0.5)).toBe(2 * calculateFee(100, 0.5));
  });

  it('honours a custom policy', () => {
    expect(calculateFee(100, 0.5, { rate: 0.5, exponent: 1, precision: 2 })).toBe(12.5);
  });
});

describe('feePerShare', () => {
  it('matches the rounded fee for a round lot', () => {
    expect(feePerShare(0.5) * 100).toBeCloseTo(calculateFee(100, 0.5), 10);
  });
});
