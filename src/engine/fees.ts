/**
 * Fee Policy
 *
 * Taker fee on time-boxed crypto contracts:
 *   fee = shares * rate * (price * (1 - price)) ^ exponent
 * Peaks at price 0.5 and vanishes at 0 and 1. Multi-leg sets are fee-free.
 */

export interface FeePolicy {
  rate: number;
  exponent: number;
  precision: number;     // Decimal places kept after rounding
}

export const DEFAULT_FEE_POLICY: FeePolicy = {
  rate: 0.25,
  exponent: 2,
  precision: 6,
};

export function calculateFee(
  shares: number,
  price: number,
  policy: FeePolicy = DEFAULT_FEE_POLICY,
  applies = true
): number {
  if (!applies || shares <= 0 || price <= 0 || price >= 1) return 0;

  const raw = shares * feePerShare(price, policy);
  const factor = 10 ** policy.precision;
  return Math.round(raw * factor) / factor;
}

/**
 * Unrounded fee for a single share
 */
export function feePerShare(price: number, policy: FeePolicy = DEFAULT_FEE_POLICY): number {
  if (price <= 0 || price >= 1) return 0;
  return policy.rate * Math.pow(price * (1 - price), policy.exponent);
}
