import type { Fullness } from "./types";

/**
 * Dynamic fee pricing. Rates are integers in per mille (tenths of a
 * percent), so the 0.1% rounding step is exact and every validator
 * derives the same fee from the same inputs.
 */
export interface FeePolicy {
  readonly basePermille: number;
  readonly maxPermille: number;
}

export const DEFAULT_FEE_POLICY: FeePolicy = { basePermille: 10, maxPermille: 50 };

/** base + fullness × (max − base), rounded half up to a whole per mille. */
export const feeRatePermille = (
  fullness: Fullness,
  policy: FeePolicy = DEFAULT_FEE_POLICY,
): number => {
  const { basePermille: base, maxPermille: max } = policy;
  if (fullness.capacity <= 0) return max;
  const size = Math.min(Math.max(fullness.size, 0), fullness.capacity);
  const span = max - base;
  const step = Math.floor((2 * span * size + fullness.capacity) / (2 * fullness.capacity));
  return Math.min(base + step, max);
};

/** round_half_up(value × rate / 1000) */
export const feeAtRate = (value: bigint, ratePermille: number): bigint => {
  if (value <= 0n) return 0n;
  return (value * BigInt(ratePermille) * 2n + 1000n) / 2000n;
};

export const computeFee = (
  value: bigint,
  fullness: Fullness,
  policy: FeePolicy = DEFAULT_FEE_POLICY,
): bigint => feeAtRate(value, feeRatePermille(fullness, policy));

/** Block-time check: needs nothing but the transaction itself. */
export const isValidFee = (
  value: bigint,
  fee: bigint,
  ratePermille: number,
  policy: FeePolicy = DEFAULT_FEE_POLICY,
): boolean =>
  Number.isSafeInteger(ratePermille) &&
  ratePermille >= policy.basePermille &&
  ratePermille <= policy.maxPermille &&
  fee === feeAtRate(value, ratePermille);

export interface FeeStep {
  readonly fullnessPercent: number;
  readonly feeRatePermille: number;
}

/** Rate at 0%, 10%, … 100% fullness. */
export const feeSchedule = (capacity: number, policy: FeePolicy = DEFAULT_FEE_POLICY): FeeStep[] =>
  Array.from({ length: 11 }, (_, i) => ({
    fullnessPercent: i * 10,
    feeRatePermille: feeRatePermille({ size: Math.floor((capacity * i) / 10), capacity }, policy),
  }));
