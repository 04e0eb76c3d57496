import { describe, it, expect } from "vitest";
import { computeFee, feeAtRate, feeRatePermille, feeSchedule, isValidFee } from "../src/core/fee";

const CAP = 10_000;

describe("Fee engine", () => {
  describe("rate", () => {
    it("should charge the base rate on an empty mempool", () => {
      expect(feeRatePermille({ size: 0, capacity: CAP })).toBe(10);
      expect(computeFee(1000n, { size: 0, capacity: CAP })).toBe(10n);
    });

    it("should charge the maximum rate on a full mempool", () => {
      expect(feeRatePermille({ size: CAP, capacity: CAP })).toBe(50);
      expect(computeFee(1000n, { size: CAP, capacity: CAP })).toBe(50n);
    });

    it("should interpolate linearly at half capacity", () => {
      expect(computeFee(1000n, { size: 5_000, capacity: CAP })).toBe(30n);
    });

    it("should round the rate half up to a whole per mille", () => {
      // 40 × 125 / 10000 = 0.5 → 1
      expect(feeRatePermille({ size: 125, capacity: CAP })).toBe(11);
      // 40 × 124 / 10000 = 0.496 → 0
      expect(feeRatePermille({ size: 124, capacity: CAP })).toBe(10);
    });

    it("should clamp sizes outside the capacity", () => {
      expect(feeRatePermille({ size: CAP * 3, capacity: CAP })).toBe(50);
      expect(feeRatePermille({ size: 5, capacity: 0 })).toBe(50);
    });

    it("should honour a custom policy", () => {
      expect(feeRatePermille({ size: 50, capacity: 100 }, { basePermille: 0, maxPermille: 100 })).toBe(50);
    });
  });

  describe("fee amount", () => {
    it("should be zero for a zero value", () => {
      expect(computeFee(0n, { size: CAP, capacity: CAP })).toBe(0n);
    });

    it("should round half up in smallest units", () => {
      // 50 × 1% = 0.5 → 1
      expect(feeAtRate(50n, 10)).toBe(1n);
      // 49 × 1% = 0.49 → 0
      expect(feeAtRate(49n, 10)).toBe(0n);
      expect(feeAtRate(8_000_000_000n, 10)).toBe(80_000_000n);
    });
  });

  describe("isValidFee", () => {
    it("should accept exactly the fee for the carried rate", () => {
      expect(isValidFee(1000n, 30n, 30)).toBe(true);
      expect(isValidFee(1000n, 31n, 30)).toBe(false);
      expect(isValidFee(1000n, 29n, 30)).toBe(false);
    });

    it("should reject rates outside the policy bounds", () => {
      expect(isValidFee(1000n, 60n, 60)).toBe(false);
      expect(isValidFee(1000n, 9n, 9)).toBe(false);
      expect(isValidFee(1000n, 10n, 10.5)).toBe(false);
    });
  });

  describe("schedule", () => {
    it("should list the rate at every tenth of capacity", () => {
      const s = feeSchedule(CAP);
      expect(s).toHaveLength(11);
      expect(s[0]).toEqual({ fullnessPercent: 0, feeRatePermille: 10 });
      expect(s[5]).toEqual({ fullnessPercent: 50, feeRatePermille: 30 });
      expect(s[10]).toEqual({ fullnessPercent: 100, feeRatePermille: 50 });
      expect(s.map((x) => x.feeRatePermille)).toEqual([10, 14, 18, 22, 26, 30, 34, 38, 42, 46, 50]);
    });
  });
});
