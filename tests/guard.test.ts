import { describe, it, expect } from "vitest";
import { GuardPenalty } from "../src/core/guard";
import { ALICE, BOB, MINUTE } from "./helpers/chain";

const HOUR = 60 * MINUTE;
const params = { enabled: true, windowMs: HOUR, threshold: 10 };

const withBlocks = (count: number, g = new GuardPenalty(params)) => {
  for (let i = 0; i < count; i++) g.record(ALICE, i * MINUTE);
  return g;
};

describe("Guard penalty", () => {
  it("should not penalize a miner at the threshold", () => {
    const status = withBlocks(10).checkAddress(ALICE, 10 * MINUTE);
    expect(status).toEqual({ isPenalized: false, multiplier: 1, blocksInWindow: 10, threshold: 10 });
  });

  it("should add half the base difficulty per block over the threshold", () => {
    expect(withBlocks(11).checkAddress(ALICE, 11 * MINUTE).multiplier).toBe(1.5);
    expect(withBlocks(15).checkAddress(ALICE, 15 * MINUTE).multiplier).toBe(3.5);
    expect(withBlocks(16).checkAddress(ALICE, 16 * MINUTE).multiplier).toBe(4);
    expect(withBlocks(11).checkAddress(ALICE, 11 * MINUTE).isPenalized).toBe(true);
  });

  it("should count the candidate block toward its own target", () => {
    // 10th block in the window: at the threshold
    expect(withBlocks(9).effectiveTarget(ALICE, 3000n, 9 * MINUTE)).toBe(3000n);
    // 11th: ×1.5
    expect(withBlocks(10).effectiveTarget(ALICE, 3000n, 10 * MINUTE)).toBe(2000n);
    // 15th: ×3.5
    expect(withBlocks(14).effectiveTarget(ALICE, 3000n, 14 * MINUTE)).toBe(857n);
  });

  it("should leave other miners alone", () => {
    const g = withBlocks(16);
    expect(g.effectiveTarget(BOB, 3000n, 16 * MINUTE)).toBe(3000n);
    expect(g.checkAddress(BOB, 16 * MINUTE).blocksInWindow).toBe(0);
  });

  it("should forget blocks that leave the window", () => {
    const g = withBlocks(11);
    // the block at t=0 is exactly one window old
    expect(g.checkAddress(ALICE, HOUR).blocksInWindow).toBe(10);
    expect(g.checkAddress(ALICE, HOUR).isPenalized).toBe(false);
    expect(g.checkAddress(ALICE, HOUR - 1).isPenalized).toBe(true);
  });

  it("should count blocks stamped after the query time", () => {
    expect(withBlocks(16).checkAddress(ALICE, 4 * MINUTE).blocksInWindow).toBe(16);
  });

  it("should prune against the caller's clock rather than the block timestamp", () => {
    const g = withBlocks(11);
    g.record(ALICE, 3 * HOUR, 11 * MINUTE);
    expect(g.checkAddress(ALICE, 11 * MINUTE).blocksInWindow).toBe(12);
    // 12 recorded plus the candidate: excess 3
    expect(g.effectiveTarget(ALICE, 3000n, 12 * MINUTE)).toBe(1200n);
  });

  it("should not change state when only queried", () => {
    const g = withBlocks(11);
    g.checkAddress(ALICE, 5 * HOUR);
    g.effectiveTarget(ALICE, 3000n, 5 * HOUR);
    expect(g.checkAddress(ALICE, 11 * MINUTE).blocksInWindow).toBe(11);
  });

  it("should drop idle miners when recording", () => {
    const g = withBlocks(3);
    expect(g.trackedMiners).toBe(1);
    g.record(BOB, 2 * HOUR);
    expect(g.trackedMiners).toBe(1);
    expect(g.checkAddress(ALICE, 2 * MINUTE).blocksInWindow).toBe(0);
  });

  it("should do nothing when disabled", () => {
    const g = withBlocks(20, new GuardPenalty({ ...params, enabled: false }));
    expect(g.effectiveTarget(ALICE, 3000n, 20 * MINUTE)).toBe(3000n);
    expect(g.checkAddress(ALICE, 20 * MINUTE)).toEqual({
      isPenalized: false,
      multiplier: 1,
      blocksInWindow: 20,
      threshold: 10,
    });
  });
});
