import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { DifficultyController, nextTarget } from "../src/core/difficulty";
import type { DifficultyParams } from "../src/core/difficulty";

const params: DifficultyParams = {
  initialTarget: 2n ** 240n,
  minTarget: 2n ** 230n,
  maxTarget: 2n ** 250n,
  retargetInterval: 12,
  targetBlockTimeMs: 300_000,
};

const evenChain = (length: number, gapMs: number) =>
  Array.from({ length }, (_, index) => ({ index, timestamp: index * gapMs }));

describe("Difficulty controller", () => {
  it("should start at the initial target", () => {
    expect(new DifficultyController(params).currentTarget()).toBe(2n ** 240n);
  });

  it("should halve the target when blocks come twice as fast", () => {
    const d = new DifficultyController(params);
    expect(d.retargetIfDue(evenChain(13, 150_000))).toBe(true);
    expect(d.currentTarget()).toBe(2n ** 239n);
    expect(d.snapshot()).toEqual({ target: 2n ** 239n, lastRetargetIndex: 12, averageIntervalMs: 150_000 });
  });

  it("should double the target when blocks come twice as slow", () => {
    const d = new DifficultyController(params);
    d.retargetIfDue(evenChain(13, 600_000));
    expect(d.currentTarget()).toBe(2n ** 241n);
  });

  it("should keep the target when blocks are on time", () => {
    const d = new DifficultyController(params);
    expect(d.retargetIfDue(evenChain(13, 300_000))).toBe(true);
    expect(d.currentTarget()).toBe(2n ** 240n);
  });

  it("should clamp to the configured bounds", () => {
    const slow = new DifficultyController(params);
    slow.retargetIfDue(evenChain(13, 300_000 * 2000));
    expect(slow.currentTarget()).toBe(params.maxTarget);

    const fast = new DifficultyController(params);
    fast.retargetIfDue(evenChain(13, 1));
    expect(fast.currentTarget()).toBe(params.minTarget);
  });

  it("should not retarget twice at the same height", () => {
    const d = new DifficultyController(params);
    const chain = evenChain(13, 150_000);
    d.retargetIfDue(chain);
    expect(d.retargetIfDue(chain)).toBe(false);
    expect(d.currentTarget()).toBe(2n ** 239n);
  });

  it("should not retarget off a boundary height", () => {
    const d = new DifficultyController(params);
    expect(d.retargetIfDue(evenChain(1, 150_000))).toBe(false);
    expect(d.retargetIfDue(evenChain(12, 150_000))).toBe(false);
    expect(d.retargetIfDue(evenChain(14, 150_000))).toBe(false);
    expect(d.currentTarget()).toBe(2n ** 240n);
  });

  it("should replay the same decisions when walked block by block", () => {
    const chain = evenChain(25, 150_000);
    const d = new DifficultyController(params);
    chain.forEach((_, i) => d.retargetIfDue(chain, i));
    expect(d.currentTarget()).toBe(2n ** 238n);
    expect(d.snapshot().lastRetargetIndex).toBe(24);
  });

  it("should estimate hashrate from target and average interval", () => {
    const d = new DifficultyController(params);
    expect(d.estimateHashrate()).toBe(0n);
    d.retargetIfDue(evenChain(13, 150_000));
    // 2^17 expected hashes per block, one block per 150 s
    expect(d.estimateHashrate()).toBe(873n);
  });

  it("should be deterministic for any sequence of block times", () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 1, max: 3_600_000 }), { minLength: 12, maxLength: 12 }), (gaps) => {
        let t = 0;
        const chain = [{ index: 0, timestamp: 0 }, ...gaps.map((g, i) => ({ index: i + 1, timestamp: (t += g) }))];
        const a = new DifficultyController(params);
        const b = new DifficultyController(params);
        a.retargetIfDue(chain);
        b.retargetIfDue(chain);
        const t1 = a.currentTarget();
        return (
          t1 === b.currentTarget() &&
          t1 === nextTarget(params.initialTarget, chain, params) &&
          t1 >= params.minTarget &&
          t1 <= params.maxTarget
        );
      }),
    );
  });
});
