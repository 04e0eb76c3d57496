import type { ILogger } from "../logging";
import type { Address } from "../types/brands";
import type { GuardStatus, Millis } from "./types";

export interface GuardParams {
  readonly enabled: boolean;
  readonly windowMs: number;
  /** Blocks per window a miner may produce before the penalty starts. */
  readonly threshold: number;
}

// first index whose timestamp is still inside the window
const firstInWindow = (ts: readonly Millis[], now: Millis, windowMs: number): number => {
  let lo = 0;
  let hi = ts.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (now - ts[mid] >= windowMs) lo = mid + 1;
    else hi = mid;
  }
  return lo;
};

/**
 * Per-miner sliding block count. A miner above `threshold` blocks in the
 * window pays `1 + 0.5 × excess` times the base difficulty.
 *
 * "now" is supplied by the caller: the validator passes the candidate's
 * timestamp capped at its own clock, so a block stamped into the future
 * cannot age the miner's window out early. Callers pass a non-decreasing
 * "now" to `record`.
 */
export class GuardPenalty {
  private readonly windows = new Map<Address, Millis[]>();

  constructor(
    private readonly params: GuardParams,
    private readonly log?: ILogger,
  ) {}

  /** Entries with `now − t < windowMs`, including ones stamped after `now`. */
  blocksInWindow(miner: Address, now: Millis): number {
    const ts = this.windows.get(miner);
    if (!ts) return 0;
    return ts.length - firstInWindow(ts, now, this.params.windowMs);
  }

  private excess(count: number): number {
    if (!this.params.enabled) return 0;
    return Math.max(count - this.params.threshold, 0);
  }

  /**
   * Target for the miner's next block: the candidate itself counts toward
   * the window, so the 11th block under a threshold of 10 pays ×1.5.
   * Smaller for a penalized miner: base × 2 / (2 + excess).
   */
  effectiveTarget(miner: Address, baseTarget: bigint, now: Millis): bigint {
    const excess = this.excess(this.blocksInWindow(miner, now) + 1);
    if (excess === 0) return baseTarget;
    return (baseTarget * 2n) / (2n + BigInt(excess));
  }

  /** Standing of the blocks already recorded; read-only. */
  checkAddress(miner: Address, now: Millis): GuardStatus {
    const blocksInWindow = this.blocksInWindow(miner, now);
    const excess = this.excess(blocksInWindow);
    return {
      isPenalized: excess > 0,
      multiplier: 1 + excess * 0.5,
      blocksInWindow,
      threshold: this.params.threshold,
    };
  }

  /**
   * Write path only: the validator calls this after an append. Pruning is
   * measured against `now`, never against a timestamp a miner chose.
   */
  record(miner: Address, timestamp: Millis, now: Millis = timestamp): void {
    const ts = this.windows.get(miner) ?? [];
    const from = firstInWindow(ts, now, this.params.windowMs);
    const kept = from > 0 ? ts.slice(from) : ts;
    kept.push(timestamp);
    this.windows.set(miner, kept);
    for (const [other, times] of this.windows)
      if (now - times[times.length - 1] >= this.params.windowMs) this.windows.delete(other);

    const excess = this.excess(this.blocksInWindow(miner, now));
    if (excess > 0)
      this.log?.info(
        { miner, blocksInWindow: kept.length, multiplier: 1 + excess * 0.5 },
        "guard penalty active",
      );
  }

  /** Miners with at least one block inside the window as of the last record. */
  get trackedMiners(): number {
    return this.windows.size;
  }
}
