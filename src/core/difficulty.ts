import type { ILogger } from "../logging";
import { expectedWork } from "./hash";
import type { Block, DifficultyState } from "./types";

export interface DifficultyParams {
  readonly initialTarget: bigint;
  readonly minTarget: bigint;
  readonly maxTarget: bigint;
  /** Blocks between retargets. */
  readonly retargetInterval: number;
  readonly targetBlockTimeMs: number;
}

type Timed = Pick<Block, "index" | "timestamp">;

export const clampTarget = (t: bigint, p: DifficultyParams): bigint =>
  t < p.minTarget ? p.minTarget : t > p.maxTarget ? p.maxTarget : t;

export const isRetargetHeight = (index: number, p: DifficultyParams): boolean =>
  index > 0 && index % p.retargetInterval === 0;

/**
 * target × actualSpan / expectedSpan over the last `retargetInterval`
 * intervals ending at `chain[latest]`. Faster blocks shrink the target.
 */
export const nextTarget = (
  current: bigint,
  chain: readonly Timed[],
  p: DifficultyParams,
  latest = chain.length - 1,
): bigint => {
  const first = latest - p.retargetInterval;
  if (first < 0) return current;
  const span = BigInt(Math.max(chain[latest].timestamp - chain[first].timestamp, 0));
  const expected = BigInt(p.retargetInterval) * BigInt(p.targetBlockTimeMs);
  return clampTarget((current * span) / expected, p);
};

/** Mean of the last (up to) `retargetInterval` inter-block gaps, floored. */
export const averageInterval = (
  chain: readonly Timed[],
  p: DifficultyParams,
  latest = chain.length - 1,
): number => {
  const first = Math.max(latest - p.retargetInterval, 0);
  const gaps = latest - first;
  if (gaps <= 0) return 0;
  return Math.floor(Math.max(chain[latest].timestamp - chain[first].timestamp, 0) / gaps);
};

export class DifficultyController {
  private state: DifficultyState;

  constructor(
    private readonly params: DifficultyParams,
    private readonly log?: ILogger,
  ) {
    this.state = {
      target: params.initialTarget,
      lastRetargetIndex: 0,
      averageIntervalMs: 0,
    };
  }

  currentTarget(): bigint {
    return this.state.target;
  }

  snapshot(): DifficultyState {
    return this.state;
  }

  /**
   * Called after every append. Retargets only on a boundary height that has
   * not been retargeted yet, so a repeated call is a no-op.
   */
  retargetIfDue(chain: readonly Timed[], latest = chain.length - 1): boolean {
    if (latest < 0) return false;
    const tip = chain[latest];
    const averageIntervalMs = averageInterval(chain, this.params, latest);
    const due = isRetargetHeight(tip.index, this.params) && tip.index !== this.state.lastRetargetIndex;
    if (!due) {
      this.state = { ...this.state, averageIntervalMs };
      return false;
    }
    const target = nextTarget(this.state.target, chain, this.params, latest);
    this.log?.info(
      { height: tip.index, from: this.state.target.toString(16), to: target.toString(16), averageIntervalMs },
      "difficulty retarget",
    );
    this.state = { target, lastRetargetIndex: tip.index, averageIntervalMs };
    return true;
  }

  /** Hashes per second implied by the current target and recent block times. */
  estimateHashrate(): bigint {
    if (this.state.averageIntervalMs <= 0) return 0n;
    return (expectedWork(this.state.target) * 1000n) / BigInt(this.state.averageIntervalMs);
  }
}
