import { accepted, rejected } from "../errors";
import type { Outcome } from "../errors";
import type { Address, TxId } from "../types/brands";
import { DEFAULT_FEE_POLICY, feeRatePermille, isValidFee } from "./fee";
import type { FeePolicy } from "./fee";
import type { Clock, Fullness, MempoolEntry, Transaction } from "./types";

export interface MempoolOptions {
  readonly maxSize: number;
  readonly policy?: FeePolicy;
  /** How many 0.1% steps a submitted rate may lag the current one. */
  readonly tolerancePermille?: number;
  readonly clock?: Clock;
}

// fee desc → admittedAt asc → sequence asc
const byPriority = (a: MempoolEntry, b: MempoolEntry): number => {
  if (a.tx.fee !== b.tx.fee) return a.tx.fee > b.tx.fee ? -1 : 1;
  if (a.admittedAt !== b.admittedAt) return a.admittedAt - b.admittedAt;
  return a.sequence - b.sequence;
};

/**
 * Bounded holding area for unconfirmed transactions. Owned by one node;
 * callers serialize mutations (see `ChainNode`).
 */
export class Mempool {
  readonly capacity: number;
  private readonly policy: FeePolicy;
  private readonly tolerance: number;
  private readonly clock: Clock;
  private readonly byId = new Map<TxId, MempoolEntry>();
  private readonly spendBySender = new Map<Address, bigint>();
  private sequence = 0;

  constructor(opts: MempoolOptions) {
    this.capacity = opts.maxSize;
    this.policy = opts.policy ?? DEFAULT_FEE_POLICY;
    this.tolerance = opts.tolerancePermille ?? 1;
    this.clock = opts.clock ?? Date.now;
  }

  get size(): number {
    return this.byId.size;
  }

  fullness(): Fullness {
    return { size: this.byId.size, capacity: this.capacity };
  }

  currentFeeRate(): number {
    return feeRatePermille(this.fullness(), this.policy);
  }

  has(id: TxId): boolean {
    return this.byId.has(id);
  }

  get(id: TxId): MempoolEntry | undefined {
    return this.byId.get(id);
  }

  entries(): MempoolEntry[] {
    return [...this.byId.values()];
  }

  totalFees(): bigint {
    let sum = 0n;
    for (const e of this.byId.values()) sum += e.tx.fee;
    return sum;
  }

  /** amount + fee of everything the address has waiting here */
  pendingSpend(address: Address): bigint {
    return this.spendBySender.get(address) ?? 0n;
  }

  admit(tx: Transaction): Outcome<MempoolEntry> {
    if (this.byId.has(tx.id)) return rejected("duplicate", `transaction ${tx.id} already in mempool`);
    if (this.byId.size >= this.capacity)
      return rejected("mempool-full", `mempool at capacity (${this.capacity})`);

    const rate = this.currentFeeRate();
    if (Math.abs(tx.feeRate - rate) > this.tolerance)
      return rejected("invalid-fee", `fee rate ${tx.feeRate}‰ is stale, current rate is ${rate}‰`);
    if (!isValidFee(tx.amount, tx.fee, tx.feeRate, this.policy))
      return rejected("invalid-fee", `fee ${tx.fee} does not match rate ${tx.feeRate}‰ of ${tx.amount}`);

    const entry: MempoolEntry = { tx, admittedAt: this.clock(), sequence: this.sequence++ };
    this.byId.set(tx.id, entry);
    this.spendBySender.set(tx.sender, this.pendingSpend(tx.sender) + tx.amount + tx.fee);
    return accepted(entry);
  }

  selectForBlock(limit = 512): Transaction[] {
    return [...this.byId.values()]
      .sort(byPriority)
      .slice(0, Math.max(limit, 0))
      .map((e) => e.tx);
  }

  /**
   * Drops entries of `senders` that their confirmed balance no longer
   * covers, walking each sender's entries in block priority order.
   */
  evictUnfunded(senders: Iterable<Address>, balanceOf: (a: Address) => bigint): TxId[] {
    const wanted = new Set(senders);
    if (wanted.size === 0) return [];
    const left = new Map<Address, bigint>();
    const evict: TxId[] = [];
    for (const { tx } of [...this.byId.values()].sort(byPriority)) {
      if (!wanted.has(tx.sender)) continue;
      const balance = left.get(tx.sender) ?? balanceOf(tx.sender);
      const cost = tx.amount + tx.fee;
      if (balance < cost) evict.push(tx.id);
      else left.set(tx.sender, balance - cost);
    }
    return this.remove(evict);
  }

  /** Unknown ids are ignored. Returns the ids that were resident. */
  remove(ids: Iterable<TxId>): TxId[] {
    const removed: TxId[] = [];
    for (const id of ids) {
      const entry = this.byId.get(id);
      if (!entry) continue;
      this.byId.delete(id);
      const left = this.pendingSpend(entry.tx.sender) - entry.tx.amount - entry.tx.fee;
      if (left > 0n) this.spendBySender.set(entry.tx.sender, left);
      else this.spendBySender.delete(entry.tx.sender);
      removed.push(id);
    }
    return removed;
  }
}
