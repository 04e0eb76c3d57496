import type { Mutex } from "async-mutex";
import { accepted, ConsistencyFault, rejected } from "../errors";
import type { Outcome } from "../errors";
import type { ILogger } from "../logging";
import type { Address, TxId } from "../types/brands";
import { isValidAddress } from "./address";
import type { Wordlist } from "./address";
import { DifficultyController } from "./difficulty";
import type { DifficultyParams } from "./difficulty";
import { isValidFee } from "./fee";
import type { FeePolicy } from "./fee";
import { GuardPenalty } from "./guard";
import type { GuardParams } from "./guard";
import { computeTxId, meetsTarget, rehashBlock } from "./hash";
import { settleBlock } from "./ledger";
import type { Ledger } from "./ledger";
import type { Mempool } from "./mempool";
import type { Block, Clock, Transaction } from "./types";

export interface ValidatorRules {
  readonly maxBlockTransactions: number;
  readonly maxFutureDriftMs: number;
  readonly fees: FeePolicy;
}

export interface ValidatorDeps {
  readonly ledger: Ledger;
  readonly mempool: Mempool;
  readonly difficulty: DifficultyController;
  readonly guard: GuardPenalty;
  readonly wordlist: Wordlist;
  readonly rules: ValidatorRules;
  readonly clock: Clock;
  readonly locks: { readonly chain: Mutex; readonly mempool: Mutex };
  readonly log: ILogger;
  readonly onAccepted?: (block: Block, drained: readonly TxId[], evicted: readonly TxId[]) => void;
}

/** What a valid candidate does to the ledger, computed without touching it. */
export interface AcceptedCandidate {
  readonly block: Block;
  readonly balances: ReadonlyMap<Address, bigint>;
  readonly fees: bigint;
  /** Clock reading the guard was measured against. */
  readonly guardNow: number;
}

const isUint = (n: number): boolean => Number.isSafeInteger(n) && n >= 0;

// fields the canonical encoding cannot carry
const txShapeProblem = (tx: Transaction): string | undefined => {
  if (!isUint(tx.feeRate)) return `fee rate ${tx.feeRate}`;
  if (!isUint(tx.timestamp)) return `timestamp ${tx.timestamp}`;
  if (tx.nonce < 0n) return `nonce ${tx.nonce}`;
  return undefined;
};

/**
 * Candidate lifecycle: Received → Validating → Accepted | Rejected.
 * Validation is side-effect free; only an accepted candidate mutates
 * ledger, mempool, guard and difficulty, as one unit under the chain lock.
 */
export class ChainValidator {
  constructor(private readonly deps: ValidatorDeps) {}

  validate(c: Block): Outcome<AcceptedCandidate> {
    const { ledger, difficulty, guard, wordlist, rules } = this.deps;
    const tip = ledger.latest;

    /* 1 ── structure */
    if (!isUint(c.timestamp) || c.nonce < 0n)
      return rejected("malformed", `header timestamp ${c.timestamp} or nonce ${c.nonce} is not an unsigned integer`);
    if (c.index !== tip.index + 1)
      return rejected("stale-height", `expected height ${tip.index + 1}, got ${c.index}`);
    if (c.previousHash !== tip.hash)
      return rejected("stale-parent", `previous hash ${c.previousHash} is not the tip ${tip.hash}`);
    if (c.timestamp <= tip.timestamp)
      return rejected("bad-timestamp", `timestamp ${c.timestamp} not after parent ${tip.timestamp}`);
    const now = this.deps.clock();
    if (c.timestamp > now + rules.maxFutureDriftMs)
      return rejected("future-timestamp", `timestamp ${c.timestamp} is too far ahead of ${now}`);
    if (!isValidAddress(c.miner, wordlist)) return rejected("invalid-address", `bad miner address ${c.miner}`);
    const baseTarget = difficulty.currentTarget();
    if (c.target !== baseTarget)
      return rejected("stale-target", `block target ${c.target.toString(16)} is not ${baseTarget.toString(16)}`);

    /* 2 ── transactions */
    const seen = new Set<TxId>();
    for (const tx of c.transactions) {
      if (tx.amount < 0n || tx.fee < 0n) return rejected("invalid-amount", `transaction ${tx.id} has a negative value`);
      const shape = txShapeProblem(tx);
      if (shape) return rejected("malformed", `transaction ${tx.id} has an invalid ${shape}`);
      if (computeTxId(tx) !== tx.id) return rejected("bad-tx-id", `transaction id ${tx.id} does not match its body`);
      if (seen.has(tx.id)) return rejected("duplicate-transaction", `transaction ${tx.id} appears twice`);
      seen.add(tx.id);
      if (ledger.hasTransaction(tx.id))
        return rejected("confirmed-transaction", `transaction ${tx.id} is already confirmed`);
      if (!isValidAddress(tx.sender, wordlist) || !isValidAddress(tx.recipient, wordlist))
        return rejected("invalid-address", `transaction ${tx.id} has a malformed address`);
      if (!isValidFee(tx.amount, tx.fee, tx.feeRate, rules.fees))
        return rejected("invalid-fee", `transaction ${tx.id} fee ${tx.fee} does not match rate ${tx.feeRate}‰`);
    }
    const settled = settleBlock(c, (a) => ledger.balanceOf(a), ledger.blockReward);
    if (!settled.ok)
      return rejected(
        "insufficient-balance",
        `${settled.tx.sender} has ${settled.available}, transaction ${settled.tx.id} needs ${settled.cost}`,
      );

    /* 3 ── size */
    if (c.transactions.length > rules.maxBlockTransactions)
      return rejected(
        "too-many-transactions",
        `${c.transactions.length} transactions exceed the limit of ${rules.maxBlockTransactions}`,
      );

    /* 4 ── hash and work */
    if (rehashBlock(c) !== c.hash) return rejected("bad-hash", `hash ${c.hash} does not match block contents`);
    const guardNow = Math.min(c.timestamp, now);
    const effective = guard.effectiveTarget(c.miner, baseTarget, guardNow);
    if (!meetsTarget(c.hash, effective))
      return rejected("insufficient-work", `hash ${c.hash} is not below ${effective.toString(16)}`);

    return accepted({ block: c, balances: settled.balances, fees: settled.fees, guardNow });
  }

  submitBlock(candidate: Block): Promise<Outcome<Block>> {
    const { locks, ledger, mempool, guard, difficulty, log } = this.deps;
    return locks.chain.runExclusive(async () => {
      const res = this.validate(candidate);
      if (res.status === "rejected") {
        log.warn({ height: candidate.index, hash: candidate.hash, ...res.rejection }, "block rejected");
        return res;
      }
      const { block, fees, guardNow } = res.value;

      /* 5 ── commit */
      const { drained, evicted } = await locks.mempool.runExclusive(async () => {
        await ledger.append(block, res.value.balances);
        return {
          drained: mempool.remove(block.transactions.map((t) => t.id)),
          evicted: mempool.evictUnfunded(
            block.transactions.map((t) => t.sender),
            (a) => ledger.balanceOf(a),
          ),
        };
      });
      guard.record(block.miner, block.timestamp, guardNow);
      difficulty.retargetIfDue(ledger.blocks);

      log.info(
        { height: block.index, hash: block.hash, miner: block.miner, txs: block.transactions.length, fees: fees.toString() },
        "block accepted",
      );
      if (evicted.length > 0) log.info({ height: block.index, evicted: evicted.length }, "unfunded transactions evicted");
      this.deps.onAccepted?.(block, drained, evicted);
      return accepted(block);
    });
  }
}

export interface ConsensusParams {
  readonly difficulty: DifficultyParams;
  readonly guard: GuardParams;
}

/**
 * Rebuilds difficulty and guard state from a loaded chain, checking every
 * block's target and proof of work on the way. Guard readings are capped at
 * `clock()` as on the live path; a later clock only ever yields an equal or
 * easier target, so a chain accepted live always replays.
 */
export const replayConsensus = (
  chain: readonly Block[],
  params: ConsensusParams,
  clock: Clock,
  log?: ILogger,
): { difficulty: DifficultyController; guard: GuardPenalty } => {
  const difficulty = new DifficultyController(params.difficulty, log);
  const guard = new GuardPenalty(params.guard, log);
  chain.forEach((b, i) => {
    const base = difficulty.currentTarget();
    if (b.target !== base)
      throw new ConsistencyFault(
        `block ${b.index} carries target ${b.target.toString(16)}, expected ${base.toString(16)}`,
        b.index,
      );
    if (i > 0) {
      const now = Math.min(b.timestamp, clock());
      if (!meetsTarget(b.hash, guard.effectiveTarget(b.miner, base, now)))
        throw new ConsistencyFault(`block ${b.index} does not meet its proof-of-work target`, b.index);
      guard.record(b.miner, b.timestamp, now);
    }
    difficulty.retargetIfDue(chain, i);
  });
  return { difficulty, guard };
};
