import { EventEmitter } from "node:events";
import { Mutex } from "async-mutex";
import { defaultConfig } from "../config";
import type { ChainConfig } from "../config";
import { accepted, rejected } from "../errors";
import type { Outcome, Rejection } from "../errors";
import { makeLogger } from "../logging";
import type { ILogger } from "../logging";
import { decodeBlock, decodeTransactionRequest } from "../schema";
import type { TransactionRequest } from "../schema";
import { ChainStore, MemoryStore } from "../store/store";
import type { KeyValueStore } from "../store/store";
import type { Address, BlockHash, TxId } from "../types/brands";
import { isValidAddress, readWordlist } from "./address";
import type { Wordlist } from "./address";
import type { DifficultyController } from "./difficulty";
import { feeAtRate, feeSchedule } from "./fee";
import type { FeePolicy, FeeStep } from "./fee";
import type { GuardPenalty } from "./guard";
import { withTxId } from "./hash";
import { Ledger, makeGenesis } from "./ledger";
import { Mempool } from "./mempool";
import type { Block, BlockTemplate, Clock, GuardStatus, Transaction, TxLocation } from "./types";
import { ChainValidator, replayConsensus } from "./validator";

export interface NodeOptions {
  readonly config?: ChainConfig;
  readonly store?: KeyValueStore;
  readonly wordlist?: Wordlist;
  readonly clock?: Clock;
  readonly logger?: ILogger;
}

export interface NodeEvents {
  /** the ledger was extended */
  "block:accepted": { readonly block: Block };
  "block:rejected": { readonly candidate: Block; readonly rejection: Rejection };
  /**
   * transactions left the mempool because a block confirmed them, or
   * because the block left their sender unable to fund them
   */
  "mempool:drained": {
    readonly blockIndex: number;
    readonly txIds: readonly TxId[];
    readonly evicted: readonly TxId[];
  };
  "tx:accepted": { readonly tx: Transaction };
}

export interface FeeEstimate {
  readonly feeRatePermille: number;
  readonly fee: bigint;
  readonly fullness: number;
}

export interface MempoolInfo {
  readonly size: number;
  readonly capacity: number;
  readonly fullness: number;
  readonly feeRatePermille: number;
  readonly totalFees: bigint;
}

export interface NetworkInfo {
  readonly height: number;
  readonly target: bigint;
  readonly averageIntervalMs: number;
  readonly hashrate: bigint;
  readonly blockReward: bigint;
  readonly targetBlockTimeMs: number;
  readonly retargetInterval: number;
  readonly guard: ChainConfig["guard"];
}

/**
 * One node's consensus core: the only owner of its ledger, mempool,
 * difficulty and guard state. Several nodes can live in one process.
 */
export class ChainNode {
  private readonly events = new EventEmitter();
  private readonly locks = { chain: new Mutex(), mempool: new Mutex() };
  private readonly validator: ChainValidator;
  private readonly fees: FeePolicy;
  private nonceCounter = 0n;

  private constructor(
    private readonly cfg: ChainConfig,
    private readonly ledger: Ledger,
    private readonly mempool: Mempool,
    private readonly difficulty: DifficultyController,
    private readonly guard: GuardPenalty,
    private readonly wordlist: Wordlist,
    private readonly clock: Clock,
    private readonly log: ILogger,
  ) {
    this.fees = cfg.fees;
    this.validator = new ChainValidator({
      ledger,
      mempool,
      difficulty,
      guard,
      wordlist,
      clock,
      log,
      locks: this.locks,
      rules: {
        maxBlockTransactions: cfg.chain.maxBlockTransactions,
        maxFutureDriftMs: cfg.chain.maxFutureDriftMs,
        fees: cfg.fees,
      },
      onAccepted: (block, drained, evicted) => {
        this.emit("block:accepted", { block });
        this.emit("mempool:drained", { blockIndex: block.index, txIds: drained, evicted });
      },
    });
  }

  static async open(opts: NodeOptions = {}): Promise<ChainNode> {
    const cfg = opts.config ?? defaultConfig;
    const log = opts.logger ?? makeLogger(cfg.log.level, cfg.log.pretty);
    const clock = opts.clock ?? Date.now;
    const wordlist = opts.wordlist ?? readWordlist();

    const genesis = makeGenesis({ ...cfg.chain, initialTarget: cfg.difficulty.initialTarget });
    const store = new ChainStore(opts.store ?? new MemoryStore());
    const ledger = await Ledger.open(store, genesis, cfg.chain.blockReward, log);
    const { difficulty, guard } = replayConsensus(ledger.blocks, cfg, clock, log);
    const mempool = new Mempool({
      maxSize: cfg.mempool.maxSize,
      policy: cfg.fees,
      tolerancePermille: cfg.fees.tolerancePermille,
      clock,
    });
    return new ChainNode(cfg, ledger, mempool, difficulty, guard, wordlist, clock, log);
  }

  /* ── events ──────────────────────────────────────────────── */
  on<K extends keyof NodeEvents>(event: K, listener: (e: NodeEvents[K]) => void): () => void {
    this.events.on(event, listener);
    return () => this.events.off(event, listener);
  }

  private emit<K extends keyof NodeEvents>(event: K, payload: NodeEvents[K]): void {
    for (const listener of this.events.listeners(event)) {
      try {
        listener(payload);
      } catch (err) {
        this.log.error({ event, err }, "event listener failed");
      }
    }
  }

  /* ── chain queries ───────────────────────────────────────── */
  height(): number {
    return this.ledger.height;
  }

  latestBlock(): Block {
    return this.ledger.latest;
  }

  chain(): readonly Block[] {
    return this.ledger.blocks;
  }

  blockAt(index: number): Block | undefined {
    return this.ledger.blockAt(index);
  }

  blockByHash(hash: BlockHash): Block | undefined {
    return this.ledger.blockByHash(hash);
  }

  recentBlocks(n = 10): Block[] {
    return this.ledger.recentBlocks(n);
  }

  recentTransactions(n = 10): Transaction[] {
    return this.ledger.recentTransactions(n);
  }

  transaction(id: TxId): TxLocation | undefined {
    const pending = this.mempool.get(id);
    if (pending) return { status: "pending", tx: pending.tx, admittedAt: pending.admittedAt };
    const found = this.ledger.findTransaction(id);
    return found && { status: "confirmed", ...found };
  }

  transactionsFor(address: Address): Transaction[] {
    return this.ledger.transactionsFor(address);
  }

  balanceOf(address: Address): bigint {
    return this.ledger.balanceOf(address);
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply();
  }

  estimatedHashrate(): bigint {
    return this.difficulty.estimateHashrate();
  }

  currentTarget(): bigint {
    return this.difficulty.currentTarget();
  }

  guardStatus(address: Address): GuardStatus {
    return this.guard.checkAddress(address, this.clock());
  }

  /** Throws `ConsistencyFault` if the in-memory chain no longer links up. */
  verifyChain(): void {
    this.ledger.verify();
  }

  networkInfo(): NetworkInfo {
    const d = this.difficulty.snapshot();
    return {
      height: this.ledger.height,
      target: d.target,
      averageIntervalMs: d.averageIntervalMs,
      hashrate: this.difficulty.estimateHashrate(),
      blockReward: this.cfg.chain.blockReward,
      targetBlockTimeMs: this.cfg.difficulty.targetBlockTimeMs,
      retargetInterval: this.cfg.difficulty.retargetInterval,
      guard: this.cfg.guard,
    };
  }

  /* ── fees and mempool ────────────────────────────────────── */
  feeEstimate(value: bigint): FeeEstimate {
    const rate = this.mempool.currentFeeRate();
    return {
      feeRatePermille: rate,
      fee: feeAtRate(value, rate),
      fullness: this.mempool.size / this.mempool.capacity,
    };
  }

  feeSchedule(): FeeStep[] {
    return feeSchedule(this.mempool.capacity, this.fees);
  }

  mempoolInfo(): MempoolInfo {
    return {
      size: this.mempool.size,
      capacity: this.mempool.capacity,
      fullness: this.mempool.size / this.mempool.capacity,
      feeRatePermille: this.mempool.currentFeeRate(),
      totalFees: this.mempool.totalFees(),
    };
  }

  pendingTransactions(): Transaction[] {
    return this.mempool.selectForBlock(this.mempool.capacity);
  }

  /**
   * Prices the transfer at the current rate and admits it. The sender must
   * cover it on top of everything it already has pending.
   */
  submitTransaction(req: TransactionRequest): Promise<Outcome<Transaction>> {
    return this.locks.mempool.runExclusive(() => {
      if (!isValidAddress(req.sender, this.wordlist))
        return rejected("invalid-address", `bad sender address ${req.sender}`);
      if (!isValidAddress(req.recipient, this.wordlist))
        return rejected("invalid-address", `bad recipient address ${req.recipient}`);
      if (req.amount < 0n) return rejected("invalid-amount", "amount must not be negative");
      if (req.nonce !== undefined && req.nonce < 0n) return rejected("malformed", "nonce must not be negative");

      const feeRate = this.mempool.currentFeeRate();
      const tx = withTxId({
        sender: req.sender,
        recipient: req.recipient,
        amount: req.amount,
        fee: feeAtRate(req.amount, feeRate),
        feeRate,
        nonce: req.nonce ?? this.nonceCounter++,
        timestamp: this.clock(),
      });
      if (this.ledger.hasTransaction(tx.id)) return rejected("duplicate", `transaction ${tx.id} is already confirmed`);

      const available = this.ledger.balanceOf(tx.sender) - this.mempool.pendingSpend(tx.sender);
      if (available < tx.amount + tx.fee)
        return rejected(
          "insufficient-balance",
          `${tx.sender} can spend ${available > 0n ? available : 0n}, needs ${tx.amount + tx.fee}`,
        );

      const res = this.mempool.admit(tx);
      if (res.status === "rejected") return res;
      this.log.debug({ id: tx.id, fee: tx.fee.toString(), feeRate }, "transaction admitted");
      this.emit("tx:accepted", { tx });
      return accepted(tx);
    });
  }

  submitTransactionPayload(input: unknown): Promise<Outcome<Transaction>> {
    const req = decodeTransactionRequest(input);
    if (req.status === "rejected") return Promise.resolve(req);
    return this.submitTransaction(req.value);
  }

  /* ── blocks ──────────────────────────────────────────────── */
  async submitBlock(candidate: Block): Promise<Outcome<Block>> {
    const res = await this.validator.submitBlock(candidate);
    if (res.status === "rejected") this.emit("block:rejected", { candidate, rejection: res.rejection });
    return res;
  }

  submitBlockPayload(input: unknown): Promise<Outcome<Block>> {
    const block = decodeBlock(input);
    if (block.status === "rejected") return Promise.resolve(block);
    return this.submitBlock(block.value);
  }

  /**
   * Unsolved candidate for `miner`: the top-fee mempool entries the senders
   * can still fund, in that order. The caller searches the nonce.
   */
  blockTemplate(miner: Address): Outcome<BlockTemplate> {
    if (!isValidAddress(miner, this.wordlist)) return rejected("invalid-address", `bad miner address ${miner}`);
    const tip = this.ledger.latest;
    const timestamp = Math.max(this.clock(), tip.timestamp + 1);

    const running = new Map<Address, bigint>();
    const bal = (a: Address) => running.get(a) ?? this.ledger.balanceOf(a);
    const transactions: Transaction[] = [];
    for (const tx of this.mempool.selectForBlock(this.cfg.chain.maxBlockTransactions)) {
      if (this.ledger.hasTransaction(tx.id) || bal(tx.sender) < tx.amount + tx.fee) continue;
      running.set(tx.sender, bal(tx.sender) - tx.amount - tx.fee);
      running.set(tx.recipient, bal(tx.recipient) + tx.amount);
      transactions.push(tx);
    }

    const target = this.difficulty.currentTarget();
    return accepted({
      index: tip.index + 1,
      timestamp,
      previousHash: tip.hash,
      miner,
      nonce: 0n,
      target,
      transactions,
      effectiveTarget: this.guard.effectiveTarget(miner, target, Math.min(timestamp, this.clock())),
    });
  }
}
