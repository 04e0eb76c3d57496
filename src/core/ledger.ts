import { ConsistencyFault } from "../errors";
import type { ILogger } from "../logging";
import type { ChainStore } from "../store/store";
import type { Address, BlockHash, TxId } from "../types/brands";
import { asAddress } from "../types/brands";
import { computeBlockHash, computeTxId, rehashBlock, ZERO_HASH } from "./hash";
import type { Block, Transaction } from "./types";

export interface GenesisParams {
  readonly genesisTimestamp: number;
  readonly genesisMiner: string;
  readonly initialTarget: bigint;
}

export const makeGenesis = (p: GenesisParams): Block => {
  const header = {
    index: 0,
    timestamp: p.genesisTimestamp,
    previousHash: ZERO_HASH,
    miner: asAddress(p.genesisMiner),
    nonce: 0n,
    target: p.initialTarget,
  };
  return { ...header, transactions: [], hash: computeBlockHash(header, []) };
};

/* ── balance settlement ──────────────────────────────────── */
export type Settlement =
  | { readonly ok: true; readonly balances: ReadonlyMap<Address, bigint>; readonly fees: bigint }
  | { readonly ok: false; readonly tx: Transaction; readonly available: bigint; readonly cost: bigint };

/**
 * Applies a block to the balances in order: each sender must cover
 * amount + fee at its turn; the miner gets `reward` + fees last.
 * Returns only the balances that changed.
 */
export const settleBlock = (
  block: Pick<Block, "index" | "miner" | "transactions">,
  balanceOf: (a: Address) => bigint,
  reward: bigint,
): Settlement => {
  const next = new Map<Address, bigint>();
  const bal = (a: Address) => next.get(a) ?? balanceOf(a);
  let fees = 0n;
  for (const tx of block.transactions) {
    const cost = tx.amount + tx.fee;
    const available = bal(tx.sender);
    if (available < cost) return { ok: false, tx, available, cost };
    next.set(tx.sender, available - cost);
    next.set(tx.recipient, bal(tx.recipient) + tx.amount);
    fees += tx.fee;
  }
  if (block.index > 0) next.set(block.miner, bal(block.miner) + reward + fees);
  return { ok: true, balances: next, fees };
};

interface TxPointer {
  readonly blockIndex: number;
  readonly position: number;
}

/**
 * The append-only block sequence plus the state derived from it. The ledger
 * is the only owner of its blocks; nothing else mutates them.
 */
export class Ledger {
  private readonly chain: Block[] = [];
  private readonly balances = new Map<Address, bigint>();
  private readonly byHash = new Map<BlockHash, number>();
  private readonly byTxId = new Map<TxId, TxPointer>();
  private readonly byAddress = new Map<Address, TxId[]>();
  private supply = 0n;

  private constructor(
    private readonly store: ChainStore,
    private readonly reward: bigint,
  ) {}

  /**
   * Loads and re-verifies the stored chain. Stored balances must match a
   * full replay; anything else is a fault, never repaired here.
   */
  static async open(
    store: ChainStore,
    genesis: Block,
    reward: bigint,
    log?: ILogger,
  ): Promise<Ledger> {
    const ledger = new Ledger(store, reward);
    const count = await store.count();

    if (count === 0) {
      await store.append(genesis, new Map());
      ledger.index(genesis, new Map());
      log?.info({ hash: genesis.hash }, "genesis written");
      return ledger;
    }

    for (let i = 0; i < count; i++) {
      let block: Block | undefined;
      try {
        block = await store.getBlock(i);
      } catch (err) {
        throw new ConsistencyFault(`block ${i} is unreadable: ${String(err)}`, i);
      }
      if (!block) throw new ConsistencyFault(`block ${i} missing from store`, i);
      if (i === 0 && block.hash !== genesis.hash)
        throw new ConsistencyFault(`stored genesis ${block.hash} does not match ${genesis.hash}`, 0);
      ledger.checkLink(block, i === 0 ? undefined : ledger.chain[i - 1]);

      const settled = settleBlock(block, (a) => ledger.balanceOf(a), reward);
      if (!settled.ok)
        throw new ConsistencyFault(
          `block ${i}: ${settled.tx.sender} cannot cover ${settled.cost} (has ${settled.available})`,
          i,
        );
      ledger.index(block, settled.balances);
    }

    for (const [addr, amount] of ledger.balances) {
      const stored = (await store.getBalance(addr)) ?? 0n;
      if (stored !== amount)
        throw new ConsistencyFault(`stored balance of ${addr} is ${stored}, replay gives ${amount}`);
    }
    log?.info({ height: ledger.height }, "chain loaded");
    return ledger;
  }

  private checkLink(block: Block, prev: Block | undefined): void {
    const i = prev ? prev.index + 1 : 0;
    if (block.index !== i) throw new ConsistencyFault(`block at position ${i} has index ${block.index}`, i);
    if (prev && block.previousHash !== prev.hash)
      throw new ConsistencyFault(`block ${i} does not link to block ${prev.index}`, i);
    if (rehashBlock(block) !== block.hash)
      throw new ConsistencyFault(`block ${i} hash does not match its contents`, i);
    for (const tx of block.transactions)
      if (computeTxId(tx) !== tx.id) throw new ConsistencyFault(`block ${i}: transaction ${tx.id} id mismatch`, i);
  }

  private index(block: Block, changed: ReadonlyMap<Address, bigint>): void {
    this.chain.push(block);
    this.byHash.set(block.hash, block.index);
    block.transactions.forEach((tx, position) => {
      this.byTxId.set(tx.id, { blockIndex: block.index, position });
      for (const a of new Set([tx.sender, tx.recipient])) {
        const ids = this.byAddress.get(a) ?? [];
        ids.push(tx.id);
        this.byAddress.set(a, ids);
      }
    });
    for (const [addr, amount] of changed) this.balances.set(addr, amount);
    if (block.index > 0) this.supply += this.reward;
  }

  /** Persists first; memory only changes once the store write succeeded. */
  async append(block: Block, changed: ReadonlyMap<Address, bigint>): Promise<void> {
    if (block.index !== this.latest.index + 1 || block.previousHash !== this.latest.hash)
      throw new ConsistencyFault(`append of block ${block.index} does not extend ${this.latest.index}`, block.index);
    await this.store.append(block, changed);
    this.index(block, changed);
  }

  /* ── queries ─────────────────────────────────────────────── */
  get latest(): Block {
    return this.chain[this.chain.length - 1];
  }

  get height(): number {
    return this.latest.index;
  }

  get blocks(): readonly Block[] {
    return this.chain;
  }

  get blockReward(): bigint {
    return this.reward;
  }

  blockAt(index: number): Block | undefined {
    return this.chain[index];
  }

  blockByHash(hash: BlockHash): Block | undefined {
    const i = this.byHash.get(hash);
    return i === undefined ? undefined : this.chain[i];
  }

  hasTransaction(id: TxId): boolean {
    return this.byTxId.has(id);
  }

  findTransaction(id: TxId): { tx: Transaction; blockIndex: number; position: number } | undefined {
    const ptr = this.byTxId.get(id);
    if (!ptr) return undefined;
    return { tx: this.chain[ptr.blockIndex].transactions[ptr.position], ...ptr };
  }

  transactionsFor(address: Address): Transaction[] {
    return (this.byAddress.get(address) ?? []).flatMap((id) => {
      const found = this.findTransaction(id);
      return found ? [found.tx] : [];
    });
  }

  balanceOf(address: Address): bigint {
    return this.balances.get(address) ?? 0n;
  }

  /** Everything ever minted; fees only move existing coins. */
  totalSupply(): bigint {
    return this.supply;
  }

  recentBlocks(n: number): Block[] {
    return this.chain.slice(Math.max(this.chain.length - n, 0)).reverse();
  }

  recentTransactions(n: number): Transaction[] {
    const out: Transaction[] = [];
    for (let i = this.chain.length - 1; i >= 0 && out.length < n; i--) {
      const txs = this.chain[i].transactions;
      for (let j = txs.length - 1; j >= 0 && out.length < n; j--) out.push(txs[j]);
    }
    return out;
  }

  /** Re-walks the hash chain; throws `ConsistencyFault` on the first break. */
  verify(): void {
    this.chain.forEach((b, i) => this.checkLink(b, i === 0 ? undefined : this.chain[i - 1]));
  }
}
