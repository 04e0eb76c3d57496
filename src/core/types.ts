import type { Address, BlockHash, TxId } from "../types/brands";

export type Big = bigint;
export type Millis = number;

/* ── value transfer ──────────────────────────────────────── */
export interface Transaction {
  readonly id: TxId;
  readonly sender: Address;
  readonly recipient: Address;
  readonly amount: Big; // smallest unit
  readonly fee: Big;
  readonly feeRate: number; // per mille, 10 = 1.0%
  readonly nonce: Big;
  readonly timestamp: Millis;
}

/** Fields a transaction id commits to. */
export type TransactionBody = Omit<Transaction, "id">;

/* ── blocks ──────────────────────────────────────────────── */
export interface BlockHeader {
  readonly index: number;
  readonly timestamp: Millis;
  readonly previousHash: BlockHash;
  readonly miner: Address;
  readonly nonce: Big;
  readonly target: Big; // base target in force when mined
}

export interface Block extends BlockHeader {
  readonly transactions: readonly Transaction[];
  readonly hash: BlockHash;
}

/** Unsolved block handed to an external miner. */
export interface BlockTemplate extends BlockHeader {
  readonly transactions: readonly Transaction[];
  readonly effectiveTarget: Big;
}

/* ── mempool ─────────────────────────────────────────────── */
export interface MempoolEntry {
  readonly tx: Transaction;
  readonly admittedAt: Millis;
  readonly sequence: number;
}

export interface Fullness {
  readonly size: number;
  readonly capacity: number;
}

/* ── difficulty / guard state ────────────────────────────── */
export interface DifficultyState {
  readonly target: Big;
  readonly lastRetargetIndex: number;
  readonly averageIntervalMs: number;
}

export interface GuardStatus {
  readonly isPenalized: boolean;
  readonly multiplier: number;
  readonly blocksInWindow: number;
  readonly threshold: number;
}

/* ── ledger lookups ──────────────────────────────────────── */
export type TxLocation =
  | { readonly status: "pending"; readonly tx: Transaction; readonly admittedAt: Millis }
  | {
      readonly status: "confirmed";
      readonly tx: Transaction;
      readonly blockIndex: number;
      readonly position: number;
    };

export type Clock = () => Millis;
