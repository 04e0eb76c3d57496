import { sha256 } from "@noble/hashes/sha256";
import { encBlockForHashing, encTxBody } from "../codec/rlp";
import { asBlockHash, asTxId } from "../types/brands";
import type { BlockHash, TxId } from "../types/brands";
import { bytesToHex } from "../utils/bytes";
import type { Block, BlockHeader, Transaction, TransactionBody } from "./types";

export const ZERO_HASH: BlockHash = asBlockHash(`0x${"00".repeat(32)}`);

/** 2^256: a target at this value accepts every hash. */
export const HASH_SPACE = 1n << 256n;

/* ── transaction id ──────────────────────────────────────── */
export const computeTxId = (body: TransactionBody): TxId =>
  asTxId(bytesToHex(sha256(encTxBody(body))));

export const withTxId = (body: TransactionBody): Transaction => ({
  ...body,
  id: computeTxId(body),
});

/* ── block hash ──────────────────────────────────────────── */
export const computeBlockHash = (
  header: BlockHeader,
  txs: readonly Pick<Transaction, "id">[],
): BlockHash =>
  asBlockHash(bytesToHex(sha256(encBlockForHashing(header, txs.map((t) => t.id)))));

export const rehashBlock = (b: Block): BlockHash => computeBlockHash(b, b.transactions);

/* ── proof of work ───────────────────────────────────────── */
export const hashToBigInt = (h: BlockHash): bigint => BigInt(h);

export const meetsTarget = (h: BlockHash, target: bigint): boolean => hashToBigInt(h) < target;

/** Expected number of hash attempts to find a block under `target`. */
export const expectedWork = (target: bigint): bigint =>
  target <= 0n ? HASH_SPACE : HASH_SPACE / target;

/** Attach a nonce to an unsolved header and compute the resulting hash. */
export const sealBlock = (
  header: Omit<BlockHeader, "nonce">,
  txs: readonly Transaction[],
  nonce: bigint,
): Block => {
  const h: BlockHeader = {
    index: header.index,
    timestamp: header.timestamp,
    previousHash: header.previousHash,
    miner: header.miner,
    nonce,
    target: header.target,
  };
  return { ...h, transactions: txs, hash: computeBlockHash(h, txs) };
};
