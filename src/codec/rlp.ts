// Canonical RLP encodings for hashing and storage.

import { decode as rlpDecode, encode as rlpEncode } from "@ethereumjs/rlp";
import type { Input, NestedUint8Array } from "@ethereumjs/rlp";
import { utf8ToBytes } from "@noble/hashes/utils";
import type { Block, BlockHeader, Transaction, TransactionBody } from "../core/types";
import { asAddress, asBlockHash, asTxId } from "../types/brands";
import type { BlockHash, TxId } from "../types/brands";
import { bytesToBigInt, bytesToHex, hexToBytes } from "../utils/bytes";

export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CodecError";
  }
}

/* ── helpers ── */
const bytes = (x: Uint8Array | NestedUint8Array, what: string): Uint8Array => {
  if (x instanceof Uint8Array) return x;
  throw new CodecError(`${what}: expected bytes, got list`);
};

const list = (x: Uint8Array | NestedUint8Array, len: number, what: string): NestedUint8Array => {
  if (x instanceof Uint8Array) throw new CodecError(`${what}: expected list, got bytes`);
  if (len >= 0 && x.length !== len)
    throw new CodecError(`${what}: expected ${len} fields, got ${x.length}`);
  return x;
};

const text = (x: Uint8Array | NestedUint8Array, what: string): string =>
  new TextDecoder("utf-8", { fatal: true }).decode(bytes(x, what));

const int = (x: Uint8Array | NestedUint8Array, what: string): number => {
  const n = bytesToBigInt(bytes(x, what));
  if (n > BigInt(Number.MAX_SAFE_INTEGER)) throw new CodecError(`${what}: integer overflow`);
  return Number(n);
};

const big = (x: Uint8Array | NestedUint8Array, what: string): bigint => bytesToBigInt(bytes(x, what));

const hash32 = (x: Uint8Array | NestedUint8Array, what: string): `0x${string}` => {
  const b = bytes(x, what);
  if (b.length !== 32) throw new CodecError(`${what}: expected 32 bytes, got ${b.length}`);
  return bytesToHex(b);
};

/* ── Transaction ── */
const txBodyFields = (t: TransactionBody): Input[] => [
  utf8ToBytes(t.sender),
  utf8ToBytes(t.recipient),
  t.amount,
  t.fee,
  t.feeRate,
  t.nonce,
  t.timestamp,
];

export const encTxBody = (t: TransactionBody): Uint8Array => rlpEncode(txBodyFields(t));

const txFields = (t: Transaction): Input => [hexToBytes(t.id), ...txBodyFields(t)];

const decTxFields = (x: Uint8Array | NestedUint8Array): Transaction => {
  const [id, sender, recipient, amount, fee, feeRate, nonce, timestamp] = list(x, 8, "tx");
  return {
    id: asTxId(hash32(id, "tx.id")),
    sender: asAddress(text(sender, "tx.sender")),
    recipient: asAddress(text(recipient, "tx.recipient")),
    amount: big(amount, "tx.amount"),
    fee: big(fee, "tx.fee"),
    feeRate: int(feeRate, "tx.feeRate"),
    nonce: big(nonce, "tx.nonce"),
    timestamp: int(timestamp, "tx.timestamp"),
  };
};

export const encTx = (t: Transaction): Uint8Array => rlpEncode(txFields(t));
export const decTx = (b: Uint8Array): Transaction => decTxFields(rlpDecode(b));

/* ── Block header (what the block hash commits to) ── */
export const encBlockForHashing = (h: BlockHeader, txIds: readonly TxId[]): Uint8Array =>
  rlpEncode([
    h.index,
    h.timestamp,
    hexToBytes(h.previousHash),
    txIds.map(hexToBytes),
    utf8ToBytes(h.miner),
    h.nonce,
    h.target,
  ]);

/* ── Block (storage form) ── */
export const encBlock = (b: Block): Uint8Array =>
  rlpEncode([
    b.index,
    b.timestamp,
    hexToBytes(b.previousHash),
    b.transactions.map(txFields),
    utf8ToBytes(b.miner),
    b.nonce,
    b.target,
    hexToBytes(b.hash),
  ]);

export const decBlock = (raw: Uint8Array): Block => {
  const [index, timestamp, prev, txs, miner, nonce, target, hash] = list(rlpDecode(raw), 8, "block");
  const previousHash: BlockHash = asBlockHash(hash32(prev, "block.previousHash"));
  return {
    index: int(index, "block.index"),
    timestamp: int(timestamp, "block.timestamp"),
    previousHash,
    transactions: list(txs, -1, "block.transactions").map(decTxFields),
    miner: asAddress(text(miner, "block.miner")),
    nonce: big(nonce, "block.nonce"),
    target: big(target, "block.target"),
    hash: asBlockHash(hash32(hash, "block.hash")),
  };
};

/* ── balances ── */
export const encAmount = (n: bigint): Uint8Array => rlpEncode(n);
export const decAmount = (b: Uint8Array): bigint => big(rlpDecode(b), "amount");
