import * as v from "valibot";
import type { Block, Transaction } from "./core/types";
import { accepted, rejected } from "./errors";
import type { Outcome } from "./errors";
import { asAddress, asBlockHash, asTxId } from "./types/brands";

/* =========================================================================
   PRIMITIVES (wire form: JSON, bigints as decimal or 0x strings)
   ========================================================================= */
const uint = v.union([
  v.pipe(v.bigint(), v.minValue(0n)),
  v.pipe(v.number(), v.safeInteger(), v.minValue(0), v.transform<number, bigint>(BigInt)),
  v.pipe(v.string(), v.regex(/^(\d+|0x[0-9a-fA-F]+)$/, "expected an unsigned integer"), v.transform<string, bigint>(BigInt)),
]);

const safeUint = v.pipe(v.number(), v.safeInteger(), v.minValue(0));

const hash32 = v.pipe(
  v.string(),
  v.regex(/^0x[0-9a-f]{64}$/, "expected 0x followed by 64 lowercase hex digits"),
  v.transform((s): `0x${string}` => `0x${s.slice(2)}`),
);

const address = v.pipe(v.string(), v.minLength(1), v.maxLength(128), v.transform(asAddress));

/* =========================================================================
   TRANSACTIONS
   ========================================================================= */
export const transactionRequestSchema = v.object({
  sender: address,
  recipient: address,
  amount: uint,
  nonce: v.optional(uint),
});

export type TransactionRequest = v.InferOutput<typeof transactionRequestSchema>;

export const transactionSchema = v.object({
  id: v.pipe(hash32, v.transform(asTxId)),
  sender: address,
  recipient: address,
  amount: uint,
  fee: uint,
  feeRate: safeUint,
  nonce: uint,
  timestamp: safeUint,
});

/* =========================================================================
   BLOCKS
   ========================================================================= */
export const blockSchema = v.object({
  index: safeUint,
  timestamp: safeUint,
  previousHash: v.pipe(hash32, v.transform(asBlockHash)),
  transactions: v.pipe(v.array(transactionSchema), v.maxLength(65_536)),
  miner: address,
  nonce: uint,
  target: uint,
  hash: v.pipe(hash32, v.transform(asBlockHash)),
});

export const describeIssues = (issues: readonly v.BaseIssue<unknown>[]): string =>
  issues
    .map((i) => {
      const path = i.path?.map((p) => String(p.key)).join(".");
      return path ? `${path}: ${i.message}` : i.message;
    })
    .join("; ");

export const decodeTransactionRequest = (input: unknown): Outcome<TransactionRequest> => {
  const res = v.safeParse(transactionRequestSchema, input);
  return res.success ? accepted(res.output) : rejected("malformed", describeIssues(res.issues));
};

export const decodeBlock = (input: unknown): Outcome<Block> => {
  const res = v.safeParse(blockSchema, input);
  return res.success ? accepted(res.output) : rejected("malformed", describeIssues(res.issues));
};

/* =========================================================================
   ENCODERS (what the transport layer sends back out)
   ========================================================================= */
export const transactionToWire = (t: Transaction) => ({
  id: t.id,
  sender: t.sender,
  recipient: t.recipient,
  amount: t.amount.toString(),
  fee: t.fee.toString(),
  feeRate: t.feeRate,
  nonce: t.nonce.toString(),
  timestamp: t.timestamp,
});

export const blockToWire = (b: Block) => ({
  index: b.index,
  timestamp: b.timestamp,
  previousHash: b.previousHash,
  transactions: b.transactions.map(transactionToWire),
  miner: b.miner,
  nonce: b.nonce.toString(),
  target: `0x${b.target.toString(16)}`,
  hash: b.hash,
});
