import { describe, it, expect } from "vitest";
import { encode } from "@ethereumjs/rlp";
import { CodecError, decAmount, decBlock, decTx, encAmount, encBlock, encTx } from "../src/codec/rlp";
import { sealBlock, ZERO_HASH } from "../src/core/hash";
import { ALICE, BOB, CAROL } from "./helpers/chain";
import { createTransfer } from "./helpers/tx";

describe("RLP codec", () => {
  const txs = [
    createTransfer(ALICE, BOB, 123_456_789n, { nonce: 7n }),
    createTransfer(BOB, CAROL, 0n, { feeRate: 50, nonce: 2n ** 70n }),
  ];
  const block = sealBlock(
    { index: 42, timestamp: 1_704_067_200_000, previousHash: ZERO_HASH, miner: CAROL, target: 2n ** 240n },
    txs,
    99n,
  );

  it("should restore a stored block exactly", () => {
    expect(decBlock(encBlock(block))).toEqual(block);
  });

  it("should restore a transaction exactly", () => {
    expect(decTx(encTx(txs[1]))).toEqual(txs[1]);
  });

  it("should store amounts as big-endian integers", () => {
    expect(decAmount(encAmount(0n))).toBe(0n);
    expect(decAmount(encAmount(8_000_000_000n))).toBe(8_000_000_000n);
  });

  it("should refuse records of the wrong shape", () => {
    expect(() => decBlock(encode([1, 2]))).toThrow(CodecError);
    expect(() => decBlock(encode(5))).toThrow("expected list");
    expect(() => decAmount(encode([1]))).toThrow(CodecError);
  });
});
