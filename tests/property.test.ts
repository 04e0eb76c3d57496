import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { computeFee, feeAtRate } from "../src/core/fee";
import { computeTxId, meetsTarget, rehashBlock, sealBlock, withTxId, ZERO_HASH } from "../src/core/hash";
import { asBlockHash } from "../src/types/brands";
import { ALICE, BOB, CAROL } from "./helpers/chain";

const address = fc.constantFrom(ALICE, BOB, CAROL);

const transaction = fc
  .record({
    sender: address,
    recipient: address,
    amount: fc.bigInt({ min: 0n, max: 10n ** 18n }),
    feeRate: fc.integer({ min: 10, max: 50 }),
    nonce: fc.bigInt({ min: 0n, max: 2n ** 64n }),
    timestamp: fc.integer({ min: 0, max: 2 ** 42 }),
  })
  .map((t) => withTxId({ ...t, fee: feeAtRate(t.amount, t.feeRate) }));

const header = fc.record({
  index: fc.integer({ min: 0, max: 1_000_000 }),
  timestamp: fc.integer({ min: 0, max: 2 ** 42 }),
  previousHash: fc.constant(ZERO_HASH),
  miner: address,
  target: fc.bigInt({ min: 1n, max: 2n ** 256n }),
});

describe("Property-based tests", () => {
  describe("Fee engine", () => {
    it("should never charge less as the mempool fills", () => {
      fc.assert(
        fc.property(
          fc.bigInt({ min: 0n, max: 10n ** 18n }),
          fc.integer({ min: 1, max: 100_000 }),
          fc.integer({ min: 0, max: 100_000 }),
          fc.integer({ min: 0, max: 100_000 }),
          (value, capacity, a, b) => {
            const [lo, hi] = a <= b ? [a, b] : [b, a];
            return computeFee(value, { size: lo, capacity }) <= computeFee(value, { size: hi, capacity });
          },
        ),
      );
    });

    it("should stay between the base and maximum rates", () => {
      fc.assert(
        fc.property(
          fc.bigInt({ min: 0n, max: 10n ** 18n }),
          fc.integer({ min: 1, max: 100_000 }),
          fc.integer({ min: 0, max: 100_000 }),
          (value, capacity, size) => {
            const fee = computeFee(value, { size, capacity });
            return fee >= feeAtRate(value, 10) && fee <= feeAtRate(value, 50);
          },
        ),
      );
    });
  });

  describe("Hashing", () => {
    it("should reproduce a sealed block's hash from its contents", () => {
      fc.assert(
        fc.property(header, fc.array(transaction, { maxLength: 5 }), fc.bigInt({ min: 0n, max: 2n ** 64n }), (h, txs, nonce) => {
          const block = sealBlock(h, txs, nonce);
          return rehashBlock(block) === block.hash && rehashBlock({ ...block }) === block.hash;
        }),
      );
    });

    it("should change the block hash when the nonce changes", () => {
      fc.assert(
        fc.property(header, fc.bigInt({ min: 0n, max: 2n ** 64n }), (h, nonce) => {
          return sealBlock(h, [], nonce).hash !== sealBlock(h, [], nonce + 1n).hash;
        }),
      );
    });

    it("should commit the transaction id to every body field", () => {
      fc.assert(
        fc.property(transaction, (tx) => {
          const { id: _id, ...body } = tx;
          return (
            computeTxId(body) === tx.id &&
            computeTxId({ ...body, amount: body.amount + 1n }) !== tx.id &&
            computeTxId({ ...body, nonce: body.nonce + 1n }) !== tx.id &&
            computeTxId({ ...body, timestamp: body.timestamp + 1 }) !== tx.id
          );
        }),
      );
    });
  });

  it("should compare hashes against the target strictly", () => {
    const h = asBlockHash(`0x${"00".repeat(31)}ff`);
    expect(meetsTarget(h, 255n)).toBe(false);
    expect(meetsTarget(h, 256n)).toBe(true);
    expect(meetsTarget(ZERO_HASH, 1n)).toBe(true);
    expect(ZERO_HASH).toHaveLength(66);
  });
});
