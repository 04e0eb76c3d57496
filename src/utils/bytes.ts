import { bytesToHex as toHex, hexToBytes as fromHex } from "@noble/hashes/utils";
import type { Hex } from "../types/brands";

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${toHex(bytes)}`;

export const hexToBytes = (h: Hex): Uint8Array => fromHex(h.slice(2));

/** Big-endian unsigned integer from bytes; empty input is zero. */
export const bytesToBigInt = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt(bytesToHex(b));
