import { decAmount, decBlock, encAmount, encBlock } from "../codec/rlp";
import type { Block } from "../core/types";
import type { Address } from "../types/brands";

/** Injected persistence. Any engine with ordered puts will do. */
export interface KeyValueStore {
  get(key: string): Promise<Uint8Array | undefined>;
  /** Applies all entries or none. */
  putMany(entries: ReadonlyArray<readonly [string, Uint8Array]>): Promise<void>;
}

export class MemoryStore implements KeyValueStore {
  private readonly data = new Map<string, Uint8Array>();

  async get(key: string): Promise<Uint8Array | undefined> {
    const v = this.data.get(key);
    return v && v.slice();
  }

  async putMany(entries: ReadonlyArray<readonly [string, Uint8Array]>): Promise<void> {
    for (const [k, v] of entries) this.data.set(k, v.slice());
  }

  keys(): string[] {
    return [...this.data.keys()];
  }
}

const blockKey = (index: number) => `block:${index}`;
const balanceKey = (address: Address) => `balance:${address}`;
const HEIGHT_KEY = "meta:height";

/**
 * Block records by index and derived balances by address, RLP-encoded.
 * `meta:height` holds the number of stored blocks.
 */
export class ChainStore {
  constructor(private readonly kv: KeyValueStore) {}

  async count(): Promise<number> {
    const raw = await this.kv.get(HEIGHT_KEY);
    return raw ? Number(decAmount(raw)) : 0;
  }

  async getBlock(index: number): Promise<Block | undefined> {
    const raw = await this.kv.get(blockKey(index));
    return raw && decBlock(raw);
  }

  async getBalance(address: Address): Promise<bigint | undefined> {
    const raw = await this.kv.get(balanceKey(address));
    return raw && decAmount(raw);
  }

  /** Block, the balances it changed and the new count in one write. */
  async append(block: Block, balances: ReadonlyMap<Address, bigint>): Promise<void> {
    const entries: [string, Uint8Array][] = [[blockKey(block.index), encBlock(block)]];
    for (const [addr, amount] of balances) entries.push([balanceKey(addr), encAmount(amount)]);
    entries.push([HEIGHT_KEY, encAmount(BigInt(block.index + 1))]);
    await this.kv.putMany(entries);
  }
}
