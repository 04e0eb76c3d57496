import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { ConfigError } from "../errors";
import { asAddress } from "../types/brands";
import type { Address } from "../types/brands";

export const ADDRESS_PREFIX = "ZED";
export const MIN_WORDLIST_SIZE = 2048;

export const DEFAULT_WORDLIST_PATH = fileURLToPath(new URL("../../data/words.txt", import.meta.url));

/** Read-only word set used by the address checksum rules. */
export class Wordlist {
  private readonly index: ReadonlySet<string>;

  constructor(readonly words: readonly string[]) {
    if (words.length < MIN_WORDLIST_SIZE)
      throw new ConfigError(`wordlist needs ${MIN_WORDLIST_SIZE} entries, got ${words.length}`);
    const index = new Set(words);
    if (index.size !== words.length) throw new ConfigError("wordlist contains duplicates");
    for (const w of words)
      if (!/^[a-z]+$/.test(w)) throw new ConfigError(`wordlist entry "${w}" is not lowercase a-z`);
    this.index = index;
  }

  has(word: string): boolean {
    return this.index.has(word);
  }

  at(i: number): string {
    return this.words[((i % this.words.length) + this.words.length) % this.words.length];
  }

  get size(): number {
    return this.words.length;
  }
}

export const readWordlist = (file: string = DEFAULT_WORDLIST_PATH): Wordlist =>
  new Wordlist(
    readFileSync(file, "utf8")
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter((l) => l.length > 0),
  );

export const phraseChecksum = (phrase: string): string =>
  bytesToHex(sha256(utf8ToBytes(phrase))).slice(0, 4);

/** `ZED-w1-w2-w3-w4-cccc` for four words already in the list. */
export const formatAddress = (words: readonly [string, string, string, string]): Address => {
  const phrase = words.join("-");
  return asAddress(`${ADDRESS_PREFIX}-${phrase}-${phraseChecksum(phrase)}`);
};

export type AddressProblem = "prefix" | "shape" | "word" | "checksum";

export const addressProblem = (candidate: string, wordlist: Wordlist): AddressProblem | undefined => {
  const parts = candidate.split("-");
  if (parts[0] !== ADDRESS_PREFIX) return "prefix";
  if (parts.length !== 6) return "shape";
  const words = parts.slice(1, 5);
  if (!words.every((w) => wordlist.has(w))) return "word";
  if (parts[5] !== phraseChecksum(words.join("-"))) return "checksum";
  return undefined;
};

export const isValidAddress = (candidate: string, wordlist: Wordlist): candidate is Address =>
  addressProblem(candidate, wordlist) === undefined;
