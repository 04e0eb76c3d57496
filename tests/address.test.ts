import { describe, it, expect } from "vitest";
import { addressProblem, formatAddress, isValidAddress, Wordlist } from "../src/core/address";
import { ConfigError } from "../src/errors";
import { ALICE, wordlist } from "./helpers/chain";

describe("Addresses", () => {
  it("should load the bundled word list", () => {
    expect(wordlist.size).toBe(2048);
    expect(wordlist.at(0)).toBe("babil");
    expect(wordlist.at(2048)).toBe("babil");
  });

  it("should append a four-hex-digit checksum of the phrase", () => {
    expect(formatAddress(["baful", "bagin", "bahal", "bahon"])).toBe("ZED-baful-bagin-bahal-bahon-d4cf");
    expect(ALICE).toBe("ZED-baful-bagin-bahal-bahon-d4cf");
    expect(isValidAddress(ALICE, wordlist)).toBe(true);
  });

  it("should name what is wrong with a bad address", () => {
    expect(addressProblem("ZOD-baful-bagin-bahal-bahon-d4cf", wordlist)).toBe("prefix");
    expect(addressProblem("ZED-baful-bagin-bahal-d4cf", wordlist)).toBe("shape");
    expect(addressProblem("ZED-baful-bagin-bahal-zzzzz-d4cf", wordlist)).toBe("word");
    expect(addressProblem("ZED-baful-bagin-bahal-bahon-d4ce", wordlist)).toBe("checksum");
    expect(addressProblem("ZED-GENESIS", wordlist)).toBe("shape");
    expect(isValidAddress("", wordlist)).toBe(false);
  });

  it("should refuse word lists that are too small or repeat words", () => {
    expect(() => new Wordlist(["abc"])).toThrow(ConfigError);
    const words = [...wordlist.words];
    words[1] = words[0];
    expect(() => new Wordlist(words)).toThrow("duplicates");
    words[1] = "Upper";
    expect(() => new Wordlist(words)).toThrow(ConfigError);
  });
});
