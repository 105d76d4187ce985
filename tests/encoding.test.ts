import { keccak_256 } from "@noble/hashes/sha3.js";
import { hash, shortString } from "starknet";
import { describe, expect, it } from "vitest";
import {
  bigIntToBytes32,
  bytesToBigInt,
  bytesToHex,
  concat,
  FIELD_PRIME,
  hexToBytes,
  isShortString,
  scaleDecimalString,
  starknetKeccak,
  textToFelt,
  toHex,
  tryParseFelt,
  tryParseHexFelt,
  tryShortStringToFelt,
  tryToQuantum,
} from "../src/encoding.js";

describe("Encoding Module", () => {
  describe("Field", () => {
    it("uses the Stark prime", () => {
      expect(FIELD_PRIME).toBe(BigInt(`0x800000000000011${"0".repeat(47)}1`));
    });

    it("parses hex and decimal felts", () => {
      expect(tryParseFelt("0x1f")).toBe(31n);
      expect(tryParseFelt("0x1F")).toBe(31n);
      expect(tryParseFelt("31")).toBe(31n);
      expect(tryParseFelt("0")).toBe(0n);
    });

    it("rejects non-numerals", () => {
      expect(tryParseFelt("")).toBeUndefined();
      expect(tryParseFelt("0x")).toBeUndefined();
      expect(tryParseFelt("-1")).toBeUndefined();
      expect(tryParseFelt("1.5")).toBeUndefined();
      expect(tryParseFelt("0xzz")).toBeUndefined();
      expect(tryParseFelt("LIMIT")).toBeUndefined();
    });

    it("rejects values outside the field", () => {
      expect(tryParseFelt(toHex(FIELD_PRIME - 1n))).toBe(FIELD_PRIME - 1n);
      expect(tryParseFelt(toHex(FIELD_PRIME))).toBeUndefined();
      expect(tryParseFelt(FIELD_PRIME.toString())).toBeUndefined();
    });

    it("reads 32-byte hex words modulo the prime", () => {
      expect(tryParseHexFelt("0x1f")).toBe(31n);
      expect(tryParseHexFelt(toHex(FIELD_PRIME))).toBe(0n);
      expect(tryParseHexFelt(`0x${"f".repeat(64)}`)).toBe((2n ** 256n - 1n) % FIELD_PRIME);
      expect(tryParseHexFelt(`0x${"f".repeat(65)}`)).toBeUndefined();
      expect(tryParseHexFelt("31")).toBeUndefined();
      expect(tryParseHexFelt("0x")).toBeUndefined();
    });

    it("formats felts as unpadded lowercase hex", () => {
      expect(toHex(0n)).toBe("0x0");
      expect(toHex(255n)).toBe("0xff");
      expect(toHex(0x0abcn)).toBe("0xabc");
    });
  });

  describe("32-byte words", () => {
    it("encodes big-endian", () => {
      const word = bigIntToBytes32(0x0102n);
      expect(word.length).toBe(32);
      expect(word[30]).toBe(0x01);
      expect(word[31]).toBe(0x02);
      expect(bytesToHex(word)).toBe(`0x${"0".repeat(60)}0102`);
    });

    it("reads big-endian", () => {
      expect(bytesToBigInt(new Uint8Array([0x01, 0x00]))).toBe(256n);
      expect(bytesToBigInt(bigIntToBytes32(FIELD_PRIME - 1n))).toBe(FIELD_PRIME - 1n);
    });
  });

  describe("starknetKeccak", () => {
    it("masks keccak-256 to 250 bits", () => {
      const data = new TextEncoder().encode("Paradex");
      const full = bytesToBigInt(keccak_256(data));
      expect(starknetKeccak(data)).toBe(full & (2n ** 250n - 1n));
      expect(starknetKeccak(data) < 2n ** 250n).toBe(true);
    });

    it("matches starknet.js for text input", () => {
      const text = "Auth(felt timestamp,felt expiry)";
      expect(starknetKeccak(new TextEncoder().encode(text))).toBe(hash.starknetKeccak(text));
    });
  });

  describe("Text to felt", () => {
    it("passes numerals through", () => {
      expect(textToFelt("42")).toBe("42");
      expect(textToFelt("0x2a")).toBe("0x2a");
      expect(textToFelt("1681462103821101699438490000")).toBe("1681462103821101699438490000");
    });

    it("encodes short ASCII text as a Cairo short string", () => {
      expect(textToFelt("LIMIT")).toBe("0x4c494d4954");
      expect(textToFelt("BTC-USD-PERP")).toBe("0x4254432d5553442d50455250");
      expect(textToFelt("BTC-USD-PERP")).toBe(shortString.encodeShortString("BTC-USD-PERP"));
    });

    it("hashes text longer than 31 characters", () => {
      const text = "BTC-USD-PERP,ETH-USD-PERP,SOL-USD-PERP";
      expect(textToFelt(text)).toBe(toHex(hash.starknetKeccak(text)));
    });

    it("hashes non-ASCII text", () => {
      expect(textToFelt("café")).toBe(toHex(hash.starknetKeccak("café")));
    });

    it("hashes numerals that do not fit in the field", () => {
      const huge = FIELD_PRIME.toString();
      expect(textToFelt(huge)).toBe(toHex(hash.starknetKeccak(huge)));
    });

    it("maps empty text to zero", () => {
      expect(textToFelt("")).toBe("0");
    });

    it("recognises short strings", () => {
      expect(isShortString("a".repeat(31))).toBe(true);
      expect(isShortString("a".repeat(32))).toBe(false);
      expect(isShortString("é")).toBe(false);
    });
  });

  describe("tryShortStringToFelt", () => {
    it("encodes chain ids", () => {
      expect(tryShortStringToFelt("SN_MAIN")).toBe(0x534e5f4d41494en);
    });

    it("rejects empty, long and non-ASCII identifiers", () => {
      expect(tryShortStringToFelt("")).toBeUndefined();
      expect(tryShortStringToFelt("X".repeat(32))).toBeUndefined();
      expect(tryShortStringToFelt("SN_ÉTÉ")).toBeUndefined();
    });
  });

  describe("Decimal helpers", () => {
    it("scales decimal strings without floats", () => {
      expect(scaleDecimalString("0.02", 8)).toBe(2000000n);
      expect(scaleDecimalString("100", 8)).toBe(10000000000n);
      expect(scaleDecimalString("0.1", 8)).toBe(10000000n);
    });

    it("converts amounts to quantums", () => {
      expect(tryToQuantum("1.5", 8)).toBe(150000000n);
      expect(tryToQuantum("0.00000001", 8)).toBe(1n);
      expect(tryToQuantum("50000", 8)).toBe(5000000000000n);
      expect(tryToQuantum("5.", 8)).toBe(500000000n);
    });

    it("allows trailing zeros beyond the precision", () => {
      expect(tryToQuantum("1.100000000", 8)).toBe(110000000n);
    });

    it("refuses to drop precision", () => {
      expect(tryToQuantum("1.000000001", 8)).toBeUndefined();
      expect(tryToQuantum("0.15", 1)).toBeUndefined();
    });

    it("rejects malformed amounts", () => {
      expect(tryToQuantum("", 8)).toBeUndefined();
      expect(tryToQuantum("-1", 8)).toBeUndefined();
      expect(tryToQuantum(".5", 8)).toBeUndefined();
      expect(tryToQuantum("1e5", 8)).toBeUndefined();
      expect(tryToQuantum("abc", 8)).toBeUndefined();
    });
  });

  describe("hexToBytes / bytesToHex", () => {
    it("round-trips with and without prefix", () => {
      expect(bytesToHex(hexToBytes("0xdeadbeef"))).toBe("0xdeadbeef");
      expect(bytesToHex(hexToBytes("DEADBEEF"))).toBe("0xdeadbeef");
    });

    it("rejects odd-length and non-hex input", () => {
      expect(() => hexToBytes("0xabc")).toThrow("Invalid hex string");
      expect(() => hexToBytes("0xgg")).toThrow("Invalid hex string");
    });

    it("concatenates byte arrays", () => {
      const joined = concat([new Uint8Array([1, 2]), new Uint8Array([]), new Uint8Array([3])]);
      expect(Array.from(joined)).toEqual([1, 2, 3]);
    });
  });
});
