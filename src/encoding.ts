/**
 * Field-element encoding primitives for Paradex.
 *
 * - felt parsing (0x-hex or decimal, range-checked against the Stark prime)
 * - 32-byte big-endian words
 * - starknet-keccak (keccak-256 masked to 250 bits)
 * - text to felt (Cairo short strings, keccak for longer text)
 * - decimal strings to chain quantums
 */

import { keccak_256 } from "@noble/hashes/sha3.js";
import { shortString } from "starknet";

// ── Field ───────────────────────────────────────────────────────────

/** The Stark field prime: 2^251 + 17 * 2^192 + 1. */
export const FIELD_PRIME = 2n ** 251n + 17n * 2n ** 192n + 1n;

const MASK_250 = 2n ** 250n - 1n;
const HEX_FELT = /^0x[0-9a-fA-F]+$/;
const DECIMAL_FELT = /^[0-9]+$/;

/**
 * Parse a felt from its `0x`-hex or decimal string form.
 *
 * @returns The value, or `undefined` when the string is not a numeral or
 *   the value does not fit in the field.
 */
export function tryParseFelt(value: string): bigint | undefined {
  if (!HEX_FELT.test(value) && !DECIMAL_FELT.test(value)) return undefined;
  const felt = BigInt(value);
  return felt < FIELD_PRIME ? felt : undefined;
}

const HEX_WORD = /^0x[0-9a-fA-F]{1,64}$/;

/**
 * Parse 0x-hex of at most 64 digits as a felt. Values at or above the prime
 * are reduced modulo it, so any 32-byte word is accepted.
 *
 * @returns The felt, or `undefined` when the string is not such hex.
 */
export function tryParseHexFelt(value: string): bigint | undefined {
  if (!HEX_WORD.test(value)) return undefined;
  return BigInt(value) % FIELD_PRIME;
}

/** Format a felt as 0x-prefixed lowercase hex without leading zeros. */
export function toHex(value: bigint): string {
  return `0x${value.toString(16)}`;
}

/** Encode a non-negative integer below 2^256 as a 32-byte big-endian word. */
export function bigIntToBytes32(value: bigint): Uint8Array {
  const buf = new Uint8Array(32);
  let v = value;
  for (let i = 31; i >= 0; i--) {
    buf[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return buf;
}

/** Interpret bytes as a big-endian unsigned integer. */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  let result = 0n;
  for (const b of bytes) result = (result << 8n) | BigInt(b);
  return result;
}

/** starknet-keccak: keccak-256 of the input, masked to its low 250 bits. */
export function starknetKeccak(data: Uint8Array): bigint {
  return bytesToBigInt(keccak_256(data)) & MASK_250;
}

// ── Text ────────────────────────────────────────────────────────────

/** Whether `text` fits a Cairo short string (ASCII, at most 31 characters). */
export function isShortString(text: string): boolean {
  return shortString.isASCII(text) && shortString.isShortString(text);
}

/**
 * Map protocol text to a felt string suitable for a typed-data message.
 *
 * Numerals that fit in the field pass through unchanged, short ASCII text
 * becomes its Cairo short-string encoding, and anything else is reduced
 * with starknet-keccak of its UTF-8 bytes. Empty text is `"0"`.
 *
 * @example
 * ```ts
 * textToFelt("42");           // "42"
 * textToFelt("LIMIT");        // "0x4c494d4954"
 * ```
 */
export function textToFelt(text: string): string {
  if (text.length === 0) return "0";
  if (tryParseFelt(text) !== undefined) return text;
  if (isShortString(text)) return shortString.encodeShortString(text);
  return toHex(starknetKeccak(new TextEncoder().encode(text)));
}

/**
 * Encode an ASCII identifier (such as a chain id) as a felt.
 *
 * @returns The felt, or `undefined` when the text is not a valid short string.
 */
export function tryShortStringToFelt(text: string): bigint | undefined {
  if (text.length === 0 || !isShortString(text)) return undefined;
  return BigInt(shortString.encodeShortString(text));
}

// ── Decimal Helpers ─────────────────────────────────────────────────

const DECIMAL_STRING = /^[0-9]+(\.[0-9]*)?$/;

/**
 * Precisely scale a decimal string to a chain integer without float intermediaries.
 *
 * Algorithm:
 * 1. Split on `.` to get whole and fractional parts
 * 2. Pad/truncate fractional part to `decimals` digits
 * 3. Concatenate and parse as bigint
 *
 * @example
 * ```ts
 * scaleDecimalString("0.02", 8) // 2000000n
 * scaleDecimalString("100", 8)  // 10000000000n
 * ```
 */
export function scaleDecimalString(value: string, decimals: number): bigint {
  const [whole = "0", frac = ""] = value.split(".");
  const paddedFrac = frac.slice(0, decimals).padEnd(decimals, "0");
  return BigInt((whole || "0") + paddedFrac);
}

/**
 * Convert a decimal amount to its quantum representation, refusing to drop
 * precision.
 *
 * @returns The quantum, or `undefined` if `value` is not a plain decimal or
 *   has more fractional digits than `decimals` allows (trailing zeros aside).
 */
export function tryToQuantum(value: string, decimals: number): bigint | undefined {
  if (!DECIMAL_STRING.test(value)) return undefined;
  const frac = value.split(".")[1] ?? "";
  if (frac.replace(/0+$/, "").length > decimals) return undefined;
  return scaleDecimalString(value, decimals);
}

// ── Utilities ───────────────────────────────────────────────────────

/** Concatenate multiple Uint8Arrays. */
export function concat(arrays: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const a of arrays) total += a.length;
  const result = new Uint8Array(total);
  let offset = 0;
  for (const a of arrays) {
    result.set(a, offset);
    offset += a.length;
  }
  return result;
}

/** Convert bytes to 0x-prefixed hex string. */
export function bytesToHex(bytes: Uint8Array): string {
  let hex = "0x";
  for (let i = 0; i < bytes.length; i++) {
    hex += bytes[i].toString(16).padStart(2, "0");
  }
  return hex;
}

/**
 * Convert an even-length hex string (with or without `0x`) to bytes.
 *
 * @throws {Error} When the input is not hex.
 */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.startsWith("0x") ? hex.slice(2) : hex;
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new Error(`Invalid hex string: ${hex.length} characters`);
  }
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(clean.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
