/**
 * Cryptographic operations for Paradex.
 *
 * Two curves are involved:
 *
 * - **secp256k1 (L1)**: Ethereum wallets and `personal_sign`, used once to
 *   derive the Stark key from an Ethereum credential
 * - **Stark curve (L2)**: the account key pair; every typed-data hash is
 *   signed with it
 *
 * @remarks
 * Uses `@noble/secp256k1` v3 with `prehash:false` since we pre-hash
 * all messages ourselves. The `hmacSha256` configuration is required
 * for synchronous signing.
 *
 * @module
 */

import { hmac } from "@noble/hashes/hmac.js";
import { sha256 } from "@noble/hashes/sha2.js";
import { keccak_256 } from "@noble/hashes/sha3.js";
import * as secp from "@noble/secp256k1";
import { ec } from "starknet";
import { bytesToHex, concat, hexToBytes, toHex, tryParseHexFelt } from "./encoding.js";
import { CredentialFormatError, SigningError } from "./errors.js";

// Configure @noble/secp256k1 v3 for synchronous signing.
// v3 requires manual hash configuration via secp.hashes.
secp.hashes.hmacSha256 = (key: Uint8Array, ...msgs: Uint8Array[]) => {
  const h = hmac.create(sha256, key);
  for (const msg of msgs) h.update(msg);
  return h.digest();
};
secp.hashes.sha256 = (...msgs: Uint8Array[]) => {
  const h = sha256.create();
  for (const msg of msgs) h.update(msg);
  return h.digest();
};

// ── L1 (Ethereum) ───────────────────────────────────────────────────

/**
 * Anything that can produce an Ethereum `personal_sign` signature.
 *
 * Implement this for hardware wallets, browser wallets or KMS-backed keys.
 * The returned signature is `r(32) + s(32)`, optionally followed by a
 * recovery byte which the SDK ignores.
 */
export interface L1Signer {
  /** The 0x-prefixed Ethereum address. */
  readonly address: string;
  personalSign(message: Uint8Array): Uint8Array | Promise<Uint8Array>;
}

/**
 * Callback for external digest signers.
 *
 * Receives the 32-byte `personal_sign` digest and returns `r(32) + s(32)`
 * (a 65th recovery byte is allowed).
 */
export type SignDigestFn = (digest: Uint8Array) => Uint8Array | Promise<Uint8Array>;

/** An Ethereum secp256k1 wallet. */
export interface EvmWallet {
  /** The 32-byte private key. */
  privateKey: Uint8Array;
  /** The 65-byte uncompressed public key (with `0x04` prefix). */
  publicKey: Uint8Array;
  /** The 0x-prefixed, 40-character lowercase hex Ethereum address. */
  address: string;
}

/** Parse a 32-byte secp256k1 private key, rejecting anything else. */
export function parseL1PrivateKey(input: Uint8Array | string): Uint8Array {
  let key: Uint8Array;
  try {
    key = typeof input === "string" ? hexToBytes(input) : input;
  } catch (error) {
    throw new CredentialFormatError("L1 private key is not hex", { cause: error });
  }
  if (key.length !== 32 || !secp.utils.isValidSecretKey(key)) {
    throw new CredentialFormatError("L1 private key is not a valid secp256k1 scalar");
  }
  return key;
}

/**
 * Load an Ethereum wallet from a private key.
 * Address = last 20 bytes of keccak256(publicKey[1:65]).
 */
export function evmWalletFromPrivateKey(privateKeyInput: Uint8Array | string): EvmWallet {
  const privateKey = parseL1PrivateKey(privateKeyInput);
  const publicKey = secp.getPublicKey(privateKey, false);
  const hash = keccak_256(publicKey.slice(1));
  return {
    privateKey,
    publicKey,
    address: bytesToHex(hash.slice(12)),
  };
}

/**
 * Compute the Ethereum personal_sign digest.
 *
 * `keccak256("\x19Ethereum Signed Message:\n" + str(len(message)) + message)`
 */
export function evmPersonalSignDigest(message: Uint8Array): Uint8Array {
  const prefix = new TextEncoder().encode(`\x19Ethereum Signed Message:\n${message.length}`);
  return keccak_256(concat([prefix, message]));
}

/**
 * Sign a 32-byte digest with secp256k1 and return `r(32) + s(32)`.
 * Low-s normalization is handled by @noble/secp256k1 v3 automatically.
 */
export function evmSignDigest(privateKey: Uint8Array, digest: Uint8Array): Uint8Array {
  // prehash must be false: the digest is already keccak-256 hashed.
  return secp.sign(digest, privateKey, { prehash: false });
}

/** Sign using Ethereum's personal_sign format; returns `r(32) + s(32)`. */
export function evmPersonalSign(privateKey: Uint8Array, message: Uint8Array): Uint8Array {
  return evmSignDigest(privateKey, evmPersonalSignDigest(message));
}

/**
 * Strip an Ethereum signature down to `r(32) + s(32)`.
 *
 * @throws {CredentialFormatError} When the signature is neither 64 nor 65 bytes.
 */
export function signatureRS(signature: Uint8Array): Uint8Array {
  if (signature.length !== 64 && signature.length !== 65) {
    throw new CredentialFormatError(
      `L1 signature must be 64 or 65 bytes, got ${signature.length}`,
    );
  }
  return signature.slice(0, 64);
}

/** An {@link L1Signer} backed by an in-memory private key. */
export class LocalL1Signer implements L1Signer {
  readonly address: string;
  readonly #privateKey: Uint8Array;

  constructor(privateKey: Uint8Array | string) {
    const wallet = evmWalletFromPrivateKey(privateKey);
    this.address = wallet.address;
    this.#privateKey = wallet.privateKey;
  }

  personalSign(message: Uint8Array): Uint8Array {
    return evmPersonalSign(this.#privateKey, message);
  }
}

/**
 * An {@link L1Signer} backed by an external signing function.
 *
 * The SDK applies the Ethereum `personal_sign` framing (prefix + keccak256);
 * the callback only signs the resulting 32-byte digest.
 *
 * @example
 * ```ts
 * const signer = new ExternalL1Signer("0xabcd...1234", async (digest) => {
 *   const { r, s } = await myKms.sign(digest);
 *   return concat([r, s]);
 * });
 * const account = await Account.fromL1Signer(config, signer);
 * ```
 */
export class ExternalL1Signer implements L1Signer {
  readonly address: string;
  private readonly signDigest: SignDigestFn;

  constructor(address: string, signDigest: SignDigestFn) {
    this.address = address;
    this.signDigest = signDigest;
  }

  personalSign(message: Uint8Array): Uint8Array | Promise<Uint8Array> {
    return this.signDigest(evmPersonalSignDigest(message));
  }
}

// ── L2 (Stark) ──────────────────────────────────────────────────────

/** Order of the Stark curve's generator; private keys live in `[1, n)`. */
export const STARK_CURVE_ORDER = 0x0800000000000010ffffffffffffffffb781126dcae7b2321e66a241adc64d2fn;

/** A Stark ECDSA signature. */
export interface StarkSignature {
  r: bigint;
  s: bigint;
}

/** 64-digit 0x-hex, the form the curve functions take scalars and hashes in. */
function toWord(value: bigint): string {
  return `0x${value.toString(16).padStart(64, "0")}`;
}

/** Whether `key` is a usable Stark private scalar. */
export function isValidStarkPrivateKey(key: bigint): boolean {
  return key > 0n && key < STARK_CURVE_ORDER;
}

/**
 * Parse an L2 private key from hex (or pass a bigint through), checking it
 * is a scalar of the Stark curve.
 *
 * Hex keys are read as felts: a 64-digit value at or above the field prime
 * is reduced modulo it before the range check.
 *
 * @throws {CredentialFormatError} When the key is malformed, zero or not
 *   below the curve order.
 */
export function parseStarkPrivateKey(input: string | bigint): bigint {
  const key = typeof input === "bigint" ? input : tryParseHexFelt(input);
  if (key === undefined) {
    throw new CredentialFormatError("L2 private key must be 0x-prefixed hex");
  }
  if (!isValidStarkPrivateKey(key)) {
    throw new CredentialFormatError("L2 private key is not a valid Stark scalar");
  }
  return key;
}

/** Compute the Stark public key (the x coordinate) of a private scalar. */
export function starkPublicKey(privateKey: bigint): bigint {
  return BigInt(ec.starkCurve.getStarkKey(toWord(privateKey)));
}

/**
 * Sign a felt-sized message hash with a Stark private key.
 * Deterministic (RFC 6979 nonces).
 *
 * @throws {SigningError} When the curve library rejects the input.
 */
export function starkSign(privateKey: bigint, messageHash: bigint): StarkSignature {
  try {
    const signature = ec.starkCurve.sign(toWord(messageHash), toWord(privateKey));
    return { r: signature.r, s: signature.s };
  } catch (error) {
    throw new SigningError("Stark signature failed", { cause: error });
  }
}

/**
 * Render a signature in the wire format `[0x<r>,0x<s>]`.
 *
 * @example
 * ```ts
 * flattenSignature({ r: 0x123n, s: 0x456n }); // "[0x123,0x456]"
 * ```
 */
export function flattenSignature(signature: StarkSignature): string {
  return `[${toHex(signature.r)},${toHex(signature.s)}]`;
}
