/**
 * L1 → L2 key derivation and account address computation.
 *
 * The derived Stark key must be bit-exact with every other Paradex client:
 * any change to the message, byte order or hash yields a different (and
 * incompatible) L2 identity for the same Ethereum credential.
 *
 * @module
 */

import { keccak_256 } from "@noble/hashes/sha3.js";
import { hash } from "starknet";
import {
  evmPersonalSign,
  isValidStarkPrivateKey,
  type L1Signer,
  parseL1PrivateKey,
  signatureRS,
} from "./crypto.js";
import { bytesToBigInt, FIELD_PRIME, toHex, tryParseHexFelt } from "./encoding.js";
import { ConfigurationFormatError, CredentialFormatError, ProtocolError } from "./errors.js";
import { log } from "./logger.js";

// ── Key derivation ──────────────────────────────────────────────────

/** Message an Ethereum key signs to derive its Stark key. */
export function buildStarkKeyMessage(l1ChainId: bigint | number): string {
  return `Paradex Stark Key Derivation: ${l1ChainId}`;
}

/**
 * Parse the L1 chain id from the system config.
 *
 * @throws {ConfigurationFormatError} When it is not a decimal integer.
 */
export function parseL1ChainId(raw: string): bigint {
  if (!/^[0-9]+$/.test(raw)) {
    throw new ConfigurationFormatError(`Invalid L1 chain id: "${raw}"`);
  }
  return BigInt(raw);
}

/**
 * Turn an L1 `personal_sign` signature into a Stark private key:
 * keccak256(r ‖ s), read big-endian and reduced modulo the Stark prime.
 *
 * @throws {CredentialFormatError} When the signature has the wrong length or
 *   the resulting scalar is not usable on the Stark curve.
 */
export function starkKeyFromL1Signature(signature: Uint8Array): bigint {
  const digest = keccak_256(signatureRS(signature));
  const key = bytesToBigInt(digest) % FIELD_PRIME;
  if (!isValidStarkPrivateKey(key)) {
    throw new CredentialFormatError("Derived L2 key is outside the Stark curve order");
  }
  return key;
}

/**
 * Derive the L2 private key from an L1 private key.
 *
 * @param l1PrivateKey - 32-byte secp256k1 key as hex (with or without `0x`) or bytes.
 * @param l1ChainId - The L1 chain id.
 * @throws {CredentialFormatError} When the L1 key is malformed.
 */
export function deriveL2Key(l1PrivateKey: Uint8Array | string, l1ChainId: bigint | number): bigint {
  const key = parseL1PrivateKey(l1PrivateKey);
  const message = new TextEncoder().encode(buildStarkKeyMessage(l1ChainId));
  let signature: Uint8Array;
  try {
    signature = evmPersonalSign(key, message);
  } catch (error) {
    throw new CredentialFormatError("L1 signing failed", { cause: error });
  }
  log.keys("derived L2 key from local L1 key on chain %s", String(l1ChainId));
  return starkKeyFromL1Signature(signature);
}

/**
 * Derive the L2 private key through an {@link L1Signer} (wallet, KMS, ...).
 *
 * @throws {CredentialFormatError} When the signer fails or returns a
 *   malformed signature.
 */
export async function deriveL2KeyWithSigner(
  signer: L1Signer,
  l1ChainId: bigint | number,
): Promise<bigint> {
  const message = new TextEncoder().encode(buildStarkKeyMessage(l1ChainId));
  let signature: Uint8Array;
  try {
    signature = await signer.personalSign(message);
  } catch (error) {
    throw new CredentialFormatError("L1 signer failed", { cause: error });
  }
  log.keys("derived L2 key for %s on chain %s", signer.address, String(l1ChainId));
  return starkKeyFromL1Signature(signature);
}

// ── Account address ─────────────────────────────────────────────────

/** `selector("initialize")`, the entry point the proxy constructor calls. */
export const INITIALIZE_SELECTOR = BigInt(hash.getSelectorFromName("initialize"));

/**
 * Parse a 0x-prefixed class hash from the system config, reducing it modulo
 * the field prime.
 *
 * @throws {ConfigurationFormatError} When it is not hex of at most 64 digits.
 */
export function parseClassHash(raw: string, label = "class hash"): bigint {
  const value = tryParseHexFelt(raw);
  if (value === undefined) {
    throw new ConfigurationFormatError(`Invalid ${label}: "${raw}"`);
  }
  return value;
}

/**
 * Compute the deterministic address of a Paradex account contract.
 *
 * The account is deployed as a proxy (`proxyClassHash`) whose constructor
 * calldata is `[accountClassHash, selector("initialize"), 2, publicKey, 0]`,
 * salted with the public key and with no deployer.
 *
 * @throws {ProtocolError} When the address computation fails.
 */
export function computeAccountAddress(
  publicKey: bigint,
  accountClassHash: bigint,
  proxyClassHash: bigint,
): bigint {
  const calldata = [accountClassHash, INITIALIZE_SELECTOR, 2n, publicKey, 0n].map(toHex);
  try {
    return BigInt(
      hash.calculateContractAddressFromHash(toHex(publicKey), toHex(proxyClassHash), calldata, 0),
    );
  } catch (error) {
    throw new ProtocolError("Account address computation failed", { cause: error });
  }
}
