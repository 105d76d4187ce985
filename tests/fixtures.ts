import { ec } from "starknet";
import { parseSystemConfig, type SystemConfig } from "../src/config.js";

// Test-only credentials. Class hashes and the account address are made up;
// each is a 0x-padded 64-digit value below the Stark prime.
export const L1_PRIVATE_KEY = "deadbeefdeadbeefdeadbeefdeadbeefdeadbeefdeadbeefdeadbeefdeadbeef";
export const L2_PRIVATE_KEY = "0x0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef";
export const ACCOUNT_CLASS_HASH =
  "0x0234567890abcdef1234567890abcdef1234567890abcdef1234567890abcdef";
export const PROXY_CLASS_HASH =
  "0x03abcdef1234567890abcdef1234567890abcdef1234567890abcdef12345678";
export const SUBKEY_ACCOUNT_ADDRESS =
  "0x0456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef01";

// Reference account for the pinned regression vectors. The values are full
// 32-byte words above the Stark prime and are read modulo it.
export const REFERENCE_L2_PRIVATE_KEY =
  "0x1234567890abcdef1234567890abcdef1234567890abcdef1234567890abcdef";
export const REFERENCE_PROXY_CLASS_HASH =
  "0x1234567890abcdef1234567890abcdef1234567890abcdef1234567890abcdef";
export const REFERENCE_ACCOUNT_CLASS_HASH =
  "0xabcdef1234567890abcdef1234567890abcdef1234567890abcdef1234567890";
export const REFERENCE_L2_CHAIN_ID = "SN_MAIN";

export const L1_CHAIN_ID = 11155111n;
export const L2_CHAIN_ID = "PRIVATE_SN_POTC_SEPOLIA";

/** 2023-11-14T22:13:20.123Z */
export const NOW_MS = 1_700_000_000_123;
export const NOW_SECS = 1_700_000_000;

export function rawSystemConfig(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    l1_chain_id: String(L1_CHAIN_ID),
    starknet_chain_id: L2_CHAIN_ID,
    starknet_fullnode_rpc_url: "https://fullnode.example.test/rpc",
    paraclear_address: "0x0111111111111111111111111111111111111111111111111111111111111111",
    paraclear_account_proxy_hash: PROXY_CLASS_HASH,
    paraclear_account_hash: ACCOUNT_CLASS_HASH,
    paraclear_decimals: 8,
    bridged_tokens: [],
    ...overrides,
  };
}

export function systemConfig(overrides: Record<string, unknown> = {}): SystemConfig {
  return parseSystemConfig(rawSystemConfig(overrides));
}

/** 64-digit 0x-hex for handing values to the curve directly. */
export function word(value: bigint): string {
  return `0x${value.toString(16).padStart(64, "0")}`;
}

/** Verify a Stark signature against the full public key of `privateKey`. */
export function verifyStark(
  signature: { r: bigint; s: bigint },
  msgHash: bigint,
  privateKey: bigint,
): boolean {
  const fullPublicKey = ec.starkCurve.getPublicKey(word(privateKey));
  return ec.starkCurve.verify(
    new ec.starkCurve.Signature(signature.r, signature.s),
    word(msgHash),
    fullPublicKey,
  );
}

/** Parse a flattened `[0x<r>,0x<s>]` signature. */
export function parseFlatSignature(flat: string): { r: bigint; s: bigint } {
  const match = /^\[(0x[0-9a-f]+),(0x[0-9a-f]+)\]$/.exec(flat);
  if (match === null) throw new Error(`Not a flattened signature: ${flat}`);
  return { r: BigInt(match[1]), s: BigInt(match[2]) };
}
