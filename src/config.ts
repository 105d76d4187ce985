/**
 * Environment and system configuration for Paradex.
 *
 * Provides pre-configured endpoints for production and testnet, the
 * {@link SystemConfig} record fetched from `GET /system/config`, and the
 * protocol constants the signing core depends on.
 *
 * @module
 */

import { ConfigurationFormatError } from "./errors.js";

/**
 * Endpoint configuration for a Paradex deployment.
 *
 * @example
 * ```ts
 * const config: EnvironmentConfig = {
 *   apiBase: "https://my-gateway.example.com/v1",
 *   wsUrl: "wss://my-gateway.example.com/v1",
 * };
 * ```
 */
export interface EnvironmentConfig {
  /** Base URL for REST API endpoints. */
  apiBase: string;
  /** WebSocket URL for real-time data. */
  wsUrl: string;
}

/** Pre-configured endpoints for Paradex production. */
export const PROD: EnvironmentConfig = {
  apiBase: "https://api.prod.paradex.trade/v1",
  wsUrl: "wss://ws.api.prod.paradex.trade/v1",
};

/** Pre-configured endpoints for Paradex testnet. */
export const TESTNET: EnvironmentConfig = {
  apiBase: "https://api.testnet.paradex.trade/v1",
  wsUrl: "wss://ws.api.testnet.paradex.trade/v1",
};

/** Available Paradex environments. */
export enum Environment {
  /** Production trading. */
  PROD = "prod",
  /** Testnet, for integration testing. */
  TESTNET = "testnet",
}

/** Resolve an {@link Environment} to its {@link EnvironmentConfig}. */
export function getEnvironmentConfig(environment: Environment): EnvironmentConfig {
  switch (environment) {
    case Environment.PROD:
      return PROD;
    case Environment.TESTNET:
      return TESTNET;
  }
}

// ── Protocol constants ──────────────────────────────────────────────

/** `name` field of every typed-data domain. */
export const DOMAIN_NAME = "Paradex";
/** `version` field of every typed-data domain. */
export const DOMAIN_VERSION = "1";
/** An auth token older than this many seconds is refreshed. */
export const AUTH_REFRESH_INTERVAL_SECS = 4 * 60;
/** Lifetime requested for an auth signature, in seconds. */
export const AUTH_EXPIRY_SECS = 24 * 60 * 60;
/** Version string signed into fullnode RPC requests. */
export const FULLNODE_SIGNATURE_VERSION = "1.0.0";
/** Fallback quantum precision when the system config omits it. */
export const DEFAULT_PARACLEAR_DECIMALS = 8;

// ── System configuration ────────────────────────────────────────────

/** A token bridged between L1 and L2. */
export interface BridgedToken {
  symbol: string;
  decimals: number;
  l1_token_address: string;
  l2_token_address: string;
  l1_bridge_address: string;
  l2_bridge_address: string;
}

/**
 * System configuration as returned by `GET /system/config`.
 *
 * Supplied by the REST collaborator before an account is constructed and
 * immutable for the lifetime of that account.
 */
export interface SystemConfig {
  /** L1 chain id as a decimal string (e.g. `"1"`, `"11155111"`). */
  readonly l1_chain_id: string;
  /** L2 chain id as an ASCII identifier (e.g. `"PRIVATE_SN_PARACLEAR_MAINNET"`). */
  readonly starknet_chain_id: string;
  readonly starknet_fullnode_rpc_url: string;
  readonly paraclear_address: string;
  /** Class hash of the account proxy contract (0x-prefixed hex). */
  readonly paraclear_account_proxy_hash: string;
  /** Class hash of the account implementation contract (0x-prefixed hex). */
  readonly paraclear_account_hash: string;
  /** Number of decimals used for order size/price quantums. */
  readonly paraclear_decimals: number;
  readonly bridged_tokens: readonly BridgedToken[];
}

function requireString(raw: Record<string, unknown>, key: string): string {
  const value = raw[key];
  if (typeof value !== "string") {
    throw new ConfigurationFormatError(`System config field "${key}" must be a string`);
  }
  return value;
}

/** Decimal counts: non-negative integers, sent as numbers or numeric strings. */
function requireDecimals(raw: Record<string, unknown>, key: string): number {
  const value = raw[key];
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) return value;
  if (typeof value === "string" && /^\d+$/.test(value)) return Number(value);
  throw new ConfigurationFormatError(
    `System config field "${key}" must be a non-negative integer`,
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseBridgedToken(raw: unknown): BridgedToken {
  if (!isRecord(raw)) {
    throw new ConfigurationFormatError("Bridged token entry must be an object");
  }
  return {
    symbol: requireString(raw, "symbol"),
    decimals: requireDecimals(raw, "decimals"),
    l1_token_address: requireString(raw, "l1_token_address"),
    l2_token_address: requireString(raw, "l2_token_address"),
    l1_bridge_address: requireString(raw, "l1_bridge_address"),
    l2_bridge_address: requireString(raw, "l2_bridge_address"),
  };
}

/**
 * Parse and freeze a raw `GET /system/config` payload.
 *
 * Only the shape is checked here. Chain ids and class hashes are validated
 * as field elements when an account is built from the config.
 *
 * @throws {ConfigurationFormatError} When a field is missing or mistyped.
 */
export function parseSystemConfig(raw: unknown): SystemConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationFormatError("System config must be an object");
  }
  const tokens = raw.bridged_tokens ?? [];
  if (!Array.isArray(tokens)) {
    throw new ConfigurationFormatError('System config field "bridged_tokens" must be an array');
  }
  const decimals =
    raw.paraclear_decimals === undefined
      ? DEFAULT_PARACLEAR_DECIMALS
      : requireDecimals(raw, "paraclear_decimals");

  return Object.freeze({
    l1_chain_id: requireString(raw, "l1_chain_id"),
    starknet_chain_id: requireString(raw, "starknet_chain_id"),
    starknet_fullnode_rpc_url: requireString(raw, "starknet_fullnode_rpc_url"),
    paraclear_address: requireString(raw, "paraclear_address"),
    paraclear_account_proxy_hash: requireString(raw, "paraclear_account_proxy_hash"),
    paraclear_account_hash: requireString(raw, "paraclear_account_hash"),
    paraclear_decimals: decimals,
    bridged_tokens: Object.freeze(tokens.map(parseBridgedToken)),
  });
}
