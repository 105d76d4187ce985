/**
 * Paradex accounts and their signing operations.
 *
 * An account owns its Stark private scalar exclusively: it is held in a
 * private field, never serialized, logged or returned. Every operation
 * builds a typed-data message, hashes it and signs the hash through
 * {@link StarkAccount.signHash}.
 *
 * - {@link Account}: the full account, derived from (or paired with) an
 *   Ethereum identity; can onboard
 * - {@link SubkeyAccount}: an L2-only key registered on an existing
 *   account; it signs but cannot onboard
 *
 * @example
 * ```ts
 * import { Account, parseSystemConfig, TESTNET } from "paradex-signer";
 *
 * const config = parseSystemConfig(await (await fetch(`${TESTNET.apiBase}/system/config`)).json());
 * const account = Account.fromL1PrivateKey(config, process.env.ETH_PRIVATE_KEY ?? "");
 * const headers = account.authHeaders();
 * ```
 *
 * @module
 */

import { AUTH_EXPIRY_SECS } from "./config.js";
import type { SystemConfig } from "./config.js";
import { AuthSession, type Clock } from "./auth.js";
import {
  evmWalletFromPrivateKey,
  flattenSignature,
  type L1Signer,
  parseStarkPrivateKey,
  type StarkSignature,
  starkPublicKey,
  starkSign,
} from "./crypto.js";
import { toHex, tryParseHexFelt, tryShortStringToFelt } from "./encoding.js";
import { ConfigurationFormatError } from "./errors.js";
import {
  computeAccountAddress,
  deriveL2Key,
  deriveL2KeyWithSigner,
  parseClassHash,
  parseL1ChainId,
} from "./keys.js";
import { log } from "./logger.js";
import {
  buildAuthMessage,
  buildBlockOfferMessage,
  buildBlockTradeMessage,
  buildFullnodeMessage,
  buildModifyOrderMessage,
  buildOnboardingMessage,
  buildOrderMessage,
} from "./messages.js";
import type { BlockOfferRequest, BlockTradeRequest, Header, Order } from "./models.js";
import { messageHash, type TypedData } from "./typed-data.js";

/** Options shared by every account constructor. */
export interface AccountOptions {
  /** Millisecond clock used for signature timestamps (default: `Date.now`). */
  clock?: Clock;
}

/**
 * Parse the L2 chain id (an ASCII identifier such as `"SN_MAIN"`) as a felt.
 *
 * @throws {ConfigurationFormatError} When it is empty, non-ASCII or longer
 *   than 31 characters.
 */
export function parseL2ChainId(raw: string): bigint {
  const chainId = tryShortStringToFelt(raw);
  if (chainId === undefined) {
    throw new ConfigurationFormatError(`Invalid L2 chain id: "${raw}"`);
  }
  return chainId;
}

/** A signed fullnode RPC request. */
export interface FullnodeSignature {
  signature: string;
  /** Unix seconds the signature was made at. */
  timestamp: number;
}

/**
 * Signing operations common to every Stark key that acts for a Paradex
 * account.
 */
export abstract class StarkAccount {
  /** Address of the account contract on L2. */
  readonly l2Address: bigint;
  /** Stark public key of the signing key. */
  readonly l2PublicKey: bigint;
  /** L2 chain id felt used in message domains. */
  readonly chainId: bigint;
  /** Session token holder. */
  readonly session: AuthSession;

  readonly #l2PrivateKey: bigint;
  protected readonly clock: Clock;
  private readonly decimals: number;

  protected constructor(
    config: SystemConfig,
    l2PrivateKey: bigint,
    l2Address: bigint,
    options: AccountOptions,
  ) {
    this.#l2PrivateKey = l2PrivateKey;
    this.l2PublicKey = starkPublicKey(l2PrivateKey);
    this.l2Address = l2Address;
    this.chainId = parseL2ChainId(config.starknet_chain_id);
    this.decimals = config.paraclear_decimals;
    this.clock = options.clock ?? Date.now;
    this.session = new AuthSession(this.clock);
  }

  /** L2 account address as 0x-prefixed lowercase hex. */
  l2AddressHex(): string {
    return toHex(this.l2Address);
  }

  /** L2 public key as 0x-prefixed lowercase hex. */
  l2PublicKeyHex(): string {
    return toHex(this.l2PublicKey);
  }

  /**
   * Sign a message hash with the account's private scalar.
   *
   * @throws {SigningError} When the curve rejects the hash.
   */
  signHash(hash: bigint): StarkSignature {
    return starkSign(this.#l2PrivateKey, hash);
  }

  /** Hash, sign and flatten a typed-data message. */
  protected signTypedData(typedData: TypedData): string {
    const hash = messageHash(typedData);
    log.sign("%s hash %s", typedData.primaryType, toHex(hash));
    return flattenSignature(this.signHash(hash));
  }

  /**
   * Sign an order in place.
   *
   * Stamps `signature_timestamp` with the current time (ms) when it is
   * unset, picks the modify message when `order.id` is set, and stores the
   * flattened signature on `order.signature`. An existing timestamp is never
   * changed, so re-signing the same order reproduces the same signature.
   * Nothing is written to the order when signing fails.
   *
   * @returns The flattened signature.
   * @throws {SigningError} When the size or price cannot be scaled.
   */
  signOrder(order: Order): string {
    const timestamp = order.signature_timestamp ?? this.clock();
    const typedData =
      order.id === undefined
        ? buildOrderMessage(this.chainId, order, timestamp, this.decimals)
        : buildModifyOrderMessage(this.chainId, order, timestamp, this.decimals);
    const signature = this.signTypedData(typedData);
    order.signature_timestamp = timestamp;
    order.signature = signature;
    return signature;
  }

  /**
   * Headers for `POST /auth`: account, signature, timestamp and expiry
   * (`timestamp + 86400`), times in Unix seconds.
   */
  authHeaders(): Header[] {
    const timestamp = Math.floor(this.clock() / 1000);
    const expiry = timestamp + AUTH_EXPIRY_SECS;
    const signature = this.signTypedData(buildAuthMessage(this.chainId, timestamp, expiry));
    return [
      ["PARADEX-STARKNET-ACCOUNT", this.l2AddressHex()],
      ["PARADEX-STARKNET-SIGNATURE", signature],
      ["PARADEX-TIMESTAMP", String(timestamp)],
      ["PARADEX-SIGNATURE-EXPIRATION", String(expiry)],
    ];
  }

  /** Sign a block trade proposal over its timestamp, markets and required signers. */
  signBlockTrade(request: BlockTradeRequest): string {
    return this.signTypedData(buildBlockTradeMessage(this.chainId, request));
  }

  /** Sign an offer on a block trade. */
  signBlockOffer(request: BlockOfferRequest): string {
    return this.signTypedData(buildBlockOfferMessage(this.chainId, request));
  }

  /**
   * Sign a JSON-RPC payload for the Paradex fullnode proxy.
   *
   * @param payload - The exact JSON body that will be sent.
   * @param timestamp - Unix seconds (default: now).
   */
  signFullnodeRequest(payload: string, timestamp?: number): FullnodeSignature {
    const ts = timestamp ?? Math.floor(this.clock() / 1000);
    const signature = this.signTypedData(
      buildFullnodeMessage(this.chainId, this.l2AddressHex(), payload, ts),
    );
    return { signature, timestamp: ts };
  }

  /** Public view of the account; the private scalar is never included. */
  toJSON(): Record<string, string> {
    return {
      l2_address: this.l2AddressHex(),
      l2_public_key: this.l2PublicKeyHex(),
      chain_id: toHex(this.chainId),
    };
  }
}

/**
 * A Paradex account tied to an Ethereum (L1) identity.
 *
 * The L2 address is computed once at construction from the public key and
 * the class hashes in the system config.
 */
export class Account extends StarkAccount {
  /** Ethereum address the account was onboarded with. */
  readonly l1Address: string;

  private constructor(
    config: SystemConfig,
    l1Address: string,
    l2PrivateKey: bigint,
    options: AccountOptions,
  ) {
    const accountClassHash = parseClassHash(config.paraclear_account_hash, "account class hash");
    const proxyClassHash = parseClassHash(config.paraclear_account_proxy_hash, "proxy class hash");
    const l2Address = computeAccountAddress(
      starkPublicKey(l2PrivateKey),
      accountClassHash,
      proxyClassHash,
    );
    super(config, l2PrivateKey, l2Address, options);
    this.l1Address = l1Address;
    log.account("account %s for %s", this.l2AddressHex(), l1Address);
  }

  /**
   * Build an account from an L2 private key.
   *
   * @throws {CredentialFormatError} When the key is malformed.
   * @throws {ConfigurationFormatError} When the config's chain id or class
   *   hashes are malformed.
   */
  static fromL2PrivateKey(
    config: SystemConfig,
    l1Address: string,
    l2PrivateKey: string | bigint,
    options: AccountOptions = {},
  ): Account {
    return new Account(config, l1Address, parseStarkPrivateKey(l2PrivateKey), options);
  }

  /**
   * Derive the L2 key from an Ethereum private key and build the account.
   * The L1 address is taken from the key.
   */
  static fromL1PrivateKey(
    config: SystemConfig,
    l1PrivateKey: string | Uint8Array,
    options: AccountOptions = {},
  ): Account {
    const wallet = evmWalletFromPrivateKey(l1PrivateKey);
    const l2PrivateKey = deriveL2Key(wallet.privateKey, parseL1ChainId(config.l1_chain_id));
    return new Account(config, wallet.address, l2PrivateKey, options);
  }

  /** Derive the L2 key through an external L1 signer and build the account. */
  static async fromL1Signer(
    config: SystemConfig,
    signer: L1Signer,
    options: AccountOptions = {},
  ): Promise<Account> {
    const l2PrivateKey = await deriveL2KeyWithSigner(signer, parseL1ChainId(config.l1_chain_id));
    return new Account(config, signer.address, l2PrivateKey, options);
  }

  /** Headers for `POST /onboarding`: L1 account, L2 account and signature. */
  onboardingHeaders(): Header[] {
    const signature = this.signTypedData(buildOnboardingMessage(this.chainId));
    return [
      ["PARADEX-ETHEREUM-ACCOUNT", this.l1Address],
      ["PARADEX-STARKNET-ACCOUNT", this.l2AddressHex()],
      ["PARADEX-STARKNET-SIGNATURE", signature],
    ];
  }

  override toJSON(): Record<string, string> {
    return { l1_address: this.l1Address, ...super.toJSON() };
  }
}

/**
 * An L2-only subkey acting for an existing Paradex account.
 *
 * The account address is given rather than computed, since the subkey is
 * not the key the account was deployed with.
 */
export class SubkeyAccount extends StarkAccount {
  private constructor(
    config: SystemConfig,
    l2PrivateKey: bigint,
    l2Address: bigint,
    options: AccountOptions,
  ) {
    super(config, l2PrivateKey, l2Address, options);
    log.account("subkey %s for account %s", this.l2PublicKeyHex(), this.l2AddressHex());
  }

  /**
   * @param l2PrivateKey - The subkey's private key (0x-prefixed hex).
   * @param l2Address - The main account's L2 address (0x-prefixed hex).
   * @throws {CredentialFormatError} When the key is malformed.
   * @throws {ConfigurationFormatError} When the address is not 0x-hex.
   */
  static create(
    config: SystemConfig,
    l2PrivateKey: string | bigint,
    l2Address: string,
    options: AccountOptions = {},
  ): SubkeyAccount {
    const key = parseStarkPrivateKey(l2PrivateKey);
    const address = tryParseHexFelt(l2Address);
    if (address === undefined) {
      throw new ConfigurationFormatError(`Invalid L2 account address: "${l2Address}"`);
    }
    return new SubkeyAccount(config, key, address, options);
  }
}
