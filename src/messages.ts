/**
 * The Paradex typed-data message variants.
 *
 * Every message the exchange accepts has a fixed, statically known member
 * list. Builders take a record keyed by exactly those members, so a missing
 * field is a compile error rather than an encoding failure.
 *
 * Member order is significant: it is hashed into the type hash and the
 * message hash.
 *
 * @module
 */

import { DOMAIN_NAME, DOMAIN_VERSION, FULLNODE_SIGNATURE_VERSION } from "./config.js";
import { textToFelt, toHex, tryToQuantum } from "./encoding.js";
import { SigningError } from "./errors.js";
import {
  type BlockOfferRequest,
  type BlockTradeRequest,
  chainSide,
  type Order,
} from "./models.js";
import type { TypedData, TypeMember } from "./typed-data.js";

/** Member names of each message variant, in protocol order. */
export const MESSAGE_FIELDS = {
  Order: ["timestamp", "market", "side", "orderType", "size", "price"],
  ModifyOrder: ["timestamp", "market", "side", "orderType", "size", "price", "id"],
  Onboarding: [],
  Auth: ["timestamp", "expiry"],
  FullnodeRequest: ["account", "payload", "timestamp", "version"],
  BlockTrade: ["timestamp", "markets", "required_signers"],
  BlockOffer: ["timestamp"],
} as const satisfies Record<string, readonly string[]>;

/** Name of a message variant. */
export type MessageKind = keyof typeof MESSAGE_FIELDS;

/** Felt-string values for every member of a variant. */
export type MessageFields<K extends MessageKind> = {
  readonly [F in (typeof MESSAGE_FIELDS)[K][number]]: string;
};

const DOMAIN_TYPE: readonly TypeMember[] = [
  { name: "name", type: "felt" },
  { name: "chainId", type: "felt" },
  { name: "version", type: "felt" },
];

/**
 * Build the typed data for one message variant.
 *
 * Values must already be felt numerals; use the `build*Message` helpers to
 * map protocol objects onto them.
 */
export function buildTypedData<K extends MessageKind>(
  kind: K,
  chainId: bigint,
  message: MessageFields<K>,
): TypedData {
  const fields: readonly string[] = MESSAGE_FIELDS[kind];
  return {
    domain: { name: DOMAIN_NAME, chainId: toHex(chainId), version: DOMAIN_VERSION },
    primaryType: kind,
    types: {
      StarkNetDomain: DOMAIN_TYPE,
      [kind]: fields.map((name) => ({ name, type: "felt" })),
    },
    message,
  };
}

// ── Value mapping ───────────────────────────────────────────────────

/**
 * Scale a decimal amount to its quantum felt string.
 *
 * @throws {SigningError} When the amount is malformed or more precise than
 *   `decimals` allows.
 */
export function quantumFelt(field: string, value: string, decimals: number): string {
  const quantum = tryToQuantum(value, decimals);
  if (quantum === undefined) {
    throw new SigningError(`Invalid ${field} "${value}" for ${decimals} decimals`);
  }
  return quantum.toString();
}

function orderFields(order: Order, timestamp: number, decimals: number): MessageFields<"Order"> {
  return {
    timestamp: String(timestamp),
    market: textToFelt(order.market),
    side: String(chainSide(order.side)),
    orderType: textToFelt(order.type),
    size: quantumFelt("size", order.size, decimals),
    price: order.price === undefined ? "0" : quantumFelt("price", order.price, decimals),
  };
}

// ── Builders ────────────────────────────────────────────────────────

/** Typed data for a new order. */
export function buildOrderMessage(
  chainId: bigint,
  order: Order,
  timestamp: number,
  decimals: number,
): TypedData {
  return buildTypedData("Order", chainId, orderFields(order, timestamp, decimals));
}

/**
 * Typed data for modifying an existing order.
 *
 * @throws {SigningError} When `order.id` is not set.
 */
export function buildModifyOrderMessage(
  chainId: bigint,
  order: Order,
  timestamp: number,
  decimals: number,
): TypedData {
  if (order.id === undefined) {
    throw new SigningError("Modify order message requires an order id");
  }
  return buildTypedData("ModifyOrder", chainId, {
    ...orderFields(order, timestamp, decimals),
    id: textToFelt(order.id),
  });
}

/** Typed data for onboarding; the message has no members. */
export function buildOnboardingMessage(chainId: bigint): TypedData {
  return buildTypedData("Onboarding", chainId, {});
}

/** Typed data for `POST /auth`; times are Unix seconds. */
export function buildAuthMessage(chainId: bigint, timestamp: number, expiry: number): TypedData {
  return buildTypedData("Auth", chainId, {
    timestamp: String(timestamp),
    expiry: String(expiry),
  });
}

/** Typed data authorizing a JSON-RPC call through the Paradex fullnode proxy. */
export function buildFullnodeMessage(
  chainId: bigint,
  account: string,
  payload: string,
  timestamp: number,
  version: string = FULLNODE_SIGNATURE_VERSION,
): TypedData {
  return buildTypedData("FullnodeRequest", chainId, {
    account: textToFelt(account),
    payload: textToFelt(payload),
    timestamp: String(timestamp),
    version: textToFelt(version),
  });
}

/** Typed data for a block trade proposal. */
export function buildBlockTradeMessage(chainId: bigint, request: BlockTradeRequest): TypedData {
  return buildTypedData("BlockTrade", chainId, {
    timestamp: String(request.signature_timestamp),
    markets: textToFelt(request.markets.join(",")),
    required_signers: textToFelt(request.required_signers.join(",")),
  });
}

/** Typed data for an offer on a block trade. */
export function buildBlockOfferMessage(chainId: bigint, request: BlockOfferRequest): TypedData {
  return buildTypedData("BlockOffer", chainId, {
    timestamp: String(request.signature_timestamp),
  });
}
