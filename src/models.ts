/**
 * Data types shared by the signing operations.
 *
 * Field names follow the Paradex REST API so that an {@link Order} or a
 * block request can be serialized as a request body unchanged.
 *
 * @module
 */

import { InvalidOrderError } from "./errors.js";

// ── Headers ─────────────────────────────────────────────────────────

/** An HTTP header as a `[name, value]` pair. */
export type Header = readonly [name: string, value: string];

/** Collect header pairs into a plain object for `fetch`. */
export function headersToRecord(headers: readonly Header[]): Record<string, string> {
  return Object.fromEntries(headers);
}

// ── Orders ──────────────────────────────────────────────────────────

/** Order side. */
export type OrderSide = "BUY" | "SELL";

/** Order type. */
export type OrderType = "LIMIT" | "MARKET";

/** Execution instruction (time in force). */
export type OrderInstruction = "GTC" | "POST_ONLY" | "IOC" | "FOK";

/** Numeric side used in signed messages: BUY = 1, SELL = 2. */
export function chainSide(side: OrderSide): 1 | 2 {
  return side === "BUY" ? 1 : 2;
}

/**
 * An order as submitted to `POST /orders` (or `PUT /orders/{id}` when `id`
 * is set).
 *
 * `signature` and `signature_timestamp` are filled in by
 * {@link Account.signOrder}; a timestamp that is already set is kept.
 */
export interface Order {
  /** Market symbol (e.g., `"BTC-USD-PERP"`). */
  market: string;
  side: OrderSide;
  type: OrderType;
  /** Order size as a decimal string. */
  size: string;
  /** Limit price as a decimal string; absent for market orders. */
  price?: string;
  client_id?: string;
  instruction?: OrderInstruction;
  reduce_only?: boolean;
  trigger_price?: string;
  /** Flattened Stark signature `[0x<r>,0x<s>]`. */
  signature?: string;
  /** Signing time in milliseconds since the epoch. */
  signature_timestamp?: number;
  /** Id of the order being modified; selects the modify message shape. */
  id?: string;
}

/** Fields an order cannot be built without. */
export type RequiredOrderField = "market" | "side" | "type" | "size";

type OrderDraft = Partial<Omit<Order, "signature" | "signature_timestamp">>;

/**
 * Staged order builder.
 *
 * The type parameter tracks which required fields are still missing;
 * {@link OrderBuilder.build} only type-checks once none are.
 *
 * @example
 * ```ts
 * const order = OrderBuilder.create()
 *   .market("BTC-USD-PERP")
 *   .side("BUY")
 *   .type("LIMIT")
 *   .size("0.1")
 *   .price("50000")
 *   .build();
 * ```
 */
export class OrderBuilder<Missing extends RequiredOrderField = RequiredOrderField> {
  private readonly draft: OrderDraft;
  // Never assigned; keeps builders with different missing fields distinct types.
  private readonly missing?: Missing;

  private constructor(draft: OrderDraft) {
    this.draft = draft;
  }

  /** Start a new order with every required field missing. */
  static create(): OrderBuilder {
    return new OrderBuilder({});
  }

  market(market: string): OrderBuilder<Exclude<Missing, "market">> {
    return new OrderBuilder<Exclude<Missing, "market">>({ ...this.draft, market });
  }

  side(side: OrderSide): OrderBuilder<Exclude<Missing, "side">> {
    return new OrderBuilder<Exclude<Missing, "side">>({ ...this.draft, side });
  }

  type(type: OrderType): OrderBuilder<Exclude<Missing, "type">> {
    return new OrderBuilder<Exclude<Missing, "type">>({ ...this.draft, type });
  }

  size(size: string): OrderBuilder<Exclude<Missing, "size">> {
    return new OrderBuilder<Exclude<Missing, "size">>({ ...this.draft, size });
  }

  price(price: string): OrderBuilder<Missing> {
    return new OrderBuilder<Missing>({ ...this.draft, price });
  }

  clientId(clientId: string): OrderBuilder<Missing> {
    return new OrderBuilder<Missing>({ ...this.draft, client_id: clientId });
  }

  instruction(instruction: OrderInstruction): OrderBuilder<Missing> {
    return new OrderBuilder<Missing>({ ...this.draft, instruction });
  }

  reduceOnly(reduceOnly: boolean): OrderBuilder<Missing> {
    return new OrderBuilder<Missing>({ ...this.draft, reduce_only: reduceOnly });
  }

  triggerPrice(triggerPrice: string): OrderBuilder<Missing> {
    return new OrderBuilder<Missing>({ ...this.draft, trigger_price: triggerPrice });
  }

  /** Turn the order into a modification of the existing order `id`. */
  modifies(id: string): OrderBuilder<Missing> {
    return new OrderBuilder<Missing>({ ...this.draft, id });
  }

  /**
   * Produce the order. Unset optional fields are omitted entirely.
   *
   * @throws {InvalidOrderError} When called from untyped code with a required
   *   field missing.
   */
  build(this: OrderBuilder<never>): Order {
    const { market, side, type, size, ...optional } = this.draft;
    if (market === undefined) throw new InvalidOrderError("market is required");
    if (side === undefined) throw new InvalidOrderError("side is required");
    if (type === undefined) throw new InvalidOrderError("type is required");
    if (size === undefined) throw new InvalidOrderError("size is required");
    return { market, side, type, size, ...optional };
  }
}

// ── Block trades ────────────────────────────────────────────────────

/** A block trade proposal (`POST /block-trades`). */
export interface BlockTradeRequest {
  markets: string[];
  /** Account addresses that must sign an offer. */
  required_signers: string[];
  /** Signing time in milliseconds since the epoch. */
  signature_timestamp: number;
  signature?: string;
}

/** One leg of a block offer. */
export interface BlockOfferOrder {
  market: string;
  side: OrderSide;
  size: string;
  price: string;
}

/** An offer against a block trade (`POST /block-trades/{id}/offers`). */
export interface BlockOfferRequest {
  orders: BlockOfferOrder[];
  /** Signing time in milliseconds since the epoch. */
  signature_timestamp: number;
  signature?: string;
}
