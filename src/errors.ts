/**
 * Error types for the Paradex signing core.
 *
 * Every failure surfaced by the SDK is a {@link ParadexError} subclass
 * carrying a `kind` discriminant, so callers can branch either on
 * `instanceof` or on `error.kind`:
 *
 * - **credential-format**: malformed L1/L2 key material
 * - **configuration-format**: malformed chain id or class hash in SystemConfig
 * - **protocol**: selector or address computation failure
 * - **signing**: typed-data encoding or curve signing failure
 * - **account-state**: operation needs state the account does not have yet
 * - **invalid-order**: an order was assembled without its required fields
 * - **api**: an HTTP error handed back by the REST collaborator
 *
 * @module
 */

/** Discriminant shared by every {@link ParadexError}. */
export type ErrorKind =
  | "credential-format"
  | "configuration-format"
  | "protocol"
  | "signing"
  | "account-state"
  | "invalid-order"
  | "api";

/**
 * Base error class for all Paradex SDK errors.
 *
 * @example
 * ```ts
 * try {
 *   Account.fromL2PrivateKey(config, l1Address, "not-a-key");
 * } catch (error) {
 *   if (error instanceof ParadexError) {
 *     console.log(error.kind, error.message);
 *   }
 * }
 * ```
 */
export class ParadexError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParadexError";
    this.kind = kind;
  }
}

/** Malformed L1 or L2 key string, or an L1 signer that failed to sign. */
export class CredentialFormatError extends ParadexError {
  constructor(message = "Invalid credential", options?: { cause?: unknown }) {
    super("credential-format", message, options);
    this.name = "CredentialFormatError";
  }
}

/** Malformed chain id, class hash or payload field in the system configuration. */
export class ConfigurationFormatError extends ParadexError {
  constructor(message = "Invalid system configuration", options?: { cause?: unknown }) {
    super("configuration-format", message, options);
    this.name = "ConfigurationFormatError";
  }
}

/** Selector or contract address computation failed. */
export class ProtocolError extends ParadexError {
  constructor(message = "Protocol computation failed", options?: { cause?: unknown }) {
    super("protocol", message, options);
    this.name = "ProtocolError";
  }
}

/**
 * Typed-data encoding or curve signing failed: unknown type, missing field,
 * a value that is not a felt, or a rejected signature computation.
 */
export class SigningError extends ParadexError {
  constructor(message = "Signing failed", options?: { cause?: unknown }) {
    super("signing", message, options);
    this.name = "SigningError";
  }
}

/** The account is not in the state the operation requires (e.g. no session token). */
export class AccountStateError extends ParadexError {
  constructor(message = "Account is not authenticated") {
    super("account-state", message);
    this.name = "AccountStateError";
  }
}

/** An order was built without one of its required fields. */
export class InvalidOrderError extends ParadexError {
  constructor(message = "Invalid order") {
    super("invalid-order", message);
    this.name = "InvalidOrderError";
  }
}

/**
 * Error response from the Paradex REST API.
 *
 * The signing core never performs HTTP itself; the REST collaborator raises
 * this so that lifecycle helpers such as {@link AuthSession.onboard} can
 * recognise specific responses.
 */
export class ApiError extends ParadexError {
  /** HTTP status code of the failed response. */
  readonly status: number;

  constructor(status: number, message: string) {
    super("api", message);
    this.name = "ApiError";
    this.status = status;
  }
}

/** Type guard for any SDK error, optionally of a specific kind. */
export function isParadexError(error: unknown, kind?: ErrorKind): error is ParadexError {
  return error instanceof ParadexError && (kind === undefined || error.kind === kind);
}
