/**
 * Paradex signing core
 *
 * Public API exports: accounts, the auth lifecycle, orders and errors.
 * Low-level encoding and curve helpers live in `paradex-signer/internals`.
 */

// ── Accounts ──────────────────────────────────────────────────────
export {
  Account,
  SubkeyAccount,
  StarkAccount,
  parseL2ChainId,
  type AccountOptions,
  type FullnodeSignature,
} from "./account.js";

// ── Auth lifecycle ────────────────────────────────────────────────
export {
  AuthSession,
  needsRefresh,
  isAlreadyOnboardedError,
  type AuthState,
  type Clock,
} from "./auth.js";

// ── Config ────────────────────────────────────────────────────────
export {
  Environment,
  getEnvironmentConfig,
  parseSystemConfig,
  PROD,
  TESTNET,
  AUTH_EXPIRY_SECS,
  AUTH_REFRESH_INTERVAL_SECS,
  type BridgedToken,
  type EnvironmentConfig,
  type SystemConfig,
} from "./config.js";

// ── L1 signers ────────────────────────────────────────────────────
export {
  ExternalL1Signer,
  LocalL1Signer,
  type L1Signer,
  type SignDigestFn,
  type StarkSignature,
} from "./crypto.js";

// ── Key derivation ────────────────────────────────────────────────
export { computeAccountAddress, deriveL2Key, deriveL2KeyWithSigner } from "./keys.js";

// ── Models ────────────────────────────────────────────────────────
export {
  OrderBuilder,
  headersToRecord,
  type BlockOfferOrder,
  type BlockOfferRequest,
  type BlockTradeRequest,
  type Header,
  type Order,
  type OrderInstruction,
  type OrderSide,
  type OrderType,
  type RequiredOrderField,
} from "./models.js";

// ── Typed data ────────────────────────────────────────────────────
export { messageHash, type TypedData, type TypedDataDomain, type TypeMember } from "./typed-data.js";

// ── Errors ────────────────────────────────────────────────────────
export {
  ParadexError,
  CredentialFormatError,
  ConfigurationFormatError,
  ProtocolError,
  SigningError,
  AccountStateError,
  InvalidOrderError,
  ApiError,
  isParadexError,
  type ErrorKind,
} from "./errors.js";
