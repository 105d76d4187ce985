/**
 * Internal encoding and crypto utilities for advanced users.
 *
 * These are low-level primitives used by the accounts internally. Import
 * from `paradex-signer/internals` only if you need direct access to felt
 * encoding, typed-data hashing, message construction or the raw curves.
 *
 * @module
 */

// ── Crypto ────────────────────────────────────────────────────────
export {
  evmPersonalSign,
  evmPersonalSignDigest,
  evmSignDigest,
  evmWalletFromPrivateKey,
  flattenSignature,
  isValidStarkPrivateKey,
  parseL1PrivateKey,
  parseStarkPrivateKey,
  signatureRS,
  STARK_CURVE_ORDER,
  starkPublicKey,
  starkSign,
  type EvmWallet,
} from "./crypto.js";
// ── Encoding ──────────────────────────────────────────────────────
export {
  bigIntToBytes32,
  bytesToBigInt,
  bytesToHex,
  concat,
  FIELD_PRIME,
  hexToBytes,
  isShortString,
  scaleDecimalString,
  starknetKeccak,
  textToFelt,
  toHex,
  tryParseFelt,
  tryParseHexFelt,
  tryShortStringToFelt,
  tryToQuantum,
} from "./encoding.js";
// ── Keys ──────────────────────────────────────────────────────────
export {
  buildStarkKeyMessage,
  INITIALIZE_SELECTOR,
  parseClassHash,
  parseL1ChainId,
  starkKeyFromL1Signature,
} from "./keys.js";
// ── Messages ──────────────────────────────────────────────────────
export {
  buildAuthMessage,
  buildBlockOfferMessage,
  buildBlockTradeMessage,
  buildFullnodeMessage,
  buildModifyOrderMessage,
  buildOnboardingMessage,
  buildOrderMessage,
  buildTypedData,
  MESSAGE_FIELDS,
  quantumFelt,
  type MessageFields,
  type MessageKind,
} from "./messages.js";
// ── Typed data ────────────────────────────────────────────────────
export { encodeMessage, encodeType, encodeValue, typeHash } from "./typed-data.js";
