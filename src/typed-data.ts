/**
 * Structured ("typed data") hashing for Starknet-style messages.
 *
 * A message is described by a domain, a primary type name, a dictionary of
 * types (each an ordered member list) and the message values. Hashing:
 *
 * - type encoding: `Name(type1 field1,type2 field2,...)` in declared order
 * - type hash: starknet-keccak of the ASCII encoding
 * - message hash: starknet-keccak over the 32-byte big-endian words
 *   `[typeHash, value1, ..., valueN]`
 *
 * Only flat schemas are supported: every member is a scalar felt. Member
 * order is part of the protocol and must never be changed.
 *
 * @module
 */

import { bigIntToBytes32, concat, starknetKeccak, tryParseFelt } from "./encoding.js";
import { SigningError } from "./errors.js";

/** One member of a typed-data type. */
export interface TypeMember {
  readonly name: string;
  readonly type: string;
}

/** The domain separating Paradex messages from other applications. */
export interface TypedDataDomain {
  readonly name: string;
  /** Chain id felt as 0x-prefixed hex. */
  readonly chainId: string;
  readonly version: string;
}

/**
 * A typed-data message.
 *
 * `message` holds raw JSON values; each must be a felt numeral string
 * (`0x`-hex or decimal) when it is encoded.
 */
export interface TypedData {
  readonly domain: TypedDataDomain;
  readonly primaryType: string;
  readonly types: Readonly<Record<string, readonly TypeMember[]>>;
  readonly message: Readonly<Record<string, unknown>>;
}

function lookupType(typedData: TypedData, typeName: string): readonly TypeMember[] {
  if (!Object.hasOwn(typedData.types, typeName)) {
    throw new SigningError(`Type not found: ${typeName}`);
  }
  return typedData.types[typeName];
}

/**
 * Encode a type as `Name(type1 field1,type2 field2,...)`.
 *
 * @throws {SigningError} When the type is not in the dictionary.
 */
export function encodeType(typedData: TypedData, typeName: string): string {
  const members = lookupType(typedData, typeName);
  return `${typeName}(${members.map((m) => `${m.type} ${m.name}`).join(",")})`;
}

/** starknet-keccak of {@link encodeType}. */
export function typeHash(typedData: TypedData, typeName: string): bigint {
  return starknetKeccak(new TextEncoder().encode(encodeType(typedData, typeName)));
}

/**
 * Encode a single member value as a felt.
 *
 * @param typedData - Used to reject members whose type is itself a struct.
 * @throws {SigningError} When the value is not a felt numeral string, does
 *   not fit in the field, or the member type is a struct or an array.
 */
export function encodeValue(typedData: TypedData, type: string, value: unknown): bigint {
  if (type.endsWith("*")) {
    throw new SigningError(`Array member type is not supported: ${type}`);
  }
  if (Object.hasOwn(typedData.types, type)) {
    throw new SigningError(`Nested struct member type is not supported: ${type}`);
  }
  if (typeof value !== "string") {
    throw new SigningError(`Expected a string value for ${type}, got ${describe(value)}`);
  }
  const felt = tryParseFelt(value);
  if (felt === undefined) {
    throw new SigningError(`Invalid ${type} value: "${value}"`);
  }
  return felt;
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Hash a struct: starknet-keccak of `[typeHash, ...encodedMembers]` as
 * concatenated 32-byte big-endian words.
 *
 * @throws {SigningError} When the type is unknown, a member is missing from
 *   the message, or a value cannot be encoded.
 */
export function encodeMessage(typedData: TypedData, typeName: string): bigint {
  const members = lookupType(typedData, typeName);
  const words: bigint[] = [typeHash(typedData, typeName)];
  for (const member of members) {
    if (!Object.hasOwn(typedData.message, member.name)) {
      throw new SigningError(`Missing field: ${member.name}`);
    }
    words.push(encodeValue(typedData, member.type, typedData.message[member.name]));
  }
  return starknetKeccak(concat(words.map(bigIntToBytes32)));
}

/**
 * The hash that gets signed for a typed-data message: the struct hash of
 * its primary type.
 *
 * The domain and account address are not folded in. Every signature the
 * SDK produces depends on this formula; see DESIGN.md before changing it.
 */
export function messageHash(typedData: TypedData): bigint {
  return encodeMessage(typedData, typedData.primaryType);
}
