/**
 * @ledger-digests/digests — Typed 32-byte ledger identifiers.
 *
 * One canonical Digest primitive and six domain digest types built on it:
 * - CheckpointDigest, CheckpointContentsDigest
 * - TransactionDigest, TransactionEffectsDigest, TransactionEventsDigest
 * - ObjectDigest
 *
 * Design rules:
 * - All values are immutable; bytes are copied in and out
 * - Kinds are distinct types; no cross-kind conversion
 * - Canonical text is base-58; the wire form is 32 raw bytes
 * - Nothing here validates that a digest matches any content
 *
 * @packageDocumentation
 */

// Kinds
export type { DigestKind } from "./kinds.js";
export {
  BASE58_DIGEST_MAX_LENGTH,
  BASE58_DIGEST_MIN_LENGTH,
  DIGEST_KINDS,
  DIGEST_LENGTH,
} from "./kinds.js";

// Errors
export type { DigestErrorCode } from "./errors.js";
export { DigestError } from "./errors.js";

// Codecs
export type { HexOptions } from "./codec.js";
export { base58Encode, base58Decode, decodeDigestBytes, toHex } from "./codec.js";

// Random source
export type { SecureRng } from "./rng.js";
export { defaultRng } from "./rng.js";

// Canonical digest
export type { HashOutput } from "./digest.js";
export { Digest, compareBytes } from "./digest.js";

// Domain digests
export type { DigestClass, ParseResult, WireMode } from "./domain.js";
export { KindedDigest, EncodableDigest } from "./domain.js";
export { CheckpointDigest, CheckpointContentsDigest } from "./checkpoint.js";
export {
  TransactionDigest,
  TransactionEffectsDigest,
  TransactionEventsDigest,
} from "./transaction.js";
export {
  ObjectDigest,
  OBJECT_DIGEST_DELETED_BYTE_VAL,
  OBJECT_DIGEST_WRAPPED_BYTE_VAL,
} from "./object.js";

// Wire serde
export { fromWire, readDigest, writeDigest } from "./serde.js";

// Schema
export type { DigestJsonSchema } from "./schema.js";
export {
  BASE58_ALPHABET,
  DIGEST_TYPE_NAMES,
  digestJsonSchema,
  digestSchema,
} from "./schema.js";

// Runtime type guards
export { isDigestKind, isDigestBytes, isBase58DigestString } from "./guards.js";
