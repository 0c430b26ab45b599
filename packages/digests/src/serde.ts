/**
 * @ledger-digests/digests — Wire serde.
 *
 * The binary layout is a fixed 32-byte field with no length prefix. It is
 * relied on by storage keys and the network format, so it must stay
 * bit-exact. Human-readable formats carry the base-58 string instead.
 *
 * These helpers work for every kind, TransactionEventsDigest included.
 */

import { decodeDigestBytes } from "./codec.js";
import type { DigestClass, KindedDigest, WireMode } from "./domain.js";
import { decodeError, invalidDigestLength } from "./errors.js";
import type { DigestKind } from "./kinds.js";
import { DIGEST_LENGTH } from "./kinds.js";

/**
 * Decode a digest from its wire value.
 *
 * @param cls - The digest class to build
 * @param value - 32 raw bytes ("binary") or base-58 text ("readable")
 * @param mode - The surrounding format's readability mode
 * @throws {DigestError} INVALID_TRANSACTION_DIGEST for binary input of the wrong
 *   length, DECODE_ERROR for bad text or a value that does not match `mode`
 */
export function fromWire<T>(
  cls: DigestClass<T>,
  value: Uint8Array | string,
  mode: WireMode,
): T {
  if (mode === "binary") {
    if (typeof value === "string") {
      throw decodeError("Expected raw digest bytes in binary mode, got a string", cls.KIND);
    }
    if (value.length !== DIGEST_LENGTH) {
      throw invalidDigestLength(value.length, cls.KIND);
    }
    return new cls(value);
  }

  if (typeof value !== "string") {
    throw decodeError("Expected a base-58 string in readable mode, got bytes", cls.KIND);
  }
  return new cls(decodeDigestBytes(value, cls.KIND));
}

function assertOffset(offset: number): void {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new RangeError(`Digest offset must be a non-negative integer, got ${offset}`);
  }
}

/**
 * Write the fixed 32-byte field into `buffer` at `offset`.
 *
 * @returns The offset just past the written field
 * @throws {RangeError} for a bad offset or a field that does not fit
 */
export function writeDigest(
  digest: KindedDigest<DigestKind>,
  buffer: Uint8Array,
  offset = 0,
): number {
  assertOffset(offset);
  if (offset + DIGEST_LENGTH > buffer.length) {
    throw new RangeError(
      `Cannot write ${DIGEST_LENGTH}-byte digest at offset ${offset} into ${buffer.length}-byte buffer`,
    );
  }
  buffer.set(digest.toWire("binary"), offset);
  return offset + DIGEST_LENGTH;
}

/**
 * Read the fixed 32-byte field from `buffer` at `offset`.
 *
 * @throws {RangeError} if `offset` is not a non-negative integer
 * @throws {DigestError} INVALID_TRANSACTION_DIGEST if fewer than 32 bytes remain
 */
export function readDigest<T>(
  cls: DigestClass<T>,
  buffer: Uint8Array,
  offset = 0,
): { readonly digest: T; readonly nextOffset: number } {
  assertOffset(offset);
  const available = Math.max(0, Math.min(buffer.length - offset, DIGEST_LENGTH));
  if (available !== DIGEST_LENGTH) {
    throw invalidDigestLength(available, cls.KIND);
  }
  const field = buffer.subarray(offset, offset + DIGEST_LENGTH);
  return { digest: new cls(field), nextOffset: offset + DIGEST_LENGTH };
}
