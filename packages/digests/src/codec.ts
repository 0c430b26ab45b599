/**
 * @ledger-digests/digests — Text codecs.
 *
 * Base-58 (Bitcoin alphabet) is the canonical text form: no padding,
 * no length prefix, no checksum. Hex is for diagnostics only.
 */

import { base58, hex } from "@scure/base";
import { decodeError } from "./errors.js";
import type { DigestKind } from "./kinds.js";
import { BASE58_DIGEST_MAX_LENGTH, DIGEST_LENGTH } from "./kinds.js";

// =============================================================================
// Base-58
// =============================================================================

export function base58Encode(bytes: Uint8Array): string {
  return base58.encode(bytes);
}

/**
 * Decode base-58 text of any length.
 *
 * @throws {DigestError} DECODE_ERROR on characters outside the alphabet
 */
export function base58Decode(text: string, kind?: DigestKind): Uint8Array {
  try {
    return base58.decode(text);
  } catch (err: unknown) {
    throw decodeError(err, kind);
  }
}

/**
 * Decode base-58 text that must hold exactly one digest.
 *
 * Text longer than any 32-byte encoding is rejected before decoding, since
 * base-58 decoding is quadratic in the input length.
 *
 * @throws {DigestError} DECODE_ERROR on over-long text, a bad alphabet or a
 *   decoded length other than 32
 */
export function decodeDigestBytes(text: string, kind?: DigestKind): Uint8Array {
  if (text.length > BASE58_DIGEST_MAX_LENGTH) {
    throw decodeError(
      `Invalid digest text: at most ${BASE58_DIGEST_MAX_LENGTH} characters, got ${text.length}`,
      kind,
    );
  }
  const bytes = base58Decode(text, kind);
  if (bytes.length !== DIGEST_LENGTH) {
    throw decodeError(
      `Invalid digest length: expected ${DIGEST_LENGTH} bytes, decoded ${bytes.length}`,
      kind,
    );
  }
  return bytes;
}

// =============================================================================
// Hex
// =============================================================================

export interface HexOptions {
  /** Uppercase digits. Default: false */
  readonly upper?: boolean;
  /** Prepend "0x". Default: false */
  readonly prefixed?: boolean;
}

/**
 * Render bytes as hex, two digits per byte.
 */
export function toHex(bytes: Uint8Array, options: HexOptions = {}): string {
  const digits = hex.encode(bytes);
  const cased = options.upper === true ? digits.toUpperCase() : digits;
  return options.prefixed === true ? `0x${cased}` : cased;
}
