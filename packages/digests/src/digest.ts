/**
 * @ledger-digests/digests — Canonical Digest.
 *
 * An opaque, immutable 32-byte value. Every domain digest embeds exactly
 * one of these.
 *
 * - Bytes are copied in on construction and copied out on access
 * - Equality and ordering are byte-wise (lexicographic), with no numeric meaning
 * - Text form is base-58; hex is for diagnostics only
 * - Parsing lives on the domain types, not here
 */

import { base58Encode, toHex } from "./codec.js";
import { invalidDigestLength } from "./errors.js";
import { DIGEST_LENGTH } from "./kinds.js";
import type { SecureRng } from "./rng.js";
import { defaultRng } from "./rng.js";

/**
 * Output of an external hash function (e.g. a `node:crypto` Hash after
 * `update`). Only a 32-byte result converts into a Digest.
 */
export interface HashOutput {
  digest(): Uint8Array;
}

/** Key Node's `util.inspect` looks up to print the debug form. */
export const inspectCustom: unique symbol = Symbol.for("nodejs.util.inspect.custom");

/**
 * Byte-wise lexicographic comparison. A strict prefix sorts first.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): -1 | 0 | 1 {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    if (x !== y) {
      return x < y ? -1 : 1;
    }
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

export class Digest {
  static readonly ZERO: Digest = new Digest(new Uint8Array(DIGEST_LENGTH));

  private readonly bytes: Uint8Array;

  /**
   * @throws {RangeError} if `bytes` is not exactly 32 bytes long
   */
  constructor(bytes: Uint8Array) {
    if (bytes.length !== DIGEST_LENGTH) {
      throw new RangeError(
        `Digest requires exactly ${DIGEST_LENGTH} bytes, got ${bytes.length}`,
      );
    }
    this.bytes = Uint8Array.from(bytes);
  }

  static from(bytes: Uint8Array): Digest {
    return new Digest(bytes);
  }

  static generate(rng: SecureRng): Digest {
    const bytes = new Uint8Array(DIGEST_LENGTH);
    rng.fillBytes(bytes);
    return new Digest(bytes);
  }

  static random(): Digest {
    return Digest.generate(defaultRng);
  }

  /**
   * One-way conversion from a hash function's output.
   *
   * @throws {DigestError} INVALID_TRANSACTION_DIGEST if the output is not 32 bytes
   */
  static fromHash(hash: HashOutput): Digest {
    const bytes = hash.digest();
    if (bytes.length !== DIGEST_LENGTH) {
      throw invalidDigestLength(bytes.length);
    }
    return new Digest(bytes);
  }

  /** Comparator for `Array#sort`. */
  static compare(a: Digest, b: Digest): -1 | 0 | 1 {
    return a.compareTo(b);
  }

  inner(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  intoInner(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  equals(other: Digest): boolean {
    return this.compareTo(other) === 0;
  }

  compareTo(other: Digest): -1 | 0 | 1 {
    return compareBytes(this.bytes, other.bytes);
  }

  toString(): string {
    return base58Encode(this.bytes);
  }

  toDebugString(): string {
    return this.toString();
  }

  toLowerHex(prefixed = false): string {
    return toHex(this.bytes, { prefixed });
  }

  toUpperHex(prefixed = false): string {
    return toHex(this.bytes, { upper: true, prefixed });
  }

  toJSON(): string {
    return this.toString();
  }

  [inspectCustom](): string {
    return this.toDebugString();
  }
}
