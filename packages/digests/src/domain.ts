/**
 * @ledger-digests/digests — Domain digest base classes.
 *
 * Each ledger entity gets its own digest class. The classes share an
 * operation vocabulary but carry a distinct string-literal `kind`, so a
 * TransactionDigest is never assignable to an ObjectDigest (or any other
 * kind) and cross-kind `equals`/`compareTo` calls fail to compile.
 *
 * Two tiers:
 * - KindedDigest: construction, equality, ordering, debug text, wire form.
 *   Every kind has these.
 * - EncodableDigest: adds raw byte access, base-58 text, hex and parsing.
 *   Every kind except TransactionEventsDigest has these.
 *
 * No cross-kind conversion exists. Going through raw bytes is the only way
 * to move between kinds, and it has to be written out at the call site.
 */

import { decodeDigestBytes } from "./codec.js";
import { Digest, inspectCustom } from "./digest.js";
import { DigestError, invalidDigestLength } from "./errors.js";
import type { DigestKind } from "./kinds.js";
import { DIGEST_LENGTH } from "./kinds.js";
import type { SecureRng } from "./rng.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Serialization mode of the surrounding format.
 * - "binary": fixed 32 raw bytes, no length prefix
 * - "readable": base-58 string
 */
export type WireMode = "binary" | "readable";

/**
 * Static side shared by every digest class.
 */
export interface DigestClass<T> {
  new (bytes: Uint8Array): T;
  readonly KIND: DigestKind;
}

export type ParseResult<T> =
  | { readonly success: true; readonly digest: T }
  | { readonly success: false; readonly error: DigestError };

// =============================================================================
// KindedDigest
// =============================================================================

/**
 * Digests are objects, so `Map` and `Set` compare them by reference. Key
 * value-based collections by `toWire("readable")` (or `toString()` on
 * encodable kinds).
 */
export abstract class KindedDigest<K extends DigestKind> {
  abstract readonly kind: K;

  protected readonly digest: Digest;

  /**
   * @throws {RangeError} if `bytes` is not exactly 32 bytes long
   */
  constructor(bytes: Uint8Array) {
    this.digest = new Digest(bytes);
  }

  static random<T>(this: DigestClass<T>): T {
    return new this(Digest.random().intoInner());
  }

  /** Comparator for `Array#sort` over one kind. */
  static compare<T extends KindedDigest<DigestKind>>(
    this: DigestClass<T>,
    a: T,
    b: T,
  ): -1 | 0 | 1 {
    return a.compareTo(b);
  }

  equals(other: KindedDigest<K>): boolean {
    return this.digest.equals(other.digest);
  }

  compareTo(other: KindedDigest<K>): -1 | 0 | 1 {
    return this.digest.compareTo(other.digest);
  }

  toDebugString(): string {
    return this.digest.toDebugString();
  }

  toWire(mode: "binary"): Uint8Array;
  toWire(mode: "readable"): string;
  toWire(mode: WireMode): Uint8Array | string;
  toWire(mode: WireMode): Uint8Array | string {
    return mode === "binary" ? this.digest.intoInner() : this.digest.toString();
  }

  [inspectCustom](): string {
    return this.toDebugString();
  }
}

// =============================================================================
// EncodableDigest
// =============================================================================

export abstract class EncodableDigest<K extends DigestKind> extends KindedDigest<K> {
  static generate<T>(this: DigestClass<T>, rng: SecureRng): T {
    return new this(Digest.generate(rng).intoInner());
  }

  /**
   * Parse canonical base-58 text.
   *
   * @throws {DigestError} DECODE_ERROR on a bad alphabet or a decoded length other than 32
   */
  static parse<T>(this: DigestClass<T>, text: string): T {
    return new this(decodeDigestBytes(text, this.KIND));
  }

  /**
   * Like `parse`, but returns the failure instead of throwing it.
   */
  static safeParse<T>(this: DigestClass<T>, text: string): ParseResult<T> {
    try {
      return { success: true, digest: new this(decodeDigestBytes(text, this.KIND)) };
    } catch (err: unknown) {
      if (err instanceof DigestError) {
        return { success: false, error: err };
      }
      throw err;
    }
  }

  inner(): Uint8Array {
    return this.digest.inner();
  }

  intoInner(): Uint8Array {
    return this.digest.intoInner();
  }

  base58Encode(): string {
    return this.digest.toString();
  }

  toString(): string {
    return this.digest.toString();
  }

  toLowerHex(prefixed = false): string {
    return this.digest.toLowerHex(prefixed);
  }

  toUpperHex(prefixed = false): string {
    return this.digest.toUpperHex(prefixed);
  }

  toJSON(): string {
    return this.digest.toString();
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Checked slice conversion. Only TransactionDigest and ObjectDigest expose it.
 *
 * @throws {DigestError} INVALID_TRANSACTION_DIGEST if the slice is not 32 bytes
 */
export function digestFromSlice<T>(cls: DigestClass<T>, bytes: Uint8Array): T {
  if (bytes.length !== DIGEST_LENGTH) {
    throw invalidDigestLength(bytes.length, cls.KIND);
  }
  return new cls(bytes);
}
