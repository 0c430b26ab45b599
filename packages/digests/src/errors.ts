/**
 * @ledger-digests/digests — Errors.
 *
 * Two failure conditions exist, both synchronous and local:
 * - INVALID_TRANSACTION_DIGEST: a byte slice is not exactly 32 bytes long
 * - DECODE_ERROR: text is not valid base-58, or decodes to the wrong length
 *
 * Nothing here logs. Errors are thrown to the caller (or returned from
 * `safeParse`), and the caller decides whether to recover.
 */

import type { DigestKind } from "./kinds.js";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for digest construction and decoding.
 *
 * Slice conversion reports INVALID_TRANSACTION_DIGEST for every kind that
 * supports it (transaction and object); `DigestError.kind` names the kind
 * that was actually being built.
 */
export type DigestErrorCode = "INVALID_TRANSACTION_DIGEST" | "DECODE_ERROR";

// =============================================================================
// DigestError
// =============================================================================

export class DigestError extends Error {
  public readonly code: DigestErrorCode;
  /** Kind being constructed when the failure happened, when known */
  public readonly kind: DigestKind | undefined;

  constructor(code: DigestErrorCode, message: string, kind?: DigestKind) {
    super(message);
    this.name = "DigestError";
    this.code = code;
    this.kind = kind;
  }
}

/**
 * The slice-length failure shared by TransactionDigest and ObjectDigest.
 */
export function invalidDigestLength(length: number, kind?: DigestKind): DigestError {
  return new DigestError(
    "INVALID_TRANSACTION_DIGEST",
    `Invalid digest: expected 32 bytes, got ${length}`,
    kind,
  );
}

/**
 * Wrap a codec failure (or a bad decoded length) as a DECODE_ERROR.
 */
export function decodeError(cause: unknown, kind?: DigestKind): DigestError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return new DigestError("DECODE_ERROR", message, kind);
}
