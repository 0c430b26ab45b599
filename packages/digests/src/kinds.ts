/**
 * Digest kinds.
 *
 * One string-literal tag per ledger entity that carries a digest. The tag is
 * the compile-time marker that keeps the domain types apart; at runtime it
 * also names the kind in errors, schemas and the CLI.
 */

export type DigestKind =
  | "checkpoint"
  | "checkpoint-contents"
  | "transaction"
  | "transaction-effects"
  | "transaction-events"
  | "object";

export const DIGEST_KINDS: readonly DigestKind[] = [
  "checkpoint",
  "checkpoint-contents",
  "transaction",
  "transaction-effects",
  "transaction-events",
  "object",
];

/** Byte length of every digest. */
export const DIGEST_LENGTH = 32;

/** 32 zero bytes encode to 32 "1"s; 32 bytes of 0xFF encode to 44 characters. */
export const BASE58_DIGEST_MIN_LENGTH = 32;
export const BASE58_DIGEST_MAX_LENGTH = 44;
