/**
 * Runtime Type Guards
 *
 * Narrowing functions for digest inputs at system boundaries
 * (CLI arguments, deserialized data, external integrations).
 */

import { base58 } from "@scure/base";
import type { DigestKind } from "./kinds.js";
import { DIGEST_KINDS, DIGEST_LENGTH } from "./kinds.js";

const KIND_SET = new Set<string>(DIGEST_KINDS);

export function isDigestKind(value: unknown): value is DigestKind {
  return typeof value === "string" && KIND_SET.has(value);
}

export function isDigestBytes(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array && value.length === DIGEST_LENGTH;
}

/**
 * True if `value` is base-58 text decoding to exactly 32 bytes.
 */
export function isBase58DigestString(value: unknown): value is string {
  if (typeof value !== "string" || value.length === 0) return false;
  try {
    return base58.decode(value).length === DIGEST_LENGTH;
  } catch {
    return false;
  }
}
