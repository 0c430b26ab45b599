/**
 * @ledger-digests/digests — Schema advertisement and validation.
 *
 * Every digest type advertises itself to schema tooling as a base-58
 * encoded string, whatever its binary wire form. The Zod schemas turn
 * that string into a typed digest at API boundaries.
 */

import { z } from "zod";
import { decodeDigestBytes } from "./codec.js";
import type { DigestClass, EncodableDigest } from "./domain.js";
import { DigestError } from "./errors.js";
import type { DigestKind } from "./kinds.js";
import { BASE58_DIGEST_MAX_LENGTH, BASE58_DIGEST_MIN_LENGTH } from "./kinds.js";

// =============================================================================
// JSON Schema
// =============================================================================

export const BASE58_ALPHABET =
  "123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz";

export const DIGEST_TYPE_NAMES: Readonly<Record<DigestKind, string>> = {
  checkpoint: "CheckpointDigest",
  "checkpoint-contents": "CheckpointContentsDigest",
  transaction: "TransactionDigest",
  "transaction-effects": "TransactionEffectsDigest",
  "transaction-events": "TransactionEventsDigest",
  object: "ObjectDigest",
};

export interface DigestJsonSchema {
  readonly title: string;
  readonly description: string;
  readonly type: "string";
  readonly format: "base58";
  readonly pattern: string;
  readonly minLength: number;
  readonly maxLength: number;
}

export function digestJsonSchema(kind: DigestKind): DigestJsonSchema {
  return {
    title: DIGEST_TYPE_NAMES[kind],
    description: "Base58-encoded 32-byte digest",
    type: "string",
    format: "base58",
    pattern: `^[${BASE58_ALPHABET}]+$`,
    minLength: BASE58_DIGEST_MIN_LENGTH,
    maxLength: BASE58_DIGEST_MAX_LENGTH,
  };
}

// =============================================================================
// Zod
// =============================================================================

/**
 * Zod schema accepting base-58 text and producing a typed digest.
 * Decode failures become a custom issue carrying the codec's message.
 */
export function digestSchema<T extends EncodableDigest<DigestKind>>(
  cls: DigestClass<T>,
): z.ZodType<T, z.ZodTypeDef, string> {
  return z.string().transform((text, ctx) => {
    try {
      return new cls(decodeDigestBytes(text, cls.KIND));
    } catch (err: unknown) {
      if (!(err instanceof DigestError)) throw err;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err.message,
        params: { kind: cls.KIND, code: err.code },
      });
      return z.NEVER;
    }
  });
}
