/**
 * Kind → digest class lookup for command-line input.
 *
 * TransactionEventsDigest has no text form, so it is kept apart from the
 * encodable kinds and only supports `random`.
 */

import {
  CheckpointContentsDigest,
  CheckpointDigest,
  isDigestKind,
  ObjectDigest,
  TransactionDigest,
  TransactionEffectsDigest,
} from "@ledger-digests/digests";
import type { DigestClass, DigestKind, EncodableDigest } from "@ledger-digests/digests";
import { CliError } from "./errors.js";

export type EncodableKind = Exclude<DigestKind, "transaction-events">;

/** Static surface of an encodable digest class, erased over the kind. */
export interface EncodableDigestClass extends DigestClass<EncodableDigest<DigestKind>> {
  random(): EncodableDigest<DigestKind>;
  parse(text: string): EncodableDigest<DigestKind>;
}

export const ENCODABLE_DIGESTS: Readonly<Record<EncodableKind, EncodableDigestClass>> = {
  checkpoint: CheckpointDigest,
  "checkpoint-contents": CheckpointContentsDigest,
  transaction: TransactionDigest,
  "transaction-effects": TransactionEffectsDigest,
  object: ObjectDigest,
};

/**
 * @throws {CliError} USAGE for anything that is not a digest kind
 */
export function resolveKind(value: string | undefined): DigestKind {
  if (value === undefined) {
    throw new CliError("USAGE", "Missing digest kind");
  }
  if (!isDigestKind(value)) {
    throw new CliError("USAGE", `Unknown digest kind "${value}"`);
  }
  return value;
}

/**
 * @throws {CliError} INVALID_INPUT for transaction-events, which has no text form
 */
export function encodableClass(kind: DigestKind): EncodableDigestClass {
  if (kind === "transaction-events") {
    throw new CliError(
      "INVALID_INPUT",
      "transaction-events digests have no text form; only `random` supports them",
    );
  }
  return ENCODABLE_DIGESTS[kind];
}
