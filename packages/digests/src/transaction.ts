/**
 * Transaction digests.
 *
 * - TransactionDigest: unique per transaction. The all-zero value is at
 *   once ZERO, `default()` and `genesis()`: the "no parent transaction" marker.
 * - TransactionEffectsDigest: names the effects of an executed transaction.
 * - TransactionEventsDigest: names the events a transaction emitted. It is
 *   never parsed from or rendered to user-facing text, so it only has the
 *   KindedDigest surface.
 */

import { digestFromSlice, EncodableDigest, KindedDigest } from "./domain.js";
import { DIGEST_LENGTH } from "./kinds.js";

export class TransactionDigest extends EncodableDigest<"transaction"> {
  static readonly KIND = "transaction";
  static readonly ZERO: TransactionDigest = new TransactionDigest(new Uint8Array(DIGEST_LENGTH));

  readonly kind = TransactionDigest.KIND;

  static default(): TransactionDigest {
    return TransactionDigest.ZERO;
  }

  /**
   * Parent marker for objects created at genesis, which have no parent
   * transaction.
   */
  static genesis(): TransactionDigest {
    return TransactionDigest.ZERO;
  }

  /**
   * @throws {DigestError} INVALID_TRANSACTION_DIGEST unless `bytes` is exactly 32 bytes
   */
  static fromBytes(bytes: Uint8Array): TransactionDigest {
    return digestFromSlice(TransactionDigest, bytes);
  }
}

export class TransactionEffectsDigest extends EncodableDigest<"transaction-effects"> {
  static readonly KIND = "transaction-effects";
  static readonly ZERO: TransactionEffectsDigest = new TransactionEffectsDigest(
    new Uint8Array(DIGEST_LENGTH),
  );

  readonly kind = TransactionEffectsDigest.KIND;
}

export class TransactionEventsDigest extends KindedDigest<"transaction-events"> {
  static readonly KIND = "transaction-events";
  static readonly ZERO: TransactionEventsDigest = new TransactionEventsDigest(
    new Uint8Array(DIGEST_LENGTH),
  );

  readonly kind = TransactionEventsDigest.KIND;

  toDebugString(): string {
    return `TransactionEventsDigest(${this.digest.toString()})`;
  }
}
