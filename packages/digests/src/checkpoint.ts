/**
 * Checkpoint digests.
 *
 * CheckpointDigest names a checkpoint summary and has an all-zero default.
 * CheckpointContentsDigest names the contents a checkpoint commits to and
 * has no zero or default value.
 */

import { EncodableDigest } from "./domain.js";
import { DIGEST_LENGTH } from "./kinds.js";

export class CheckpointDigest extends EncodableDigest<"checkpoint"> {
  static readonly KIND = "checkpoint";
  static readonly ZERO: CheckpointDigest = new CheckpointDigest(new Uint8Array(DIGEST_LENGTH));

  readonly kind = CheckpointDigest.KIND;

  static default(): CheckpointDigest {
    return CheckpointDigest.ZERO;
  }
}

export class CheckpointContentsDigest extends EncodableDigest<"checkpoint-contents"> {
  static readonly KIND = "checkpoint-contents";

  readonly kind = CheckpointContentsDigest.KIND;
}
