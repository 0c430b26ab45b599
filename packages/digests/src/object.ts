/**
 * Object digests.
 *
 * Besides content digests, an object's digest slot can hold one of two
 * tombstones that hashing never produces:
 * - DELETED (every byte 99): the object was deleted
 * - WRAPPED (every byte 88): the object was wrapped into another object
 *
 * MIN and MAX bound the full value range for range scans and pruning.
 */

import { digestFromSlice, EncodableDigest } from "./domain.js";
import { DIGEST_LENGTH } from "./kinds.js";

export const OBJECT_DIGEST_DELETED_BYTE_VAL = 99;
export const OBJECT_DIGEST_WRAPPED_BYTE_VAL = 88;

function filled(value: number): Uint8Array {
  return new Uint8Array(DIGEST_LENGTH).fill(value);
}

export class ObjectDigest extends EncodableDigest<"object"> {
  static readonly KIND = "object";
  static readonly MIN: ObjectDigest = new ObjectDigest(filled(0x00));
  static readonly MAX: ObjectDigest = new ObjectDigest(filled(0xff));
  static readonly ZERO: ObjectDigest = ObjectDigest.MIN;
  static readonly DELETED: ObjectDigest = new ObjectDigest(filled(OBJECT_DIGEST_DELETED_BYTE_VAL));
  static readonly WRAPPED: ObjectDigest = new ObjectDigest(filled(OBJECT_DIGEST_WRAPPED_BYTE_VAL));

  readonly kind = ObjectDigest.KIND;

  /**
   * @throws {DigestError} INVALID_TRANSACTION_DIGEST unless `bytes` is exactly 32 bytes
   */
  static fromBytes(bytes: Uint8Array): ObjectDigest {
    return digestFromSlice(ObjectDigest, bytes);
  }

  /** False only for the DELETED and WRAPPED tombstones. */
  isAlive(): boolean {
    return !this.equals(ObjectDigest.DELETED) && !this.equals(ObjectDigest.WRAPPED);
  }

  toDebugString(): string {
    return `o#${this.digest.toString()}`;
  }
}
