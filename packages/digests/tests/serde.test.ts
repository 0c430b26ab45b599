/**
 * Wire Serde Tests
 *
 * Verifies:
 * - Binary mode is exactly 32 raw bytes, no length prefix
 * - Readable mode is the base-58 string
 * - fromWire rejects values that do not match the mode
 * - read/write of the fixed field inside a larger buffer
 * - TransactionEventsDigest goes over the wire like every other kind
 */

import { describe, it, expect } from "vitest";
import { DigestError } from "../src/errors.js";
import { ObjectDigest } from "../src/object.js";
import { fromWire, readDigest, writeDigest } from "../src/serde.js";
import { TransactionDigest, TransactionEventsDigest } from "../src/transaction.js";

const SEQUENCE = Uint8Array.from({ length: 32 }, (_, i) => i);
const SEQUENCE_B58 = "1thX6LZfHDZZKUs92febYZhYRcXddmzfzF2NvTkPNE";

describe("toWire", () => {
  it("binary mode is the 32 raw bytes", () => {
    const wire = new TransactionDigest(SEQUENCE).toWire("binary");
    expect(wire).toBeInstanceOf(Uint8Array);
    expect(wire).toEqual(SEQUENCE);
  });

  it("readable mode is base-58 text", () => {
    expect(new TransactionDigest(SEQUENCE).toWire("readable")).toBe(SEQUENCE_B58);
  });

  it("events digests serialize in both modes", () => {
    const digest = new TransactionEventsDigest(SEQUENCE);
    expect(digest.toWire("binary")).toEqual(SEQUENCE);
    expect(digest.toWire("readable")).toBe(SEQUENCE_B58);
  });
});

describe("fromWire", () => {
  it("reads binary into the requested kind", () => {
    const digest = fromWire(ObjectDigest, SEQUENCE, "binary");
    expect(digest).toBeInstanceOf(ObjectDigest);
    expect(digest.inner()).toEqual(SEQUENCE);
  });

  it("reads readable text into the requested kind", () => {
    const digest = fromWire(TransactionEventsDigest, SEQUENCE_B58, "readable");
    expect(digest.equals(new TransactionEventsDigest(SEQUENCE))).toBe(true);
  });

  it("rejects binary of the wrong length", () => {
    expect(() => fromWire(TransactionDigest, new Uint8Array(33), "binary")).toThrow(
      "Invalid digest: expected 32 bytes, got 33",
    );
  });

  it("rejects a string in binary mode and bytes in readable mode", () => {
    expect(() => fromWire(TransactionDigest, SEQUENCE_B58, "binary")).toThrow(DigestError);
    expect(() => fromWire(TransactionDigest, SEQUENCE, "readable")).toThrow(
      "Expected a base-58 string in readable mode, got bytes",
    );
  });

  it("rejects readable text that is not a digest", () => {
    expect(() => fromWire(ObjectDigest, "1111", "readable")).toThrow(
      "Invalid digest length: expected 32 bytes, decoded 4",
    );
  });
});

describe("writeDigest / readDigest", () => {
  it("writes the field at an offset without a length prefix", () => {
    const buffer = new Uint8Array(40);
    const next = writeDigest(ObjectDigest.MAX, buffer, 4);

    expect(next).toBe(36);
    expect(buffer.subarray(0, 4)).toEqual(new Uint8Array(4));
    expect(buffer.subarray(4, 36)).toEqual(new Uint8Array(32).fill(0xff));
    expect(buffer.subarray(36)).toEqual(new Uint8Array(4));
  });

  it("reads back consecutive fields", () => {
    const buffer = new Uint8Array(64);
    const afterFirst = writeDigest(new TransactionDigest(SEQUENCE), buffer);
    writeDigest(ObjectDigest.DELETED, buffer, afterFirst);

    const first = readDigest(TransactionDigest, buffer);
    const second = readDigest(ObjectDigest, buffer, first.nextOffset);

    expect(first.digest.toString()).toBe(SEQUENCE_B58);
    expect(second.digest.isAlive()).toBe(false);
    expect(second.nextOffset).toBe(64);
  });

  it("read copies out of the buffer", () => {
    const buffer = new Uint8Array(32).fill(1);
    const { digest } = readDigest(ObjectDigest, buffer);
    buffer.fill(2);
    expect(digest.inner()).toEqual(new Uint8Array(32).fill(1));
  });

  it("refuses to write past the end", () => {
    expect(() => writeDigest(ObjectDigest.MIN, new Uint8Array(40), 9)).toThrow(RangeError);
  });

  it("rejects negative and fractional offsets", () => {
    const buffer = new Uint8Array(64);
    expect(() => readDigest(ObjectDigest, buffer, 1.5)).toThrow(
      "Digest offset must be a non-negative integer, got 1.5",
    );
    expect(() => readDigest(ObjectDigest, buffer, -1)).toThrow(
      "Digest offset must be a non-negative integer, got -1",
    );
    expect(() => writeDigest(ObjectDigest.MAX, buffer, 1.5)).toThrow(RangeError);
    expect(() => writeDigest(ObjectDigest.MAX, buffer, -1)).toThrow(
      "Digest offset must be a non-negative integer, got -1",
    );
    expect(buffer).toEqual(new Uint8Array(64));
  });

  it("refuses to read a truncated field", () => {
    expect(() => readDigest(ObjectDigest, new Uint8Array(40), 10)).toThrow(
      "Invalid digest: expected 32 bytes, got 30",
    );
    expect(() => readDigest(ObjectDigest, new Uint8Array(40), 41)).toThrow(
      "Invalid digest: expected 32 bytes, got 0",
    );
  });
});
