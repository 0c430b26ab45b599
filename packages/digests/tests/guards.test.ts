/**
 * Runtime type guard tests for @ledger-digests/digests
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import { isBase58DigestString, isDigestBytes, isDigestKind } from "../src/guards.js";

describe("isDigestKind", () => {
  it("accepts every kind", () => {
    for (const kind of [
      "checkpoint",
      "checkpoint-contents",
      "transaction",
      "transaction-effects",
      "transaction-events",
      "object",
    ]) {
      expect(isDigestKind(kind)).toBe(true);
    }
  });

  it("rejects other strings", () => {
    expect(isDigestKind("Transaction")).toBe(false);
    expect(isDigestKind("effects")).toBe(false);
    expect(isDigestKind("")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isDigestKind(null)).toBe(false);
    expect(isDigestKind(0)).toBe(false);
  });
});

describe("isDigestBytes", () => {
  it("accepts a 32-byte Uint8Array", () => {
    expect(isDigestBytes(new Uint8Array(32))).toBe(true);
  });

  it("accepts a 32-byte Buffer", () => {
    expect(isDigestBytes(Buffer.alloc(32))).toBe(true);
  });

  it("rejects other lengths", () => {
    expect(isDigestBytes(new Uint8Array(31))).toBe(false);
    expect(isDigestBytes(new Uint8Array(33))).toBe(false);
  });

  it("rejects plain arrays", () => {
    expect(isDigestBytes(new Array<number>(32).fill(0))).toBe(false);
  });
});

describe("isBase58DigestString", () => {
  it("accepts the all-zero and all-0xFF encodings", () => {
    expect(isBase58DigestString("1".repeat(32))).toBe(true);
    expect(isBase58DigestString("JEKNVnkbo3jma5nREBBJCDoXFVeKkD56V3xKrvRmWxFG")).toBe(true);
  });

  it("rejects characters outside the alphabet", () => {
    expect(isBase58DigestString("0".repeat(32))).toBe(false);
    expect(isBase58DigestString("O".repeat(32))).toBe(false);
  });

  it("rejects text decoding to the wrong length", () => {
    expect(isBase58DigestString("1".repeat(31))).toBe(false);
    expect(isBase58DigestString("")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isBase58DigestString(new Uint8Array(32))).toBe(false);
    expect(isBase58DigestString(undefined)).toBe(false);
  });
});
