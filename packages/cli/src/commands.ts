/**
 * @ledger-digests/cli — Commands.
 *
 * Each command returns the lines it prints; the runner owns stdout.
 * Labels are coloured through the palette the runner passes in.
 */

import { hex } from "@scure/base";
import type { ChalkInstance } from "chalk";
import {
  CheckpointDigest,
  fromWire,
  ObjectDigest,
  TransactionDigest,
  TransactionEffectsDigest,
  TransactionEventsDigest,
} from "@ledger-digests/digests";
import type { DigestKind, EncodableDigest } from "@ledger-digests/digests";
import { CliError } from "./errors.js";
import { encodableClass } from "./registry.js";

const LABEL_WIDTH = 10;

function line(palette: ChalkInstance, label: string, value: string): string {
  return palette.gray(label.padEnd(LABEL_WIDTH)) + value;
}

// =============================================================================
// random
// =============================================================================

/**
 * Random digests of one kind, one per line.
 *
 * Events digests print their debug form, the only text they have.
 */
export function randomCommand(kind: DigestKind, count: number): string[] {
  if (kind === "transaction-events") {
    return Array.from({ length: count }, () => TransactionEventsDigest.random().toDebugString());
  }
  const cls = encodableClass(kind);
  return Array.from({ length: count }, () => cls.random().toString());
}

// =============================================================================
// inspect
// =============================================================================

function tombstoneName(digest: ObjectDigest): string {
  if (digest.equals(ObjectDigest.DELETED)) return "deleted";
  if (digest.equals(ObjectDigest.WRAPPED)) return "wrapped";
  return "none";
}

function describeDigest(
  palette: ChalkInstance,
  kind: DigestKind,
  digest: EncodableDigest<DigestKind>,
): string[] {
  const lines = [
    line(palette, "kind", kind),
    line(palette, "base58", digest.toString()),
    line(palette, "debug", digest.toDebugString()),
    line(palette, "hex", digest.toLowerHex(true)),
    line(palette, "HEX", digest.toUpperHex(true)),
  ];
  if (digest instanceof ObjectDigest) {
    const alive = digest.isAlive();
    lines.push(line(palette, "alive", alive ? palette.green("yes") : palette.red("no")));
    lines.push(line(palette, "tombstone", tombstoneName(digest)));
  }
  return lines;
}

/**
 * Every rendering of one digest given as base-58 text.
 *
 * @throws {DigestError} DECODE_ERROR if the text is not a digest
 */
export function inspectCommand(
  palette: ChalkInstance,
  kind: DigestKind,
  text: string,
): string[] {
  const digest = encodableClass(kind).parse(text);
  return describeDigest(palette, kind, digest);
}

// =============================================================================
// convert
// =============================================================================

export type ConvertSource = "hex" | "base58";

function decodeHex(value: string): Uint8Array {
  const digits = value.startsWith("0x") || value.startsWith("0X") ? value.slice(2) : value;
  try {
    return hex.decode(digits);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError("INVALID_INPUT", `Invalid hex: ${reason}`);
  }
}

/**
 * Convert between the hex diagnostic form and canonical base-58.
 *
 * @throws {CliError} INVALID_INPUT for malformed hex
 * @throws {DigestError} for a value that is not exactly one digest
 */
export function convertCommand(kind: DigestKind, from: ConvertSource, value: string): string {
  const cls = encodableClass(kind);
  if (from === "hex") {
    return fromWire(cls, decodeHex(value), "binary").toString();
  }
  return cls.parse(value).toLowerHex(true);
}

export function isConvertSource(value: string): value is ConvertSource {
  return value === "hex" || value === "base58";
}

// =============================================================================
// sentinels
// =============================================================================

/**
 * Named reserved values of every kind that defines them.
 */
export function sentinelsCommand(palette: ChalkInstance): string[] {
  const entries: readonly (readonly [string, EncodableDigest<DigestKind>])[] = [
    ["checkpoint ZERO", CheckpointDigest.ZERO],
    ["transaction ZERO (genesis)", TransactionDigest.genesis()],
    ["transaction-effects ZERO", TransactionEffectsDigest.ZERO],
    ["object MIN", ObjectDigest.MIN],
    ["object MAX", ObjectDigest.MAX],
    ["object WRAPPED", ObjectDigest.WRAPPED],
    ["object DELETED", ObjectDigest.DELETED],
  ];
  const width = Math.max(...entries.map(([name]) => name.length)) + 2;
  const lines = entries.map(
    ([name, digest]) => palette.gray(name.padEnd(width)) + digest.toString(),
  );
  lines.push(
    palette.gray("transaction-events ZERO".padEnd(width)) +
      TransactionEventsDigest.ZERO.toDebugString(),
  );
  return lines;
}
