/**
 * @ledger-digests/cli — Argument parsing and dispatch.
 *
 * Usage:
 *   ledger-digest random <kind> [-n COUNT]
 *   ledger-digest inspect <kind> <base58>
 *   ledger-digest convert <kind> --from hex|base58 <value>
 *   ledger-digest sentinels
 *
 * Exit codes: 0 success, 1 invalid input, 2 usage error.
 */

import { parseArgs } from "node:util";
import { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import type { Logger } from "pino";
import { DigestError } from "@ledger-digests/digests";
import type { AppConfig } from "./config.js";
import { CliError } from "./errors.js";
import { resolveKind } from "./registry.js";
import {
  convertCommand,
  inspectCommand,
  isConvertSource,
  randomCommand,
  sentinelsCommand,
} from "./commands.js";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export const USAGE = [
  "Usage:",
  "  ledger-digest random <kind> [-n COUNT]",
  "  ledger-digest inspect <kind> <base58>",
  "  ledger-digest convert <kind> --from hex|base58 <value>",
  "  ledger-digest sentinels",
  "",
  "Kinds: checkpoint, checkpoint-contents, transaction, transaction-effects,",
  "       transaction-events, object",
].join("\n");

export const EXIT_OK = 0;
export const EXIT_INVALID_INPUT = 1;
export const EXIT_USAGE = 2;

// =============================================================================
// Argument helpers
// =============================================================================

function parseCount(raw: string | undefined, max: number): number {
  if (raw === undefined) return 1;
  if (!/^\d+$/.test(raw)) {
    throw new CliError("USAGE", `Invalid count "${raw}"`);
  }
  const count = Number(raw);
  if (count < 1 || count > max) {
    throw new CliError("USAGE", `Count must be between 1 and ${max}, got ${count}`);
  }
  return count;
}

function requireArg(value: string | undefined, name: string): string {
  if (value === undefined) {
    throw new CliError("USAGE", `Missing ${name}`);
  }
  return value;
}

function rejectExtra(rest: readonly string[]): void {
  if (rest.length > 0) {
    throw new CliError("USAGE", `Unexpected argument "${rest[0]}"`);
  }
}

function isParseArgsError(err: unknown): err is TypeError {
  return (
    err instanceof TypeError &&
    "code" in err &&
    typeof err.code === "string" &&
    err.code.startsWith("ERR_PARSE_ARGS")
  );
}

// =============================================================================
// Runner
// =============================================================================

function dispatch(
  argv: readonly string[],
  io: CliIO,
  config: AppConfig,
  palette: ChalkInstance,
): void {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      count: { type: "string", short: "n" },
      from: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  const [command, ...rest] = positionals;

  if (values.help === true) {
    io.out(USAGE);
    return;
  }

  switch (command) {
    case "random": {
      const [kindArg, ...extra] = rest;
      rejectExtra(extra);
      const kind = resolveKind(kindArg);
      const count = parseCount(values.count, config.DIGEST_MAX_COUNT);
      for (const text of randomCommand(kind, count)) io.out(text);
      return;
    }
    case "inspect": {
      const [kindArg, text, ...extra] = rest;
      rejectExtra(extra);
      const kind = resolveKind(kindArg);
      for (const entry of inspectCommand(palette, kind, requireArg(text, "digest text"))) {
        io.out(entry);
      }
      return;
    }
    case "convert": {
      const [kindArg, value, ...extra] = rest;
      rejectExtra(extra);
      const kind = resolveKind(kindArg);
      const from = requireArg(values.from, "--from");
      if (!isConvertSource(from)) {
        throw new CliError("USAGE", `--from must be "hex" or "base58", got "${from}"`);
      }
      io.out(convertCommand(kind, from, requireArg(value, "value")));
      return;
    }
    case "sentinels": {
      rejectExtra(rest);
      for (const entry of sentinelsCommand(palette)) io.out(entry);
      return;
    }
    case undefined:
      throw new CliError("USAGE", "Missing command");
    default:
      throw new CliError("USAGE", `Unknown command "${command}"`);
  }
}

/**
 * Run one command line and return its exit code.
 *
 * Never throws for bad input; unexpected errors propagate.
 */
export function runCli(
  argv: readonly string[],
  io: CliIO,
  config: AppConfig,
  logger: Logger,
): number {
  const palette = new Chalk({ level: config.DIGEST_COLOR ? 1 : 0 });
  logger.debug({ argv }, "running command");

  try {
    dispatch(argv, io, config, palette);
    return EXIT_OK;
  } catch (err: unknown) {
    if (err instanceof CliError) {
      logger.debug({ code: err.code }, err.message);
      io.err(palette.red(`error: ${err.message}`));
      return err.code === "USAGE" ? EXIT_USAGE : EXIT_INVALID_INPUT;
    }
    if (err instanceof DigestError) {
      logger.debug({ code: err.code, kind: err.kind }, err.message);
      io.err(palette.red(`error: ${err.message}`));
      return EXIT_INVALID_INPUT;
    }
    // parseArgs reports unknown options and missing option values as TypeErrors
    if (isParseArgsError(err)) {
      io.err(palette.red(`error: ${err.message}`));
      return EXIT_USAGE;
    }
    throw err;
  }
}
