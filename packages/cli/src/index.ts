#!/usr/bin/env node
/**
 * @ledger-digests/cli — Command-line entry point.
 *
 * Generates, inspects and converts typed ledger digests.
 */

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { runCli } from "./cli.js";

const config = loadConfig();
const logger = createLogger(config);

process.exitCode = runCli(
  process.argv.slice(2),
  {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
  },
  config,
  logger,
);
