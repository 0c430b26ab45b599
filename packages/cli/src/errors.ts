/**
 * CLI errors.
 *
 * USAGE maps to exit code 2, INVALID_INPUT to exit code 1.
 */

export type CliErrorCode = "USAGE" | "INVALID_INPUT";

export class CliError extends Error {
  constructor(
    public readonly code: CliErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "CliError";
  }
}
