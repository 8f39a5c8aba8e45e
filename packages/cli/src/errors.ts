/**
 * CLI Errors
 */

export type CliErrorCode = "CLI_INVALID_ARGUMENT" | "CLI_INPUT_READ_FAILED"

/**
 * Base error for usage, configuration and input problems of the front-end.
 */
export class CliError extends Error {
  public override readonly cause?: unknown

  constructor(
    public readonly code: CliErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message)
    this.name = "CliError"
    this.cause = cause
  }
}

/**
 * The input file could not be opened or read.
 */
export class InputReadError extends CliError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super("CLI_INPUT_READ_FAILED", `Error opening file \`${path}\`: ${describeCause(cause)}`, cause)
    this.name = "InputReadError"
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message || cause.name
  return String(cause)
}
