/**
 * Tests for command-line parsing
 */

import { describe, it, expect } from "vitest"
import { CliError, parseDagGenArgs, parseLedgerStatsArgs } from "../src"

function failure(fn: () => unknown): CliError {
  try {
    fn()
  } catch (error) {
    if (error instanceof CliError) return error
    throw error
  }
  throw new Error("expected a CliError")
}

describe("parseLedgerStatsArgs", () => {
  it("should apply defaults", () => {
    expect(parseLedgerStatsArgs(["ledger.txt"])).toEqual({
      kind: "run",
      config: { inputPath: "ledger.txt", validate: true, logLevel: "warning" },
    })
  })

  it("should accept the validation switches in any position", () => {
    expect(parseLedgerStatsArgs(["-d", "ledger.txt"])).toMatchObject({ config: { validate: false } })
    expect(parseLedgerStatsArgs(["ledger.txt", "--no-validation"])).toMatchObject({ config: { validate: false } })
  })

  it("should take the log level from the flag before the environment", () => {
    const env = { DAGSTATS_LOG_LEVEL: "info" }

    expect(parseLedgerStatsArgs(["ledger.txt"], env)).toMatchObject({ config: { logLevel: "info" } })
    expect(parseLedgerStatsArgs(["ledger.txt", "--log-level", "debug"], env)).toMatchObject({
      config: { logLevel: "debug" },
    })
  })

  it("should ignore an empty environment value", () => {
    expect(parseLedgerStatsArgs(["ledger.txt"], { DAGSTATS_LOG_LEVEL: "" })).toMatchObject({
      config: { logLevel: "warning" },
    })
  })

  it("should recognise help anywhere", () => {
    expect(parseLedgerStatsArgs(["ledger.txt", "--help"])).toEqual({ kind: "help" })
    expect(parseLedgerStatsArgs(["-h"])).toEqual({ kind: "help" })
  })

  it("should require an input file", () => {
    const error = failure(() => parseLedgerStatsArgs([]))

    expect(error.code).toBe("CLI_INVALID_ARGUMENT")
    expect(error.message).toBe("inputPath: missing <input-file>")
  })

  it("should reject a second positional argument", () => {
    expect(failure(() => parseLedgerStatsArgs(["a.txt", "b.txt"])).message).toBe("unexpected argument 'b.txt'")
  })

  it("should reject unknown options", () => {
    expect(failure(() => parseLedgerStatsArgs(["a.txt", "--verbose"])).message).toBe("unknown option '--verbose'")
  })

  it("should reject a value flag without its value", () => {
    expect(failure(() => parseLedgerStatsArgs(["a.txt", "--log-level"])).message).toBe("--log-level requires a value")
  })

  it("should reject an unknown log level", () => {
    expect(failure(() => parseLedgerStatsArgs(["a.txt", "--log-level", "loud"])).message).toMatch(/^logLevel: /)
  })
})

describe("parseDagGenArgs", () => {
  it("should coerce vertices and seed", () => {
    expect(parseDagGenArgs(["10", "--seed", "7"])).toEqual({
      kind: "run",
      config: { vertices: 10, seed: 7, logLevel: "warning" },
    })
  })

  it("should leave the seed unset by default", () => {
    expect(parseDagGenArgs(["3"])).toMatchObject({ config: { vertices: 3, seed: undefined } })
  })

  it("should require exactly one vertex count", () => {
    expect(failure(() => parseDagGenArgs([])).message).toBe("expected exactly one <vertices> argument")
    expect(failure(() => parseDagGenArgs(["1", "2"])).message).toBe("expected exactly one <vertices> argument")
  })

  it("should reject a non-positive vertex count", () => {
    expect(failure(() => parseDagGenArgs(["0"])).message).toBe("vertices: Number must be greater than 0")
  })

  it("should reject a seed outside 32 bits", () => {
    expect(failure(() => parseDagGenArgs(["3", "--seed", "4294967296"])).message).toMatch(/^seed: /)
  })
})
