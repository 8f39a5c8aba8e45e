/**
 * Tests for the ledger-stats command
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { Effect } from "effect"
import { afterAll, beforeAll, describe, it, expect } from "vitest"
import { ExitCode, LEDGER_STATS_USAGE, mainLedgerStats, runLedgerStats } from "../src"
import { captureIO } from "./helpers"

const EXAMPLE_REPORT = [
  "> AVG DAG DEPTH: 1.33",
  "> AVG TXS PER DEPTH: 2.50",
  "> AVG REF: 1.67",
  "> AVG TXS PER TIME UNIT: 0.60",
  "> AVG TXS PER TIMESTAMP: 1.25",
].join("\n")

describe("ledger-stats", () => {
  let dir: string

  const ledger = (name: string, contents: string): string => {
    const path = join(dir, name)
    writeFileSync(path, contents)
    return path
  }

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "dagstats-cli-"))
  })

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  describe("runLedgerStats", () => {
    it("should print the statistics and warn about a non-bipartite graph", async () => {
      const io = captureIO()
      const inputPath = ledger("example.txt", "5\n1 1 0\n1 2 0\n2 2 1\n3 6 3\n3 3 2\n")

      const code = await Effect.runPromise(runLedgerStats({ inputPath, validate: true, logLevel: "warning" }, io))

      expect(code).toBe(ExitCode.Success)
      expect(io.out.join("\n")).toBe(EXAMPLE_REPORT)
      expect(io.err).toEqual(["WARN Graph is not bipartite, this should not be a problem"])
    })

    it("should log progress at info level", async () => {
      const io = captureIO()
      const inputPath = ledger("bipartite.txt", "2\r\n1 1 120\r\n2 2 130\r\n")

      const code = await Effect.runPromise(runLedgerStats({ inputPath, validate: true, logLevel: "info" }, io))

      expect(code).toBe(ExitCode.Success)
      expect(io.err).toEqual([
        `INFO Input file = ${inputPath}`,
        "INFO Loaded 2 transactions",
        "INFO Graph is connected and acyclic",
        "INFO Graph is bipartite",
      ])
    })

    it("should dump the graph at debug level", async () => {
      const io = captureIO()
      const inputPath = ledger("debug.txt", "2\n1 1 120\n2 2 130\n")

      await Effect.runPromise(runLedgerStats({ inputPath, validate: false, logLevel: "debug" }, io))

      expect(io.err).toEqual([
        `INFO Input file = ${inputPath}`,
        "INFO Loaded 2 transactions",
        "DEBUG Graph:",
        "DEBUG   Tx<Tx:2, Root, Root, 120>",
        "DEBUG   Tx<Tx:3, Tx:2, Tx:2, 130>",
      ])
    })

    it("should report malformed input with exit code 2", async () => {
      const io = captureIO()
      const inputPath = ledger("malformed.txt", "x\n")

      const code = await Effect.runPromise(runLedgerStats({ inputPath, validate: true, logLevel: "warning" }, io))

      expect(code).toBe(ExitCode.InvalidInput)
      expect(io.out).toEqual([])
      expect(io.err).toEqual([
        `ERROR Error reading graph from \`${inputPath}\`: Invalid number of transactions: 'x' is not a non-negative integer`,
      ])
    })

    it("should refuse a cyclic graph with exit code 3", async () => {
      const io = captureIO()
      const inputPath = ledger("cyclic.txt", "3\n1 3 120\n1 4 130\n1 2 130\n")

      const code = await Effect.runPromise(runLedgerStats({ inputPath, validate: true, logLevel: "warning" }, io))

      expect(code).toBe(ExitCode.Cyclic)
      expect(io.err).toEqual(["ERROR Graph is connected but cyclic, this is not supported"])
    })

    it("should refuse a disconnected graph with exit code 4", async () => {
      const io = captureIO()
      const inputPath = ledger("disconnected.txt", "2\n3 3 120\n2 2 130\n")

      const code = await Effect.runPromise(runLedgerStats({ inputPath, validate: true, logLevel: "warning" }, io))

      expect(code).toBe(ExitCode.Disconnected)
      expect(io.err).toEqual(["ERROR Graph is unconnected, this is not supported"])
    })

    it("should report a cycle met while computing when validation is skipped", async () => {
      const io = captureIO()
      const inputPath = ledger("unchecked.txt", "2\n3 3 120\n2 2 130\n")

      const code = await Effect.runPromise(runLedgerStats({ inputPath, validate: false, logLevel: "warning" }, io))

      expect(code).toBe(ExitCode.Failure)
      expect(io.err).toEqual(["ERROR Error calculating result: Graph is cyclic (Tx:3 -> Tx:2)"])
    })

    it("should report an unreadable file with exit code 1", async () => {
      const io = captureIO()
      const inputPath = join(dir, "missing.txt")

      const code = await Effect.runPromise(runLedgerStats({ inputPath, validate: true, logLevel: "warning" }, io))

      expect(code).toBe(ExitCode.Failure)
      expect(io.err).toHaveLength(1)
      expect(io.err[0].startsWith(`ERROR Error opening file \`${inputPath}\`: ENOENT`)).toBe(true)
    })

    it("should stay silent at level none", async () => {
      const io = captureIO()
      const inputPath = ledger("silent.txt", "3\n1 3 120\n1 4 130\n1 2 130\n")

      const code = await Effect.runPromise(runLedgerStats({ inputPath, validate: true, logLevel: "none" }, io))

      expect(code).toBe(ExitCode.Cyclic)
      expect(io.err).toEqual([])
    })
  })

  describe("mainLedgerStats", () => {
    it("should run from arguments", async () => {
      const io = captureIO()
      const inputPath = ledger("main.txt", "5\n1 1 0\n1 2 0\n2 2 1\n3 6 3\n3 3 2\n")

      const code = await Effect.runPromise(mainLedgerStats([inputPath, "--log-level", "error"], {}, io))

      expect(code).toBe(ExitCode.Success)
      expect(io.out.join("\n")).toBe(EXAMPLE_REPORT)
      expect(io.err).toEqual([])
    })

    it("should read the log level from the environment", async () => {
      const io = captureIO()
      const inputPath = ledger("env.txt", "1\n1 1 0\n")

      await Effect.runPromise(mainLedgerStats([inputPath], { DAGSTATS_LOG_LEVEL: "info" }, io))

      expect(io.err[0]).toBe(`INFO Input file = ${inputPath}`)
    })

    it("should print usage for help", async () => {
      const io = captureIO()

      const code = await Effect.runPromise(mainLedgerStats(["--help"], {}, io))

      expect(code).toBe(ExitCode.Success)
      expect(io.out).toEqual([LEDGER_STATS_USAGE])
    })

    it("should print the usage error and usage to stderr", async () => {
      const io = captureIO()

      const code = await Effect.runPromise(mainLedgerStats([], {}, io))

      expect(code).toBe(ExitCode.Failure)
      expect(io.err).toEqual(["error: inputPath: missing <input-file>", LEDGER_STATS_USAGE])
    })
  })
})
