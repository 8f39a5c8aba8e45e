/**
 * ledger-stats command
 *
 * Loads a ledger file, checks its structure and prints the statistics.
 * Exit codes: 0 ok, 1 read/usage/numeric failure, 2 malformed input,
 * 3 cyclic graph, 4 disconnected graph.
 */

import { analyzeLedger, formatReport, formatTransaction, type LedgerGraph } from "@dagstats/core"
import { Effect } from "effect"
import { parseLedgerStatsArgs, LOG_LEVEL_ENV, type Environment, type LedgerStatsConfig } from "./config"
import { CliError } from "./errors"
import { readInputLines } from "./input"
import type { CliIO } from "./io"
import { withLogging } from "./logging"

export const ExitCode = {
  Success: 0,
  Failure: 1,
  InvalidInput: 2,
  Cyclic: 3,
  Disconnected: 4,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export const LEDGER_STATS_USAGE = `ledger-stats

Usage:
  ledger-stats <input-file> [-d | --no-validation] [--log-level <level>]

Options:
  -d, --no-validation   Skip the (slow) structural validation
  --log-level <level>   trace | debug | info | warning | error | none (default: warning,
                        or ${LOG_LEVEL_ENV})
  -h, --help            Show this help`

const logGraph = (graph: LedgerGraph) =>
  Effect.gen(function* () {
    yield* Effect.logInfo(`Loaded ${graph.size} transactions`)
    yield* Effect.logDebug("Graph:")
    for (const transaction of graph.transactions) {
      yield* Effect.logDebug(`  ${formatTransaction(transaction)}`)
    }
  })

/**
 * Run the pipeline for an already-validated configuration.
 */
export const runLedgerStats = (config: LedgerStatsConfig, io: CliIO): Effect.Effect<ExitCode> =>
  Effect.gen(function* () {
    yield* Effect.logInfo(`Input file = ${config.inputPath}`)
    const lines = yield* readInputLines(config.inputPath)
    const analysis = analyzeLedger(lines, { validate: config.validate })

    switch (analysis.status) {
      case "invalid-format":
        yield* Effect.logError(`Error reading graph from \`${config.inputPath}\`: ${analysis.error.message}`)
        return ExitCode.InvalidInput
      case "cyclic":
        yield* logGraph(analysis.graph)
        yield* Effect.logError("Graph is connected but cyclic, this is not supported")
        return ExitCode.Cyclic
      case "disconnected":
        yield* logGraph(analysis.graph)
        yield* Effect.logError("Graph is unconnected, this is not supported")
        return ExitCode.Disconnected
      case "computation-failed":
        yield* logGraph(analysis.graph)
        yield* Effect.logError(`Error calculating result: ${analysis.error.message}`)
        return ExitCode.Failure
      case "ok":
        break
    }

    yield* logGraph(analysis.graph)
    if (analysis.structure) {
      yield* Effect.logInfo("Graph is connected and acyclic")
      if (analysis.structure.bipartite) {
        yield* Effect.logInfo("Graph is bipartite")
      } else {
        yield* Effect.logWarning("Graph is not bipartite, this should not be a problem")
      }
    }

    for (const report of analysis.reports) {
      yield* Effect.sync(() => io.stdout(formatReport(report)))
    }
    return ExitCode.Success
  }).pipe(
    Effect.catchAll((error) => Effect.logError(error.message).pipe(Effect.as(ExitCode.Failure))),
    withLogging(io, config.logLevel),
  )

/**
 * Parse `argv`, then run. Usage errors are reported before logging is set up.
 */
export const mainLedgerStats = (argv: readonly string[], env: Environment, io: CliIO): Effect.Effect<ExitCode> =>
  Effect.suspend(() => {
    try {
      const invocation = parseLedgerStatsArgs(argv, env)
      if (invocation.kind === "help") {
        io.stdout(LEDGER_STATS_USAGE)
        return Effect.succeed(ExitCode.Success)
      }
      return runLedgerStats(invocation.config, io)
    } catch (error) {
      if (error instanceof CliError) {
        io.stderr(`error: ${error.message}`)
        io.stderr(LEDGER_STATS_USAGE)
        return Effect.succeed(ExitCode.Failure)
      }
      throw error
    }
  })
