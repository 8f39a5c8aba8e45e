/**
 * dag-gen command
 *
 * Prints a random connected, acyclic, bipartite ledger input.
 */

import { Effect } from "effect"
import { LOG_LEVEL_ENV, parseDagGenArgs, type DagGenConfig, type Environment } from "./config"
import { CliError } from "./errors"
import { generateBipartiteDag, renderLedger } from "./generator"
import type { CliIO } from "./io"
import { withLogging } from "./logging"
import { createSeededRandom } from "./random"

export const DAG_GEN_USAGE = `dag-gen

Usage:
  dag-gen <vertices> [--seed <n>] [--log-level <level>]

Options:
  --seed <n>            Unsigned 32-bit seed for a reproducible ledger
  --log-level <level>   trace | debug | info | warning | error | none (default: warning,
                        or ${LOG_LEVEL_ENV})
  -h, --help            Show this help`

export const runDagGen = (config: DagGenConfig, io: CliIO): Effect.Effect<number> =>
  Effect.gen(function* () {
    const random = config.seed === undefined ? Math.random : createSeededRandom(config.seed)
    yield* Effect.logInfo(
      `Generating ${config.vertices} vertices${config.seed === undefined ? "" : ` with seed ${config.seed}`}`,
    )

    const ledger = generateBipartiteDag({ vertices: config.vertices, random })
    yield* Effect.logDebug(`RED = ${ledger.reds.join(",")}`)
    yield* Effect.logDebug(`BLUE = ${ledger.blues.join(",")}`)

    for (const line of renderLedger(ledger)) {
      yield* Effect.sync(() => io.stdout(line))
    }
    return 0
  }).pipe(withLogging(io, config.logLevel))

export const mainDagGen = (argv: readonly string[], env: Environment, io: CliIO): Effect.Effect<number> =>
  Effect.suspend(() => {
    try {
      const invocation = parseDagGenArgs(argv, env)
      if (invocation.kind === "help") {
        io.stdout(DAG_GEN_USAGE)
        return Effect.succeed(0)
      }
      return runDagGen(invocation.config, io)
    } catch (error) {
      if (error instanceof CliError) {
        io.stderr(`error: ${error.message}`)
        io.stderr(DAG_GEN_USAGE)
        return Effect.succeed(1)
      }
      throw error
    }
  })
