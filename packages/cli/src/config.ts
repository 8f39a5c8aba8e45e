/**
 * Command-Line Configuration
 *
 * Flags are split by hand, then validated with zod so every option has a
 * single typed source of truth.
 */

import { z } from "zod"
import { CliError } from "./errors"
import { LOG_LEVEL_NAMES } from "./logging"

/** Environment variable consulted when `--log-level` is absent */
export const LOG_LEVEL_ENV = "DAGSTATS_LOG_LEVEL"

const logLevelSchema = z.enum(LOG_LEVEL_NAMES).default("warning")

// =============================================================================
// SCHEMAS
// =============================================================================

export const LedgerStatsConfigSchema = z.object({
  inputPath: z.string().min(1, "missing <input-file>"),
  validate: z.boolean().default(true),
  logLevel: logLevelSchema,
})

export type LedgerStatsConfig = z.infer<typeof LedgerStatsConfigSchema>

export const DagGenConfigSchema = z.object({
  vertices: z.coerce.number().int().positive(),
  seed: z.coerce.number().int().nonnegative().max(0xffffffff).optional(),
  logLevel: logLevelSchema,
})

export type DagGenConfig = z.infer<typeof DagGenConfigSchema>

export type Invocation<C> = { kind: "help" } | { kind: "run"; config: C }

export type Environment = Readonly<Record<string, string | undefined>>

// =============================================================================
// PARSERS
// =============================================================================

/**
 * `ledger-stats <input-file> [-d | --no-validation] [--log-level <level>]`
 * @throws CliError
 */
export function parseLedgerStatsArgs(argv: readonly string[], env: Environment = {}): Invocation<LedgerStatsConfig> {
  const args = splitArgs(argv, ["--log-level"], ["-d", "--no-validation"])
  if (args.help) return { kind: "help" }
  if (args.positional.length > 1) {
    throw new CliError("CLI_INVALID_ARGUMENT", `unexpected argument '${args.positional[1]}'`)
  }

  const config = unwrap(
    LedgerStatsConfigSchema.safeParse({
      inputPath: args.positional[0] ?? "",
      validate: !args.switches.has("-d") && !args.switches.has("--no-validation"),
      logLevel: args.values.get("--log-level") ?? (env[LOG_LEVEL_ENV] || undefined),
    }),
  )
  return { kind: "run", config }
}

/**
 * `dag-gen <vertices> [--seed <n>] [--log-level <level>]`
 * @throws CliError
 */
export function parseDagGenArgs(argv: readonly string[], env: Environment = {}): Invocation<DagGenConfig> {
  const args = splitArgs(argv, ["--seed", "--log-level"], [])
  if (args.help) return { kind: "help" }
  if (args.positional.length !== 1) {
    throw new CliError("CLI_INVALID_ARGUMENT", "expected exactly one <vertices> argument")
  }

  const config = unwrap(
    DagGenConfigSchema.safeParse({
      vertices: args.positional[0],
      seed: args.values.get("--seed"),
      logLevel: args.values.get("--log-level") ?? (env[LOG_LEVEL_ENV] || undefined),
    }),
  )
  return { kind: "run", config }
}

// =============================================================================
// HELPERS
// =============================================================================

interface SplitArgs {
  help: boolean
  positional: string[]
  values: Map<string, string>
  switches: Set<string>
}

function splitArgs(argv: readonly string[], valueFlags: string[], switchFlags: string[]): SplitArgs {
  const result: SplitArgs = { help: false, positional: [], values: new Map(), switches: new Set() }
  const rest = [...argv]

  while (rest.length > 0) {
    const arg = rest.shift()
    if (arg === undefined) break

    if (arg === "-h" || arg === "--help") {
      result.help = true
      continue
    }
    if (valueFlags.includes(arg)) {
      const value = rest.shift()
      if (value === undefined) {
        throw new CliError("CLI_INVALID_ARGUMENT", `${arg} requires a value`)
      }
      result.values.set(arg, value)
      continue
    }
    if (switchFlags.includes(arg)) {
      result.switches.add(arg)
      continue
    }
    if (arg.startsWith("-") && arg !== "-") {
      throw new CliError("CLI_INVALID_ARGUMENT", `unknown option '${arg}'`)
    }
    result.positional.push(arg)
  }

  return result
}

function unwrap<I, O>(result: z.SafeParseReturnType<I, O>): O {
  if (!result.success) {
    const firstError = result.error.errors[0]
    const field = firstError?.path.join(".")
    const message = firstError?.message ?? "invalid arguments"
    throw new CliError("CLI_INVALID_ARGUMENT", field ? `${field}: ${message}` : message, result.error)
  }
  return result.data
}
